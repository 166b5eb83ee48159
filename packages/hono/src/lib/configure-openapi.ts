import { apiReference } from "@scalar/hono-api-reference";
import type { OpenAPIHono } from "@hono/zod-openapi";

export interface OpenAPIConfig {
  title?: string;
  version?: string;
  description?: string;
  serverUrl?: string;
}

export function configureOpenAPI(app: OpenAPIHono, config: OpenAPIConfig = {}) {
  const {
    title = "Root Bot API",
    version = "1.0.0",
    description = "Root bot messaging endpoint and skill callback API",
    serverUrl,
  } = config;

  app.openAPIRegistry.registerComponent("securitySchemes", "BearerAuth", {
    type: "http",
    scheme: "bearer",
    description: "Token issued to the calling channel or skill",
  });

  const servers = serverUrl
    ? [{ url: serverUrl, description: "Server" }]
    : [];

  app.doc("/doc", {
    openapi: "3.1.0",
    info: { title, version, description },
    ...(servers.length > 0 && { servers }),
    security: [{ BearerAuth: [] }],
  });

  app.get(
    "/reference",
    apiReference({
      spec: { url: "/doc" },
      theme: "kepler",
      layout: "modern",
      defaultHttpClient: { targetKey: "js", clientKey: "fetch" },
      pageTitle: `${title} - API Reference`,
    }),
  );
}
