import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import type { RootBotPluginConfig, RootBotPluginInstance } from "./types.js";
import {
  ConfigurationError,
  UnknownMappingError,
  createMemoryChannel,
  createRouterContext,
  createTurnRouter,
} from "@skill-relay/core";
import { configureOpenAPI } from "./lib/configure-openapi.js";

// Route factories
import { createHealthRoutes } from "./routes/health/health.route.js";
import { createMessagesRoutes } from "./routes/messages/messages.routes.js";
import { createSkillCallbackRoutes } from "./routes/skills/skills.routes.js";

/** Builds the root bot as a hono sub-app. Throws `ConfigurationError` on an invalid skill catalog. */
export function createRootBotPlugin(config: RootBotPluginConfig): RootBotPluginInstance {
  const ctx = createRouterContext(config);
  const router = createTurnRouter(ctx, config.router);
  const channel = config.channel ?? createMemoryChannel();

  // Build the Hono sub-app
  const app = new OpenAPIHono();

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }

    // Skills must not retry a conversation id that was never issued or is gone.
    if (err instanceof UnknownMappingError) {
      console.warn(`[root-bot] Rejected skill callback: ${err.message}`);
      return c.json({ error: err.message }, 404);
    }

    console.error(err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: "Not Found" }, 404);
  });

  // Health check
  app.route("/health", createHealthRoutes(ctx));

  // Mount API routes
  app.route("/api/messages", createMessagesRoutes(ctx, router));
  app.route("/api/skills", createSkillCallbackRoutes(ctx, router, channel));

  // Configure OpenAPI docs
  configureOpenAPI(app, config.openapi);

  return {
    app,
    ctx,
    router,
    channel,
    async initialize() {
      const skills = ctx.skills.list();
      if (skills.length === 0) {
        throw new ConfigurationError("No skills configured");
      }
      console.log(
        `[root-bot] Initialized: ${skills.length} skills (${skills.map((s) => s.id).join(", ")}), callbacks at ${ctx.skills.skillHostEndpointUrl}`,
      );
    },
  };
}
