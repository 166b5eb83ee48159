import type { OpenAPIHono } from "@hono/zod-openapi";
import type {
  ChannelConnector,
  CoreConfig,
  RouterContext,
  TurnRouter,
  TurnRouterConfig,
} from "@skill-relay/core";
import type { OpenAPIConfig } from "./lib/configure-openapi.js";

export interface RootBotPluginConfig extends CoreConfig {
  /** Activation policy and user-facing messages */
  router?: TurnRouterConfig;
  /** Where skill messages are delivered outside a request. Defaults to an in-memory channel. */
  channel?: ChannelConnector;
  openapi?: OpenAPIConfig;
}

export interface RootBotPluginInstance {
  app: OpenAPIHono;
  ctx: RouterContext;
  router: TurnRouter;
  channel: ChannelConnector;
  initialize(): Promise<void>;
}
