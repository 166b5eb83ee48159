// Re-export everything from core so hosts need a single import
export * from "@skill-relay/core";

// Hono-specific exports
export { createRootBotPlugin } from "./plugin.js";
export { configureOpenAPI } from "./lib/configure-openapi.js";
export type { OpenAPIConfig } from "./lib/configure-openapi.js";
export type { RootBotPluginConfig, RootBotPluginInstance } from "./types.js";
