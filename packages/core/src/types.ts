import type { SkillRegistry } from "./registry/skill-registry.js";
import type { SkillsConfiguration } from "./schemas/skills.schemas.js";
import type { ConversationState } from "./storage/conversation-state.js";
import type { StorageProvider } from "./storage/interfaces.js";
import type { SkillConversationIdMapper } from "./skills/conversation-id-mapper.js";
import type { CredentialProvider } from "./skills/credentials.js";
import type { FetchLike, SkillForwarder } from "./skills/skill-forwarder.js";
import type { RouterEventBus } from "./events/router-events.js";
import type { TraceHandler } from "./turn/turn-context.js";

/** Core configuration, independent of any HTTP framework. */
export interface CoreConfig {
  /** App identity of the root bot, sent as the caller on every skill call (default: "") */
  appId?: string;
  /** OAuth scope the root's channel authenticated with; recorded on skill conversation mappings */
  oAuthScope?: string;
  /** Skill catalog and callback endpoint. Validated at startup. */
  skills: SkillsConfiguration;
  /** Storage provider. Defaults to in-memory (ephemeral) if omitted. */
  storage?: StorageProvider;
  /** Outbound credentials for skill calls. Defaults to sending none. */
  credentials?: CredentialProvider;
  /** HTTP client for skill calls. Defaults to the global `fetch`. */
  fetch?: FetchLike;
  /** Deadline for every turn's outbound skill calls. No deadline when omitted. */
  forwardTimeoutMs?: number;
  /** Log every inbound and outbound activity to the console (default: false) */
  logActivities?: boolean;
  /** Operator sink for trace activities. Traces are never sent to users. */
  onTrace?: TraceHandler;
}

/** Internal context passed to the router, error recovery and transport adapters. */
export interface RouterContext {
  appId: string;
  skills: SkillRegistry;
  storage: StorageProvider;
  state: ConversationState;
  conversationIds: SkillConversationIdMapper;
  forwarder: SkillForwarder;
  events: RouterEventBus;
  config: CoreConfig;
}
