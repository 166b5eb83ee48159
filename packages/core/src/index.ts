// ── Core types ──
export type { CoreConfig, RouterContext } from "./types.js";
export { createRouterContext } from "./context.js";

// ── Errors ──
export { UnknownMappingError, SkillInvocationError, StateStoreError, ConfigurationError } from "./errors.js";
export type { SkillInvocationDetails, StateOperation } from "./errors.js";

// ── Schemas ──
export {
  ACTIVITY_TYPES,
  END_OF_CONVERSATION_CODES,
  INPUT_HINTS,
  channelAccountSchema,
  conversationAccountSchema,
  conversationReferenceSchema,
  activitySchema,
  turnResponseSchema,
  resourceResponseSchema,
} from "./schemas/activity.schemas.js";
export type {
  ActivityType,
  EndOfConversationCode,
  InputHint,
  ChannelAccount,
  ConversationAccount,
  ConversationReference,
  Activity,
  ActivityInput,
} from "./schemas/activity.schemas.js";
export { skillSchema, skillsConfigurationSchema, skillConversationRecordSchema } from "./schemas/skills.schemas.js";
export type { Skill, SkillsConfiguration, SkillConversationRecord } from "./schemas/skills.schemas.js";

// ── Activities ──
export {
  createMessageActivity,
  createEndOfConversationActivity,
  createTraceActivity,
  getConversationReference,
  applyConversationReference,
} from "./activities/activity-factory.js";

// ── Turn ──
export { TurnContext } from "./turn/turn-context.js";
export type { SendActivitiesHandler, TraceHandler, TurnContextOptions } from "./turn/turn-context.js";
export { runTurn } from "./turn/run-turn.js";
export type { RunTurnOptions, TurnResult } from "./turn/run-turn.js";
export { handleSkillCallback } from "./turn/skill-callback.js";
export type { SkillCallbackOptions, SkillCallbackResult } from "./turn/skill-callback.js";

// ── Routing ──
export { createTurnRouter, summarizeEndOfConversation } from "./agents/turn-router.js";
export type { TurnRouter, TurnRouterConfig, RouterMessages } from "./agents/turn-router.js";
export { createKeywordSelector } from "./agents/skill-selector.js";
export type { SkillSelector } from "./agents/skill-selector.js";
export { readDelegationState, isDelegating, clearDelegationState } from "./agents/delegation-state.js";
export type { DelegationState } from "./agents/delegation-state.js";
export { handleTurnError } from "./agents/error-recovery.js";

// ── Registry ──
export { SkillRegistry } from "./registry/skill-registry.js";

// ── Skills ──
export { createSkillForwarder } from "./skills/skill-forwarder.js";
export type { SkillForwarder, SkillForwarderOptions, ForwardOptions, InvocationResult, FetchLike } from "./skills/skill-forwarder.js";
export { createSkillConversationIdMapper } from "./skills/conversation-id-mapper.js";
export type {
  SkillConversationIdMapper,
  SkillConversationIdMapperOptions,
  SkillConversationMapping,
  CallerContext,
} from "./skills/conversation-id-mapper.js";
export { anonymousCredentials, createStaticTokenCredentials } from "./skills/credentials.js";
export type { CredentialProvider, CredentialRequest } from "./skills/credentials.js";

// ── Channel ──
export { createMemoryChannel } from "./channel/channel-connector.js";
export type { ChannelConnector, MemoryChannel } from "./channel/channel-connector.js";

// ── Events ──
export { RouterEventBus } from "./events/router-events.js";
export type { RouterEvent } from "./events/router-events.js";
export { ROUTER_EVENTS } from "./events/events.js";
export type { RouterEventName } from "./events/events.js";

// ── Constants ──
export { STATE_PROPERTIES, MESSAGES, ERROR_TRACE, BOT_TO_BOT_CALLER_PREFIX, DEFAULTS } from "./utils/constants.js";

// ── Storage ──
export type { StorageProvider, StateStorage, StoredState } from "./storage/interfaces.js";
export { ConversationState } from "./storage/conversation-state.js";
export { createFileStorage, createFileStateStorage } from "./storage/file-storage/index.js";
export type { FileStorageOptions } from "./storage/file-storage/index.js";
export { createMemoryStorage, createMemoryStateStorage } from "./storage/in-memory/index.js";
