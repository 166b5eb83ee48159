/** Conversation state properties that make up the delegation record */
export const STATE_PROPERTIES = {
  ACTIVE_SKILL: "RootBot.ActiveSkillProperty",
  SKILL_CONVERSATION_ID: "RootBot.SkillConversationIdProperty",
} as const;

/** User-facing texts sent by the root bot */
export const MESSAGES = {
  CONNECTING: "Got it, connecting you to the skill...",
  IDLE: `Me no nothin'. Say "skill" and I'll patch you through`,
  BACK_IN_ROOT: `Back in the root bot. Say "skill" and I'll patch you through`,
  WELCOME: "Hello and welcome!",
  ERROR: "The bot encountered an error or bug.",
  ERROR_HINT: "To continue to run this bot, please fix the bot source code.",
} as const;

/** Trace emitted for operators when a turn fails */
export const ERROR_TRACE = {
  NAME: "OnTurnError Trace",
  LABEL: "TurnError",
  VALUE_TYPE: "https://www.botframework.com/schemas/error",
} as const;

/** Prefix of `callerId` for activities sent between bots */
export const BOT_TO_BOT_CALLER_PREFIX = "urn:botframework:aadappid:";

/** Default configuration values */
export const DEFAULTS = {
  TARGET_SKILL_ID: "EchoSkillBot",
  SKILL_TRIGGER: "skill",
  /** Deadline for the termination notice sent to a skill during error recovery */
  RECOVERY_TIMEOUT_MS: 10_000,
  MAX_ID_ATTEMPTS: 3,
  SKILL_CONVERSATION_KEY_PREFIX: "skill-conversations/",
} as const;
