import { z } from "zod";

/** Activity types the router understands */
export const ACTIVITY_TYPES = {
  MESSAGE: "message",
  CONVERSATION_UPDATE: "conversationUpdate",
  END_OF_CONVERSATION: "endOfConversation",
  EVENT: "event",
  INVOKE: "invoke",
  TRACE: "trace",
  TYPING: "typing",
} as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[keyof typeof ACTIVITY_TYPES];

/** Reasons carried in the `code` field of an `endOfConversation` activity */
export const END_OF_CONVERSATION_CODES = {
  UNKNOWN: "unknown",
  COMPLETED_SUCCESSFULLY: "completedSuccessfully",
  USER_CANCELLED: "userCancelled",
  BOT_TIMED_OUT: "botTimedOut",
  BOT_ISSUED_INVALID_MESSAGE: "botIssuedInvalidMessage",
  CHANNEL_FAILED: "channelFailed",
  SKILL_ERROR: "skillError",
  ROOT_SKILL_ERROR: "rootSkillError",
} as const;

export type EndOfConversationCode = (typeof END_OF_CONVERSATION_CODES)[keyof typeof END_OF_CONVERSATION_CODES];

export const INPUT_HINTS = {
  ACCEPTING_INPUT: "acceptingInput",
  IGNORING_INPUT: "ignoringInput",
  EXPECTING_INPUT: "expectingInput",
} as const;

export type InputHint = (typeof INPUT_HINTS)[keyof typeof INPUT_HINTS];

export const channelAccountSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  role: z.string().optional(),
}).passthrough();

export const conversationAccountSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  isGroup: z.boolean().optional(),
  conversationType: z.string().optional(),
  tenantId: z.string().optional(),
}).passthrough();

export const conversationReferenceSchema = z.object({
  activityId: z.string().optional(),
  user: channelAccountSchema,
  bot: channelAccountSchema,
  conversation: conversationAccountSchema,
  channelId: z.string().min(1),
  serviceUrl: z.string().optional(),
  locale: z.string().optional(),
});

/**
 * Only the fields routing reads are modeled. Unknown types and fields are kept
 * so forwarded and relayed activities reach their destination unchanged.
 */
export const activitySchema = z.object({
  type: z.string().min(1),
  id: z.string().optional(),
  timestamp: z.string().optional(),
  channelId: z.string().min(1),
  serviceUrl: z.string().optional(),
  from: channelAccountSchema,
  recipient: channelAccountSchema,
  conversation: conversationAccountSchema,
  locale: z.string().optional(),
  text: z.string().optional(),
  /** Opaque payload; serialized as-is when shown back to the user */
  value: z.unknown().optional(),
  /** Termination reason, only meaningful on `endOfConversation` */
  code: z.string().optional(),
  name: z.string().optional(),
  label: z.string().optional(),
  valueType: z.string().optional(),
  inputHint: z.nativeEnum(INPUT_HINTS).optional(),
  replyToId: z.string().optional(),
  callerId: z.string().optional(),
  membersAdded: z.array(channelAccountSchema).optional(),
  relatesTo: conversationReferenceSchema.optional(),
  attachments: z.array(z.unknown()).optional(),
  entities: z.array(z.unknown()).optional(),
  channelData: z.unknown().optional(),
}).passthrough();

export type ChannelAccount = z.infer<typeof channelAccountSchema>;
export type ConversationAccount = z.infer<typeof conversationAccountSchema>;
export type ConversationReference = z.infer<typeof conversationReferenceSchema>;
export type Activity = z.infer<typeof activitySchema>;

/** Activity fields a caller may leave for the conversation reference to fill in */
export type ActivityInput = Partial<Activity>;

export const turnResponseSchema = z.object({
  activities: z.array(activitySchema),
});

export const resourceResponseSchema = z.object({
  id: z.string(),
});
