import { z } from "zod";
import { conversationReferenceSchema } from "./activity.schemas.js";

export const skillSchema = z.object({
  id: z.string().min(1),
  /** App identity of the skill, used when negotiating outbound credentials */
  appId: z.string().min(1),
  endpointUrl: z.string().url(),
});

export const skillsConfigurationSchema = z.object({
  /** Callback base URL every skill uses to reach back to the root */
  skillHostEndpointUrl: z.string().url(),
  skills: z.array(skillSchema),
});

/** Persisted form of a skill conversation id mapping */
export const skillConversationRecordSchema = z.object({
  rootConversationId: z.string().min(1),
  skill: skillSchema,
  conversationReference: conversationReferenceSchema,
  fromBotId: z.string(),
  oAuthScope: z.string().optional(),
  createdAt: z.string(),
});

export type Skill = z.infer<typeof skillSchema>;
export type SkillsConfiguration = z.infer<typeof skillsConfigurationSchema>;
export type SkillConversationRecord = z.infer<typeof skillConversationRecordSchema>;
