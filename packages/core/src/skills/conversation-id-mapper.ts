import { randomUUID } from "node:crypto";
import { StateStoreError, UnknownMappingError } from "../errors.js";
import { getConversationReference } from "../activities/activity-factory.js";
import { skillConversationRecordSchema } from "../schemas/skills.schemas.js";
import type { Skill, SkillConversationRecord } from "../schemas/skills.schemas.js";
import type { Activity, ConversationReference } from "../schemas/activity.schemas.js";
import type { StateStorage } from "../storage/interfaces.js";
import { withStateErrors } from "../storage/state-helpers.js";
import { DEFAULTS } from "../utils/constants.js";

/** Who is asking for a skill conversation id, and from which activity */
export interface CallerContext {
  fromBotId: string;
  oAuthScope?: string;
  activity: Activity;
}

/** What a skill conversation id resolves back to */
export interface SkillConversationMapping {
  skillConversationId: string;
  rootConversationId: string;
  skill: Skill;
  conversationReference: ConversationReference;
  fromBotId: string;
  oAuthScope?: string;
  createdAt: string;
}

export interface SkillConversationIdMapper {
  /** Issues a fresh opaque id bound to `(rootConversationId, skill)`. */
  createMapping(rootConversationId: string, skill: Skill, caller: CallerContext): Promise<string>;
  /** Resolves an id issued by `createMapping()`. Throws `UnknownMappingError` for anything else. */
  resolve(skillConversationId: string): Promise<SkillConversationMapping>;
  /** Invalidates an id. Returns `true` if it was live. */
  delete(skillConversationId: string): Promise<boolean>;
}

export interface SkillConversationIdMapperOptions {
  /** Id generator, `randomUUID` by default */
  generateId?: () => string;
}

export function createSkillConversationIdMapper(
  storage: StateStorage,
  options: SkillConversationIdMapperOptions = {},
): SkillConversationIdMapper {
  const generateId = options.generateId ?? randomUUID;

  function storageKey(skillConversationId: string): string {
    return `${DEFAULTS.SKILL_CONVERSATION_KEY_PREFIX}${skillConversationId}`;
  }

  return {
    async createMapping(rootConversationId, skill, caller) {
      const record: SkillConversationRecord = {
        rootConversationId,
        skill: { id: skill.id, appId: skill.appId, endpointUrl: skill.endpointUrl },
        conversationReference: getConversationReference(caller.activity),
        fromBotId: caller.fromBotId,
        ...(caller.oAuthScope ? { oAuthScope: caller.oAuthScope } : {}),
        createdAt: new Date().toISOString(),
      };

      // Create-only writes: an id that is already bound is never handed out again.
      for (let attempt = 1; ; attempt++) {
        const skillConversationId = generateId();
        const key = storageKey(skillConversationId);
        try {
          await withStateErrors(key, "write", () => storage.write(key, record, null));
          return skillConversationId;
        } catch (err) {
          if (err instanceof StateStoreError && err.conflict && attempt < DEFAULTS.MAX_ID_ATTEMPTS) continue;
          throw err;
        }
      }
    },

    async resolve(skillConversationId) {
      if (!skillConversationId) throw new UnknownMappingError(skillConversationId);

      const key = storageKey(skillConversationId);
      const stored = await withStateErrors(key, "read", () => storage.read(key));
      if (!stored) throw new UnknownMappingError(skillConversationId);

      const parsed = skillConversationRecordSchema.safeParse(stored.data);
      if (!parsed.success) throw new UnknownMappingError(skillConversationId);

      return { skillConversationId, ...parsed.data };
    },

    async delete(skillConversationId) {
      const key = storageKey(skillConversationId);
      return withStateErrors(key, "delete", () => storage.delete(key));
    },
  };
}
