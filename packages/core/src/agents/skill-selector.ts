import type { Activity } from "../schemas/activity.schemas.js";
import type { SkillRegistry } from "../registry/skill-registry.js";

/**
 * Decides whether a message handled locally should start a delegation.
 * Returns the id of the skill to activate, or `undefined` to answer locally.
 */
export type SkillSelector = (
  activity: Activity,
  skills: SkillRegistry,
) => string | undefined | Promise<string | undefined>;

/** Activates `skillId` whenever the message text contains `keyword` */
export function createKeywordSelector(keyword: string, skillId: string): SkillSelector {
  return (activity) => (activity.text?.includes(keyword) ? skillId : undefined);
}
