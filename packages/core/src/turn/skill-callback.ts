import { randomUUID } from "node:crypto";
import { applyConversationReference } from "../activities/activity-factory.js";
import { ACTIVITY_TYPES } from "../schemas/activity.schemas.js";
import type { Activity } from "../schemas/activity.schemas.js";
import type { RouterContext } from "../types.js";
import type { TurnRouter } from "../agents/turn-router.js";
import type { ChannelConnector } from "../channel/channel-connector.js";
import { ROUTER_EVENTS } from "../events/events.js";
import { BOT_TO_BOT_CALLER_PREFIX } from "../utils/constants.js";
import { runTurn } from "./run-turn.js";

export interface SkillCallbackOptions {
  channel: ChannelConnector;
  signal?: AbortSignal;
}

export interface SkillCallbackResult {
  id: string;
}

/**
 * Handles an activity a skill posted back to the root, addressed to a skill conversation id.
 *
 * `endOfConversation` and `event` activities re-enter the root as a turn on the
 * root conversation; everything else is relayed to the user as-is.
 * An id that does not resolve throws `UnknownMappingError` before anything else happens.
 */
export async function handleSkillCallback(
  ctx: RouterContext,
  router: TurnRouter,
  skillConversationId: string,
  activity: Activity,
  options: SkillCallbackOptions,
): Promise<SkillCallbackResult> {
  const mapping = await ctx.conversationIds.resolve(skillConversationId);
  const reference = mapping.conversationReference;

  ctx.events.emit(ROUTER_EVENTS.SKILL_CALLBACK, {
    conversationId: mapping.rootConversationId,
    skillId: mapping.skill.id,
    skillConversationId,
    activityType: activity.type,
  });

  if (activity.type === ACTIVITY_TYPES.END_OF_CONVERSATION || activity.type === ACTIVITY_TYPES.EVENT) {
    const incoming: Activity = {
      ...applyConversationReference(activity, reference, true),
      callerId: `${BOT_TO_BOT_CALLER_PREFIX}${mapping.skill.appId}`,
    };
    await runTurn(ctx, router, incoming, {
      send: (activities) => options.channel.deliver(reference, activities),
      signal: options.signal,
    });
    return { id: activity.id ?? randomUUID() };
  }

  const outgoing = applyConversationReference(activity, reference);
  await options.channel.deliver(reference, [outgoing]);
  return { id: outgoing.id ?? randomUUID() };
}
