import {
  applyConversationReference,
  createEndOfConversationActivity,
  createMessageActivity,
} from "../activities/activity-factory.js";
import { END_OF_CONVERSATION_CODES, INPUT_HINTS } from "../schemas/activity.schemas.js";
import type { RouterContext } from "../types.js";
import type { TurnContext } from "../turn/turn-context.js";
import { ROUTER_EVENTS } from "../events/events.js";
import { DEFAULTS, ERROR_TRACE, MESSAGES } from "../utils/constants.js";
import { readDelegationState } from "./delegation-state.js";
import type { DelegationState } from "./delegation-state.js";

async function attempt(step: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(`[error-recovery] ${step} failed:`, err);
  }
}

async function sendErrorMessage(turn: TurnContext): Promise<void> {
  await turn.sendActivity(createMessageActivity(MESSAGES.ERROR, INPUT_HINTS.IGNORING_INPUT));
  await turn.sendActivity(createMessageActivity(MESSAGES.ERROR_HINT, INPUT_HINTS.EXPECTING_INPUT));
}

/** Tells the active skill the root gave up on the conversation so it can release its resources. */
async function endSkillConversation(ctx: RouterContext, turn: TurnContext, delegation: DelegationState): Promise<void> {
  if (!delegation.activeSkill) return;

  const skill = ctx.skills.require(delegation.activeSkill);
  const skillConversationId = delegation.skillConversationId
    ?? await ctx.conversationIds.createMapping(turn.activity.conversation.id, skill, {
      fromBotId: ctx.appId,
      oAuthScope: ctx.config.oAuthScope,
      activity: turn.activity,
    });

  const endOfConversation = applyConversationReference(
    createEndOfConversationActivity(END_OF_CONVERSATION_CODES.ROOT_SKILL_ERROR),
    turn.conversationReference,
    true,
  );

  // Fresh deadline: the turn's own signal may already be aborted.
  try {
    await ctx.forwarder.forward(ctx.appId, skill, ctx.skills.skillHostEndpointUrl, skillConversationId, endOfConversation, {
      signal: AbortSignal.timeout(DEFAULTS.RECOVERY_TIMEOUT_MS),
      oAuthScope: ctx.config.oAuthScope,
    });
  } finally {
    await ctx.conversationIds.delete(skillConversationId).catch((err: unknown) => {
      console.error(`[error-recovery] Failed to invalidate skill conversation ${skillConversationId}:`, err);
    });
  }
}

/**
 * Handles an error that escaped a turn.
 *
 * Each step runs even when the previous one failed, and nothing is re-raised:
 * 1. tell the user something went wrong, and emit the error detail as a trace for operators
 * 2. send `endOfConversation` (`rootSkillError`) to the active skill, if any
 * 3. delete all persisted state for the conversation
 */
export async function handleTurnError(ctx: RouterContext, turn: TurnContext, error: unknown): Promise<void> {
  const err = error instanceof Error ? error : new Error(String(error));
  const conversationId = turn.activity.conversation.id;

  console.error(`[error-recovery] Unhandled error in conversation ${conversationId}:`, err);
  ctx.events.emit(ROUTER_EVENTS.TURN_ERROR, { conversationId, name: err.name, error: err.message });

  await attempt("Sending the error message", () => sendErrorMessage(turn));
  await attempt("Sending the error trace", () =>
    turn.sendTraceActivity(ERROR_TRACE.NAME, err.message, ERROR_TRACE.VALUE_TYPE, ERROR_TRACE.LABEL),
  );

  await attempt("Ending the skill conversation", async () => {
    const delegation = await readDelegationState(ctx.state, turn);
    await endSkillConversation(ctx, turn, delegation);
  });

  await attempt("Clearing conversation state", () => ctx.state.deleteAll(turn));
}
