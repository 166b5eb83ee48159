import { ACTIVITY_TYPES } from "../schemas/activity.schemas.js";
import type { Skill } from "../schemas/skills.schemas.js";
import type { RouterContext } from "../types.js";
import type { TurnContext } from "../turn/turn-context.js";
import { ConfigurationError } from "../errors.js";
import { ROUTER_EVENTS } from "../events/events.js";
import { DEFAULTS, MESSAGES, STATE_PROPERTIES } from "../utils/constants.js";
import { clearDelegationState, isDelegating, readDelegationState } from "./delegation-state.js";
import { createKeywordSelector } from "./skill-selector.js";
import type { SkillSelector } from "./skill-selector.js";

export interface RouterMessages {
  connecting: string;
  idle: string;
  backInRoot: string;
  welcome: string;
}

export interface TurnRouterConfig {
  /** Activation policy for local turns. Defaults to `"skill"` in the text → `EchoSkillBot`. */
  selectSkill?: SkillSelector;
  messages?: Partial<RouterMessages>;
}

export interface TurnRouter {
  /** Handles one turn. Errors propagate; the turn runner hands them to error recovery. */
  onTurn(turn: TurnContext): Promise<void>;
}

const DEFAULT_MESSAGES: RouterMessages = {
  connecting: MESSAGES.CONNECTING,
  idle: MESSAGES.IDLE,
  backInRoot: MESSAGES.BACK_IN_ROOT,
  welcome: MESSAGES.WELCOME,
};

/** Builds the user-facing summary of an `endOfConversation` received from a skill */
export function summarizeEndOfConversation(code: string | undefined, text: string | undefined, value: unknown): string {
  let summary = `Received ${ACTIVITY_TYPES.END_OF_CONVERSATION}.\n\nCode: ${code ?? ""}`;
  if (text?.trim()) {
    summary += `\n\nText: ${text}`;
  }
  if (value !== undefined && value !== null) {
    summary += `\n\nValue: ${JSON.stringify(value)}`;
  }
  return summary;
}

/**
 * The root bot's per-conversation state machine.
 *
 * Idle: messages run local turn logic, which may activate a skill.
 * Delegating: every activity except `endOfConversation` is forwarded verbatim
 * to the active skill; `endOfConversation` returns the conversation to Idle.
 */
export function createTurnRouter(ctx: RouterContext, config: TurnRouterConfig = {}): TurnRouter {
  const messages: RouterMessages = { ...DEFAULT_MESSAGES, ...config.messages };

  let selectSkill = config.selectSkill;
  if (!selectSkill) {
    if (!ctx.skills.has(DEFAULTS.TARGET_SKILL_ID)) {
      throw new ConfigurationError(
        `Default skill "${DEFAULTS.TARGET_SKILL_ID}" is not registered; register it or pass a selectSkill policy`,
      );
    }
    selectSkill = createKeywordSelector(DEFAULTS.SKILL_TRIGGER, DEFAULTS.TARGET_SKILL_ID);
  }
  const select = selectSkill;

  async function sendToSkill(turn: TurnContext, skill: Skill, skillConversationId: string) {
    // Always persist before calling the skill: it may call back into this
    // conversation before the POST returns and must see current state.
    await ctx.state.saveChanges(turn, true);

    const conversationId = turn.activity.conversation.id;
    ctx.events.emit(ROUTER_EVENTS.SKILL_FORWARD, {
      conversationId,
      skillId: skill.id,
      skillConversationId,
      activityType: turn.activity.type,
    });

    try {
      await ctx.forwarder.forward(
        ctx.appId,
        skill,
        ctx.skills.skillHostEndpointUrl,
        skillConversationId,
        turn.activity,
        { signal: turn.signal, oAuthScope: ctx.config.oAuthScope },
      );
    } catch (err) {
      ctx.events.emit(ROUTER_EVENTS.SKILL_FORWARD_FAILED, {
        conversationId,
        skillId: skill.id,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  async function onMessage(turn: TurnContext) {
    const skillId = await select(turn.activity, ctx.skills);

    if (skillId) {
      const skill = ctx.skills.require(skillId);
      const conversationId = turn.activity.conversation.id;

      await turn.sendActivity(messages.connecting);

      await ctx.state.set(turn, STATE_PROPERTIES.ACTIVE_SKILL, skill.id);
      const skillConversationId = await ctx.conversationIds.createMapping(conversationId, skill, {
        fromBotId: ctx.appId,
        oAuthScope: ctx.config.oAuthScope,
        activity: turn.activity,
      });
      await ctx.state.set(turn, STATE_PROPERTIES.SKILL_CONVERSATION_ID, skillConversationId);

      console.log(`[root-bot] Conversation ${conversationId} delegated to skill "${skill.id}"`);
      ctx.events.emit(ROUTER_EVENTS.DELEGATE_START, { conversationId, skillId: skill.id, skillConversationId });

      await sendToSkill(turn, skill, skillConversationId);
      return;
    }

    await turn.sendActivity(messages.idle);
    await ctx.state.saveChanges(turn, true);
  }

  async function onEndOfConversation(turn: TurnContext) {
    const conversationId = turn.activity.conversation.id;
    const { activeSkill, skillConversationId } = await readDelegationState(ctx.state, turn);

    await clearDelegationState(ctx.state, turn);
    if (skillConversationId) {
      await ctx.conversationIds.delete(skillConversationId).catch((err: unknown) => {
        console.warn(`[root-bot] Failed to invalidate skill conversation ${skillConversationId}:`, err);
        return false;
      });
    }

    const { code, text, value } = turn.activity;
    await turn.sendActivity(summarizeEndOfConversation(code, text, value));
    await turn.sendActivity(messages.backInRoot);

    await ctx.state.saveChanges(turn);

    if (activeSkill) {
      console.log(`[root-bot] Skill "${activeSkill}" ended conversation ${conversationId} (${code ?? "no code"})`);
    }
    ctx.events.emit(ROUTER_EVENTS.DELEGATE_END, { conversationId, skillId: activeSkill ?? null, code: code ?? null });
  }

  async function onMembersAdded(turn: TurnContext) {
    for (const member of turn.activity.membersAdded ?? []) {
      if (member.id !== turn.activity.recipient.id) {
        await turn.sendActivity(messages.welcome);
      }
    }
  }

  return {
    async onTurn(turn) {
      // Forward everything except endOfConversation while a skill is active.
      if (turn.activity.type !== ACTIVITY_TYPES.END_OF_CONVERSATION) {
        const delegation = await readDelegationState(ctx.state, turn);
        if (isDelegating(delegation)) {
          const skill = ctx.skills.require(delegation.activeSkill);
          await sendToSkill(turn, skill, delegation.skillConversationId);
          return;
        }
      }

      switch (turn.activity.type) {
        case ACTIVITY_TYPES.MESSAGE:
          await onMessage(turn);
          break;
        case ACTIVITY_TYPES.END_OF_CONVERSATION:
          await onEndOfConversation(turn);
          break;
        case ACTIVITY_TYPES.CONVERSATION_UPDATE:
          await onMembersAdded(turn);
          break;
        default:
          break;
      }

      // Save any state changes that might have occurred during the turn.
      await ctx.state.saveChanges(turn, false);
    },
  };
}
