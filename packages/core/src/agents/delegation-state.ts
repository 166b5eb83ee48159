import type { ConversationState } from "../storage/conversation-state.js";
import type { TurnContext } from "../turn/turn-context.js";
import { STATE_PROPERTIES } from "../utils/constants.js";

/** Which skill, if any, the conversation is delegated to. Both fields are set, or neither. */
export interface DelegationState {
  activeSkill?: string;
  skillConversationId?: string;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export async function readDelegationState(state: ConversationState, turn: TurnContext): Promise<DelegationState> {
  const activeSkill = nonEmptyString(await state.get(turn, STATE_PROPERTIES.ACTIVE_SKILL));
  const skillConversationId = nonEmptyString(await state.get(turn, STATE_PROPERTIES.SKILL_CONVERSATION_ID, ""));
  return {
    ...(activeSkill ? { activeSkill } : {}),
    ...(skillConversationId ? { skillConversationId } : {}),
  };
}

export function isDelegating(delegation: DelegationState): delegation is Required<DelegationState> {
  return delegation.activeSkill !== undefined && delegation.skillConversationId !== undefined;
}

export async function clearDelegationState(state: ConversationState, turn: TurnContext): Promise<void> {
  await state.delete(turn, STATE_PROPERTIES.ACTIVE_SKILL);
  await state.delete(turn, STATE_PROPERTIES.SKILL_CONVERSATION_ID);
}
