import { ACTIVITY_TYPES } from "../schemas/activity.schemas.js";
import type {
  Activity,
  ActivityInput,
  ConversationReference,
  EndOfConversationCode,
  InputHint,
} from "../schemas/activity.schemas.js";

export function createMessageActivity(text: string, inputHint?: InputHint): ActivityInput {
  return { type: ACTIVITY_TYPES.MESSAGE, text, ...(inputHint ? { inputHint } : {}) };
}

export function createEndOfConversationActivity(code: EndOfConversationCode): ActivityInput {
  return { type: ACTIVITY_TYPES.END_OF_CONVERSATION, code };
}

export function createTraceActivity(name: string, value?: unknown, valueType?: string, label?: string): ActivityInput {
  return {
    type: ACTIVITY_TYPES.TRACE,
    name,
    timestamp: new Date().toISOString(),
    ...(value !== undefined ? { value } : {}),
    ...(valueType ? { valueType } : {}),
    ...(label ? { label } : {}),
  };
}

/** Captures where an activity came from so that replies can be addressed back to it */
export function getConversationReference(activity: Activity): ConversationReference {
  return {
    ...(activity.id ? { activityId: activity.id } : {}),
    user: activity.from,
    bot: activity.recipient,
    conversation: activity.conversation,
    channelId: activity.channelId,
    ...(activity.serviceUrl ? { serviceUrl: activity.serviceUrl } : {}),
    ...(activity.locale ? { locale: activity.locale } : {}),
  };
}

/**
 * Addresses an activity to a conversation.
 *
 * Outgoing activities (the default) are sent by the bot to the user and reply
 * to the referenced activity. Incoming activities are rewritten as if the user
 * had sent them to the bot, which is how skill callbacks re-enter the root.
 */
export function applyConversationReference(
  activity: ActivityInput,
  reference: ConversationReference,
  isIncoming = false,
): Activity {
  const base = {
    ...activity,
    type: activity.type ?? ACTIVITY_TYPES.MESSAGE,
    channelId: reference.channelId,
    conversation: reference.conversation,
    ...(reference.serviceUrl ? { serviceUrl: reference.serviceUrl } : {}),
    ...(reference.locale && !activity.locale ? { locale: reference.locale } : {}),
  };

  if (isIncoming) {
    return {
      ...base,
      from: reference.user,
      recipient: reference.bot,
      ...(reference.activityId ? { id: reference.activityId } : {}),
    };
  }

  return {
    ...base,
    from: reference.bot,
    recipient: reference.user,
    ...(reference.activityId ? { replyToId: reference.activityId } : {}),
  };
}
