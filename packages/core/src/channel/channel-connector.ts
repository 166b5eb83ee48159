import type { Activity, ConversationReference } from "../schemas/activity.schemas.js";

/**
 * Sends activities to a user conversation outside of a request/response turn,
 * e.g. messages a skill posts back to the root while it is delegating.
 */
export interface ChannelConnector {
  deliver(reference: ConversationReference, activities: Activity[]): Promise<void>;
}

/** A channel that keeps delivered activities in process, per conversation id */
export interface MemoryChannel extends ChannelConnector {
  /** Activities delivered to a conversation and not yet drained */
  pending(conversationId: string): Activity[];
  /** Returns and forgets the pending activities of a conversation */
  drain(conversationId: string): Activity[];
}

export function createMemoryChannel(): MemoryChannel {
  const outbox = new Map<string, Activity[]>();

  return {
    async deliver(reference, activities) {
      const id = reference.conversation.id;
      const queue = outbox.get(id) ?? [];
      queue.push(...activities);
      outbox.set(id, queue);
    },

    pending(conversationId) {
      return [...(outbox.get(conversationId) ?? [])];
    },

    drain(conversationId) {
      const queue = outbox.get(conversationId) ?? [];
      outbox.delete(conversationId);
      return queue;
    },
  };
}
