import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { handleSkillCallback } from "./skill-callback.js";
import { createTurnRouter } from "../agents/turn-router.js";
import { createMemoryChannel } from "../channel/channel-connector.js";
import { UnknownMappingError } from "../errors.js";
import { MESSAGES } from "../utils/constants.js";
import { createStubFetch, createTestContext, skillActivity, userMessage } from "../testing/fixtures.js";
import { runTurn } from "./run-turn.js";
import type { TurnContext } from "./turn-context.js";

async function delegated() {
  const stub = createStubFetch();
  const ctx = createTestContext({ fetch: stub.fetch });
  const router = createTurnRouter(ctx);
  const channel = createMemoryChannel();
  await runTurn(ctx, router, userMessage("skill"));
  const skillConversationId = stub.calls[0].activity.conversation.id;
  return { stub, ctx, router, channel, skillConversationId };
}

describe("handleSkillCallback", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("relays skill messages to the user's conversation", async () => {
    const { ctx, router, channel, skillConversationId } = await delegated();

    const result = await handleSkillCallback(
      ctx,
      router,
      skillConversationId,
      skillActivity(skillConversationId, { id: "skill-msg-1", text: "Echo: skill" }),
      { channel },
    );

    expect(result).toEqual({ id: "skill-msg-1" });
    const delivered = channel.drain("conv-1");
    expect(delivered).toHaveLength(1);
    expect(delivered[0]).toMatchObject({
      type: "message",
      text: "Echo: skill",
      conversation: { id: "conv-1" },
      channelId: "test",
      serviceUrl: "https://channel.test/",
      from: { id: "root-bot" },
      recipient: { id: "user-1" },
      replyToId: "act-1",
    });
  });

  it("runs an endOfConversation through the root's turn and delivers the replies", async () => {
    const { ctx, router, channel, skillConversationId } = await delegated();

    const result = await handleSkillCallback(
      ctx,
      router,
      skillConversationId,
      skillActivity(skillConversationId, { type: "endOfConversation", id: "eoc-1", code: "completedSuccessfully" }),
      { channel },
    );

    expect(result).toEqual({ id: "eoc-1" });
    expect(channel.drain("conv-1").map((a) => a.text)).toEqual([
      "Received endOfConversation.\n\nCode: completedSuccessfully",
      MESSAGES.BACK_IN_ROOT,
    ]);
    expect((await ctx.storage.state.read("test/conversations/conv-1"))?.data).toEqual({});
    await expect(ctx.conversationIds.resolve(skillConversationId)).rejects.toBeInstanceOf(UnknownMappingError);
  });

  it("marks re-entering activities as sent by the skill", async () => {
    const { ctx, channel, skillConversationId } = await delegated();
    const seen: string[] = [];
    const router = {
      async onTurn(turn: TurnContext) {
        seen.push(`${turn.activity.conversation.id} ${turn.activity.callerId ?? ""}`);
      },
    };

    await handleSkillCallback(ctx, router, skillConversationId, skillActivity(skillConversationId, { type: "event", name: "progress" }), {
      channel,
    });

    expect(seen).toEqual(["conv-1 urn:botframework:aadappid:echo-app-id"]);
  });

  it("rejects an unknown skill conversation id without side effects", async () => {
    const { ctx, router, channel } = await delegated();

    await expect(
      handleSkillCallback(ctx, router, "not-issued", skillActivity("not-issued", { text: "hi" }), { channel }),
    ).rejects.toBeInstanceOf(UnknownMappingError);
    expect(channel.pending("conv-1")).toEqual([]);
  });

  it("rejects callbacks after the skill conversation ended", async () => {
    const { ctx, router, channel, skillConversationId } = await delegated();
    await handleSkillCallback(ctx, router, skillConversationId, skillActivity(skillConversationId, { type: "endOfConversation" }), {
      channel,
    });

    await expect(
      handleSkillCallback(ctx, router, skillConversationId, skillActivity(skillConversationId, { text: "late" }), { channel }),
    ).rejects.toBeInstanceOf(UnknownMappingError);
  });
});

describe("runTurn", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("emits turn events and collects replies", async () => {
    const ctx = createTestContext({ fetch: createStubFetch().fetch });
    const router = createTurnRouter(ctx);
    const types: string[] = [];
    ctx.events.subscribe((event) => {
      types.push(event.type);
    });
    const sent: string[] = [];

    const result = await runTurn(ctx, router, userMessage("hello"), {
      send: async (activities) => {
        sent.push(...activities.map((a) => a.text ?? ""));
      },
    });

    expect(result).toMatchObject({ failed: false });
    expect(sent).toEqual([MESSAGES.IDLE]);
    expect(result.activities.map((a) => a.text)).toEqual([MESSAGES.IDLE]);
    expect(types).toEqual(["turn:start", "turn:end"]);
  });

  it("logs inbound and outbound activities when asked", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const ctx = createTestContext({ fetch: createStubFetch().fetch, logActivities: true });

    await runTurn(ctx, createTurnRouter(ctx), userMessage("hello"));

    expect(log.mock.calls.map((args) => args[0])).toEqual([
      '[root-bot] <- conv-1: message "hello"',
      `[root-bot] -> conv-1: message "${MESSAGES.IDLE}"`,
    ]);
  });

  it("gives the turn a deadline when forwardTimeoutMs is set", async () => {
    let signal: AbortSignal | undefined;
    const ctx = createTestContext({ fetch: createStubFetch().fetch, forwardTimeoutMs: 5_000 });
    const router = {
      async onTurn(turn: TurnContext) {
        signal = turn.signal;
      },
    };

    await runTurn(ctx, router, userMessage("hello"));

    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(false);
  });
});
