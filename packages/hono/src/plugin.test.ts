import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { createRootBotPlugin } from "./plugin.js";
import {
  ConfigurationError,
  MESSAGES,
  activitySchema,
  createMemoryChannel,
  createMemoryStorage,
  resourceResponseSchema,
  turnResponseSchema,
} from "@skill-relay/core";
import type { Activity, FetchLike } from "@skill-relay/core";

const skills = {
  skillHostEndpointUrl: "http://localhost:3978/api/skills",
  skills: [{ id: "EchoSkillBot", appId: "echo-app-id", endpointUrl: "http://localhost:39783/api/messages" }],
};

const errorSchema = z.object({ error: z.string() });

function userMessage(text: string, id = "act-1"): Activity {
  return {
    type: "message",
    id,
    text,
    channelId: "test",
    serviceUrl: "https://channel.test/",
    from: { id: "user-1" },
    recipient: { id: "root-bot" },
    conversation: { id: "conv-1" },
  };
}

function setup() {
  const forwarded: Activity[] = [];
  const bodies: unknown[] = [];
  const fetch: FetchLike = async (_url, init) => {
    const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : null;
    bodies.push(body);
    forwarded.push(activitySchema.parse(body));
    return new Response(null, { status: 200 });
  };
  const channel = createMemoryChannel();
  const plugin = createRootBotPlugin({ appId: "root-app-id", skills, fetch, channel, storage: createMemoryStorage() });
  return { plugin, forwarded, bodies, channel };
}

function post(body: unknown) {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

describe("createRootBotPlugin", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects an invalid skill catalog at startup", () => {
    expect(() => createRootBotPlugin({ skills: { skillHostEndpointUrl: "nope", skills: [] } })).toThrow(ConfigurationError);
  });

  it("reports health", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", skills: 1 });
  });

  it("answers a user message with the turn's replies", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request("/api/messages", post(userMessage("hello")));

    expect(res.status).toBe(200);
    const { activities } = turnResponseSchema.parse(await res.json());
    expect(activities.map((a) => a.text)).toEqual([MESSAGES.IDLE]);
  });

  it("rejects a body that is not an activity", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request("/api/messages", post({ type: "message", text: "no conversation" }));

    expect(res.status).toBe(400);
  });

  it("returns 404 for an unknown skill conversation id", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request(
      "/api/skills/v3/conversations/never-issued/activities",
      post({ ...userMessage("hi"), conversation: { id: "never-issued" } }),
    );

    expect(res.status).toBe(404);
    expect(errorSchema.parse(await res.json())).toEqual({ error: 'Unknown skill conversation id: "never-issued"' });
  });

  it("round-trips a delegation through the skill callback endpoint", async () => {
    const { plugin, forwarded, channel } = setup();

    const activation = await plugin.app.request("/api/messages", post(userMessage("skill")));
    expect(turnResponseSchema.parse(await activation.json()).activities.map((a) => a.text)).toEqual([MESSAGES.CONNECTING]);
    expect(forwarded).toHaveLength(1);
    const skillConversationId = forwarded[0].conversation.id;

    const reply = await plugin.app.request(
      `/api/skills/v3/conversations/${skillConversationId}/activities/act-1`,
      post({
        type: "message",
        id: "skill-msg-1",
        text: "Echo: skill",
        channelId: "test",
        from: { id: "echo-app-id" },
        recipient: { id: "root-app-id" },
        conversation: { id: skillConversationId },
      }),
    );
    expect(reply.status).toBe(200);
    expect(resourceResponseSchema.parse(await reply.json())).toEqual({ id: "skill-msg-1" });

    const end = await plugin.app.request(
      `/api/skills/v3/conversations/${skillConversationId}/activities`,
      post({
        type: "endOfConversation",
        id: "eoc-1",
        code: "completedSuccessfully",
        channelId: "test",
        from: { id: "echo-app-id" },
        recipient: { id: "root-app-id" },
        conversation: { id: skillConversationId },
      }),
    );
    expect(end.status).toBe(200);

    expect(channel.drain("conv-1").map((a) => a.text)).toEqual([
      "Echo: skill",
      "Received endOfConversation.\n\nCode: completedSuccessfully",
      MESSAGES.BACK_IN_ROOT,
    ]);

    const late = await plugin.app.request(
      `/api/skills/v3/conversations/${skillConversationId}/activities`,
      post({ ...userMessage("late"), conversation: { id: skillConversationId } }),
    );
    expect(late.status).toBe(404);
  });

  it("relays activity types and fields it does not model in both directions", async () => {
    const { plugin, forwarded, bodies, channel } = setup();

    await plugin.app.request("/api/messages", post(userMessage("skill")));
    const skillConversationId = forwarded[0].conversation.id;

    const rich = await plugin.app.request(
      "/api/messages",
      post({
        ...userMessage("pick one", "act-2"),
        speak: "<speak>pick one</speak>",
        textFormat: "markdown",
        suggestedActions: { actions: [{ type: "imBack", title: "A", value: "a" }] },
        from: { id: "user-1", aadObjectId: "aad-1" },
      }),
    );
    expect(rich.status).toBe(200);
    expect(bodies[1]).toMatchObject({
      speak: "<speak>pick one</speak>",
      textFormat: "markdown",
      suggestedActions: { actions: [{ type: "imBack", title: "A", value: "a" }] },
      from: { id: "user-1", aadObjectId: "aad-1" },
      conversation: { id: skillConversationId },
    });

    const reaction = await plugin.app.request(
      "/api/messages",
      post({ ...userMessage("", "act-3"), type: "messageReaction", reactionsAdded: [{ type: "like" }] }),
    );
    expect(reaction.status).toBe(200);
    expect(turnResponseSchema.parse(await reaction.json()).activities).toEqual([]);
    expect(bodies[2]).toMatchObject({ type: "messageReaction", id: "act-3", reactionsAdded: [{ type: "like" }] });

    const reply = await plugin.app.request(
      `/api/skills/v3/conversations/${skillConversationId}/activities`,
      post({
        type: "message",
        id: "skill-msg-1",
        text: "Choose",
        channelId: "test",
        from: { id: "echo-app-id" },
        recipient: { id: "root-app-id" },
        conversation: { id: skillConversationId },
        suggestedActions: { actions: [{ type: "imBack", title: "B", value: "b" }] },
      }),
    );
    expect(reply.status).toBe(200);

    const delivered = channel.drain("conv-1");
    expect(delivered).toHaveLength(1);
    expect(delivered[0]).toMatchObject({
      text: "Choose",
      suggestedActions: { actions: [{ type: "imBack", title: "B", value: "b" }] },
      conversation: { id: "conv-1" },
    });
  });

  it("serves the OpenAPI document", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request("/doc");
    const doc = z.object({ openapi: z.string(), paths: z.record(z.unknown()) }).parse(await res.json());

    expect(doc.openapi).toBe("3.1.0");
    expect(Object.keys(doc.paths)).toEqual(
      expect.arrayContaining(["/health", "/api/messages", "/api/skills/v3/conversations/{conversationId}/activities"]),
    );
  });

  it("initializes with a configured catalog", async () => {
    const { plugin } = setup();
    await expect(plugin.initialize()).resolves.toBeUndefined();
  });

  it("answers unknown routes with 404", async () => {
    const { plugin } = setup();

    const res = await plugin.app.request("/nope");

    expect(res.status).toBe(404);
    expect(errorSchema.parse(await res.json())).toEqual({ error: "Not Found" });
  });
});
