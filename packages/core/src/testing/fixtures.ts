import { activitySchema } from "../schemas/activity.schemas.js";
import type { Activity } from "../schemas/activity.schemas.js";
import type { SkillsConfiguration } from "../schemas/skills.schemas.js";
import type { FetchLike } from "../skills/skill-forwarder.js";
import type { CoreConfig, RouterContext } from "../types.js";
import { createRouterContext } from "../context.js";
import { createMemoryStorage } from "../storage/in-memory/index.js";
import { TurnContext } from "../turn/turn-context.js";

// Shared test data for the core test suites.

export const ROOT_APP_ID = "root-app-id";
export const SKILL_HOST_URL = "http://localhost:3978/api/skills";
export const ECHO_SKILL = { id: "EchoSkillBot", appId: "echo-app-id", endpointUrl: "http://localhost:39783/api/messages" };

export const skillsConfig: SkillsConfiguration = {
  skillHostEndpointUrl: SKILL_HOST_URL,
  skills: [ECHO_SKILL],
};

/** A message from `user-1` to the root bot in `conversationId` */
export function userMessage(text: string, conversationId = "conv-1", id = "act-1"): Activity {
  return {
    type: "message",
    id,
    text,
    channelId: "test",
    serviceUrl: "https://channel.test/",
    from: { id: "user-1", name: "User" },
    recipient: { id: "root-bot", name: "Root" },
    conversation: { id: conversationId },
  };
}

/** An activity as a skill would post it back on `skillConversationId` */
export function skillActivity(skillConversationId: string, fields: Partial<Activity>): Activity {
  return {
    type: "message",
    channelId: "test",
    serviceUrl: "http://localhost:39783/",
    from: { id: ECHO_SKILL.appId, role: "skill" },
    recipient: { id: ROOT_APP_ID },
    conversation: { id: skillConversationId },
    ...fields,
  };
}

export function testTurn(activity: Activity): TurnContext {
  return new TurnContext(activity, { send: async () => {} });
}

export interface RecordedCall {
  url: string;
  headers: Headers;
  /** The JSON body exactly as it went over the wire */
  body: unknown;
  activity: Activity;
}

export interface StubFetch {
  fetch: FetchLike;
  calls: RecordedCall[];
}

/** In-process stand-in for a skill endpoint. `respond` sees each posted activity. */
export function createStubFetch(
  respond: (activity: Activity) => Response | Promise<Response> = () => new Response(null, { status: 200 }),
): StubFetch {
  const calls: RecordedCall[] = [];
  return {
    calls,
    fetch: async (url, init) => {
      const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : null;
      const activity = activitySchema.parse(body);
      calls.push({ url, headers: new Headers(init.headers), body, activity });
      return respond(activity);
    },
  };
}

export function createTestContext(overrides: Partial<CoreConfig> = {}): RouterContext {
  return createRouterContext({
    appId: ROOT_APP_ID,
    skills: skillsConfig,
    storage: createMemoryStorage(),
    ...overrides,
  });
}
