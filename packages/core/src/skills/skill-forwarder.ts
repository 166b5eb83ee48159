import { SkillInvocationError } from "../errors.js";
import { getConversationReference } from "../activities/activity-factory.js";
import { BOT_TO_BOT_CALLER_PREFIX } from "../utils/constants.js";
import type { Activity } from "../schemas/activity.schemas.js";
import type { Skill } from "../schemas/skills.schemas.js";
import { anonymousCredentials } from "./credentials.js";
import type { CredentialProvider } from "./credentials.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface InvocationResult {
  status: number;
  /** Response body, parsed as JSON when possible */
  body: unknown;
}

export interface ForwardOptions {
  /** Deadline or cancellation for the call. An abort surfaces as a transport failure. */
  signal?: AbortSignal;
  oAuthScope?: string;
}

export interface SkillForwarder {
  /**
   * POSTs `activity` to the skill, addressed to `skillConversationId`.
   * Throws `SkillInvocationError` on any non-2xx status or transport failure. Never retries.
   */
  forward(
    callerAppId: string,
    skill: Skill,
    callbackUrl: string,
    skillConversationId: string,
    activity: Activity,
    options?: ForwardOptions,
  ): Promise<InvocationResult>;
}

export interface SkillForwarderOptions {
  credentials?: CredentialProvider;
  /** Defaults to the global `fetch` */
  fetch?: FetchLike;
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

export function createSkillForwarder(options: SkillForwarderOptions = {}): SkillForwarder {
  const credentials = options.credentials ?? anonymousCredentials;
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));

  return {
    async forward(callerAppId, skill, callbackUrl, skillConversationId, activity, forwardOptions = {}) {
      // The skill sees its own conversation id and replies to the callback endpoint;
      // relatesTo keeps the root's reference for the round trip.
      const outbound: Activity = {
        ...activity,
        conversation: { ...activity.conversation, id: skillConversationId },
        serviceUrl: callbackUrl,
        recipient: { id: skill.appId, role: "skill" },
        relatesTo: getConversationReference(activity),
        callerId: `${BOT_TO_BOT_CALLER_PREFIX}${callerAppId}`,
      };

      const headers: Record<string, string> = { "Content-Type": "application/json" };

      let status: number;
      let body: unknown;
      try {
        // Token acquisition counts as part of the transport.
        const authorization = await credentials.getAuthorizationHeader({
          fromAppId: callerAppId,
          toAppId: skill.appId,
          oAuthScope: forwardOptions.oAuthScope,
        });
        if (authorization) headers.Authorization = authorization;

        const response = await fetchImpl(skill.endpointUrl, {
          method: "POST",
          headers,
          body: JSON.stringify(outbound),
          signal: forwardOptions.signal,
        });
        status = response.status;
        body = await readBody(response);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[skill-forwarder] POST to skill "${skill.id}" failed: ${message}`);
        throw new SkillInvocationError({ skillId: skill.id, endpoint: skill.endpointUrl, status: null, body: message, cause: err });
      }

      if (!isSuccessStatus(status)) {
        console.warn(`[skill-forwarder] Skill "${skill.id}" responded ${status}`);
        throw new SkillInvocationError({ skillId: skill.id, endpoint: skill.endpointUrl, status, body });
      }

      return { status, body };
    },
  };
}
