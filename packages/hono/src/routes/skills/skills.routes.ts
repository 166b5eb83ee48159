import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import type { ChannelConnector, RouterContext, TurnRouter } from "@skill-relay/core";
import { activitySchema, handleSkillCallback, resourceResponseSchema } from "@skill-relay/core";

const errorSchema = z.object({ error: z.string() });

/**
 * Skill host endpoint: skills post replies for a conversation here, addressed
 * by the skill conversation id the root handed out when it delegated.
 */
export function createSkillCallbackRoutes(ctx: RouterContext, turnRouter: TurnRouter, channel: ChannelConnector) {
  const router = new OpenAPIHono();

  const responses = {
    200: { description: "Activity accepted", content: { "application/json": { schema: resourceResponseSchema } } },
    404: { description: "Unknown skill conversation id", content: { "application/json": { schema: errorSchema } } },
  };

  router.openapi(
    createRoute({
      method: "post",
      path: "/v3/conversations/{conversationId}/activities",
      tags: ["Skills"],
      summary: "Send an activity to a skill conversation",
      request: {
        params: z.object({ conversationId: z.string().min(1).openapi({ example: "7f4ad1d2-0e5b-4c4e-a1b7-7e0c1a0f3c9d" }) }),
        body: { content: { "application/json": { schema: activitySchema } }, required: true },
      },
      responses,
    }),
    async (c) => {
      const { conversationId } = c.req.valid("param");
      const result = await handleSkillCallback(ctx, turnRouter, conversationId, c.req.valid("json"), { channel });
      return c.json(result, 200);
    },
  );

  router.openapi(
    createRoute({
      method: "post",
      path: "/v3/conversations/{conversationId}/activities/{activityId}",
      tags: ["Skills"],
      summary: "Reply to an activity in a skill conversation",
      request: {
        params: z.object({ conversationId: z.string().min(1), activityId: z.string().min(1) }),
        body: { content: { "application/json": { schema: activitySchema } }, required: true },
      },
      responses,
    }),
    async (c) => {
      // Replies are re-addressed to the root activity, so the skill-side activityId is not carried over.
      const { conversationId } = c.req.valid("param");
      const result = await handleSkillCallback(ctx, turnRouter, conversationId, c.req.valid("json"), { channel });
      return c.json(result, 200);
    },
  );

  return router;
}
