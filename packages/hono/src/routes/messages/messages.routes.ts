import { createRoute } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import type { RouterContext, TurnRouter } from "@skill-relay/core";
import { activitySchema, runTurn, turnResponseSchema } from "@skill-relay/core";

export function createMessagesRoutes(ctx: RouterContext, turnRouter: TurnRouter) {
  const router = new OpenAPIHono();

  router.openapi(
    createRoute({
      method: "post",
      path: "/",
      tags: ["Messages"],
      summary: "Run a turn for an activity from the user channel",
      request: { body: { content: { "application/json": { schema: activitySchema } }, required: true } },
      responses: {
        200: {
          description: "Replies produced during the turn",
          content: { "application/json": { schema: turnResponseSchema } },
        },
      },
    }),
    async (c) => {
      const activity = c.req.valid("json");
      const { activities } = await runTurn(ctx, turnRouter, activity);
      return c.json({ activities }, 200);
    },
  );

  return router;
}
