import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import type { RouterContext } from "@skill-relay/core";

export function createHealthRoutes(ctx: RouterContext) {
  const router = new OpenAPIHono();

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Health"],
      summary: "Health check",
      responses: {
        200: {
          description: "Server is healthy",
          content: {
            "application/json": {
              schema: z.object({
                status: z.string(),
                timestamp: z.string(),
                skills: z.number(),
              }),
            },
          },
        },
      },
    }),
    (c) => {
      return c.json({
        status: "ok",
        timestamp: new Date().toISOString(),
        skills: ctx.skills.list().length,
      }, 200);
    },
  );

  return router;
}
