import type { Activity } from "../schemas/activity.schemas.js";
import type { RouterContext } from "../types.js";
import type { TurnRouter } from "../agents/turn-router.js";
import { handleTurnError } from "../agents/error-recovery.js";
import { ROUTER_EVENTS } from "../events/events.js";
import { TurnContext } from "./turn-context.js";
import type { SendActivitiesHandler } from "./turn-context.js";

export interface RunTurnOptions {
  /** Where replies go. When omitted they are only collected into the result. */
  send?: SendActivitiesHandler;
  /** Cancels outbound skill calls. Defaults to a `forwardTimeoutMs` deadline when configured. */
  signal?: AbortSignal;
}

export interface TurnResult {
  /** Replies delivered during the turn, in order */
  activities: Activity[];
  /** Whether the turn ended in error recovery */
  failed: boolean;
}

function describe(activity: Activity): string {
  const text = activity.text ? ` "${activity.text}"` : "";
  const code = activity.code ? ` (${activity.code})` : "";
  return `${activity.type}${text}${code}`;
}

/** Runs one turn through the router. Errors never escape: they go through error recovery. */
export async function runTurn(
  ctx: RouterContext,
  router: TurnRouter,
  activity: Activity,
  options: RunTurnOptions = {},
): Promise<TurnResult> {
  const conversationId = activity.conversation.id;
  const delivered: Activity[] = [];
  const signal = options.signal
    ?? (ctx.config.forwardTimeoutMs ? AbortSignal.timeout(ctx.config.forwardTimeoutMs) : undefined);

  if (ctx.config.logActivities) {
    console.log(`[root-bot] <- ${conversationId}: ${describe(activity)}`);
  }

  const turn = new TurnContext(activity, {
    signal,
    async send(activities) {
      if (ctx.config.logActivities) {
        for (const a of activities) console.log(`[root-bot] -> ${conversationId}: ${describe(a)}`);
      }
      if (options.send) await options.send(activities);
      delivered.push(...activities);
    },
    async onTrace(trace) {
      ctx.events.emit(ROUTER_EVENTS.TRACE, { conversationId, name: trace.name ?? null, label: trace.label ?? null, value: trace.value ?? null });
      await ctx.config.onTrace?.(trace);
    },
  });

  ctx.events.emit(ROUTER_EVENTS.TURN_START, { conversationId, activityType: activity.type });

  let failed = false;
  try {
    await router.onTurn(turn);
  } catch (err) {
    failed = true;
    await handleTurnError(ctx, turn, err);
  }

  ctx.events.emit(ROUTER_EVENTS.TURN_END, { conversationId, failed, replies: delivered.length });
  return { activities: delivered, failed };
}
