import {
  applyConversationReference,
  createMessageActivity,
  createTraceActivity,
  getConversationReference,
} from "../activities/activity-factory.js";
import type { Activity, ActivityInput, ConversationReference } from "../schemas/activity.schemas.js";

/** Delivers replies produced during a turn to the user channel */
export type SendActivitiesHandler = (activities: Activity[]) => Promise<void>;

/** Receives trace activities. Traces are operator diagnostics and never reach the user. */
export type TraceHandler = (trace: Activity) => void | Promise<void>;

export interface TurnContextOptions {
  send: SendActivitiesHandler;
  onTrace?: TraceHandler;
  /** Cancels outbound skill calls made during this turn */
  signal?: AbortSignal;
}

/** Everything one turn sees: the inbound activity plus a way to reply. */
export class TurnContext {
  readonly activity: Activity;
  readonly signal?: AbortSignal;
  private readonly send: SendActivitiesHandler;
  private readonly onTrace?: TraceHandler;
  private _responded = false;

  constructor(activity: Activity, options: TurnContextOptions) {
    this.activity = activity;
    this.signal = options.signal;
    this.send = options.send;
    this.onTrace = options.onTrace;
  }

  /** Whether at least one reply was delivered during this turn */
  get responded(): boolean {
    return this._responded;
  }

  get conversationReference(): ConversationReference {
    return getConversationReference(this.activity);
  }

  async sendActivity(activityOrText: string | ActivityInput): Promise<Activity> {
    const partial = typeof activityOrText === "string" ? createMessageActivity(activityOrText) : activityOrText;
    const outgoing = applyConversationReference(partial, this.conversationReference);
    await this.send([outgoing]);
    this._responded = true;
    return outgoing;
  }

  async sendTraceActivity(name: string, value?: unknown, valueType?: string, label?: string): Promise<void> {
    if (!this.onTrace) return;
    const trace = applyConversationReference(createTraceActivity(name, value, valueType, label), this.conversationReference);
    await this.onTrace(trace);
  }
}
