import type { RouterEventName } from "./events.js";

export interface RouterEvent {
  type: RouterEventName;
  data: Record<string, unknown>;
  timestamp: number;
}

type EventHandler = (event: RouterEvent) => void | Promise<void>;

/** In-process bus for operator-facing routing events (logs, metrics, transcripts). */
export class RouterEventBus {
  private handlers: EventHandler[] = [];

  subscribe(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  emit(type: RouterEventName, data: Record<string, unknown> = {}): void {
    const event: RouterEvent = { type, data, timestamp: Date.now() };
    for (const handler of this.handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => console.error("[router-events] handler error:", err));
        }
      } catch (err) {
        console.error("[router-events] handler error:", err);
      }
    }
  }
}
