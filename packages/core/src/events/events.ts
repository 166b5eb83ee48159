/** Event names emitted on the RouterEventBus */
export const ROUTER_EVENTS = {
  TURN_START: "turn:start",
  TURN_END: "turn:end",
  DELEGATE_START: "delegate:start",
  DELEGATE_END: "delegate:end",
  SKILL_FORWARD: "skill:forward",
  SKILL_FORWARD_FAILED: "skill:forward-failed",
  SKILL_CALLBACK: "skill:callback",
  TURN_ERROR: "turn:error",
  TRACE: "trace",
} as const;

export type RouterEventName = (typeof ROUTER_EVENTS)[keyof typeof ROUTER_EVENTS];
