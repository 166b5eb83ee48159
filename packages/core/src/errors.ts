/** A skill conversation id that was never issued, or has been invalidated. Callers must reject, not retry. */
export class UnknownMappingError extends Error {
  readonly skillConversationId: string;

  constructor(skillConversationId: string) {
    super(`Unknown skill conversation id: "${skillConversationId}"`);
    this.name = "UnknownMappingError";
    this.skillConversationId = skillConversationId;
  }
}

export interface SkillInvocationDetails {
  skillId: string;
  endpoint: string;
  /** HTTP status, or `null` when the call never produced a response (network failure, abort) */
  status: number | null;
  body: unknown;
  cause?: unknown;
}

export class SkillInvocationError extends Error {
  readonly skillId: string;
  readonly endpoint: string;
  readonly status: number | null;
  readonly body: unknown;

  constructor(details: SkillInvocationDetails) {
    const reason = details.status === null ? "transport failure" : `status is ${details.status}`;
    super(`Error invoking the skill id: "${details.skillId}" at "${details.endpoint}" (${reason})`, { cause: details.cause });
    this.name = "SkillInvocationError";
    this.skillId = details.skillId;
    this.endpoint = details.endpoint;
    this.status = details.status;
    this.body = details.body;
  }

  /** True when no response was received */
  get isTransportFailure(): boolean {
    return this.status === null;
  }
}

export type StateOperation = "read" | "write" | "delete";

export class StateStoreError extends Error {
  readonly key: string;
  readonly operation: StateOperation;
  /** Set when a write lost an optimistic-concurrency check */
  readonly conflict: boolean;

  constructor(key: string, operation: StateOperation, options: { conflict?: boolean; cause?: unknown } = {}) {
    const detail = options.conflict
      ? "eTag conflict"
      : options.cause instanceof Error ? options.cause.message : "storage failure";
    super(`State ${operation} failed for "${key}": ${detail}`, { cause: options.cause });
    this.name = "StateStoreError";
    this.key = key;
    this.operation = operation;
    this.conflict = options.conflict ?? false;
  }
}

/** Invalid or incomplete skill configuration. Raised at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
