// ── State Storage ──

/** A stored state record and the eTag of the write that produced it */
export interface StoredState {
  data: Record<string, unknown>;
  eTag: string;
}

/**
 * Durable key/value storage backing conversation state and skill conversation ids.
 *
 * Writes are atomic per key and carry an optimistic-concurrency check:
 * - `expectedETag` omitted: unconditional write
 * - `expectedETag: null`: create only, fails when the key already exists
 * - `expectedETag: "<etag>"`: fails unless the stored eTag matches
 *
 * A failed check throws `StateStoreError` with `conflict: true`.
 * Return `null` from `read()` when a key is not found (do not throw).
 *
 * @example
 * ```ts
 * class RedisStateStorage implements StateStorage {
 *   async read(key: string) {
 *     const raw = await redis.get(key);
 *     return raw ? JSON.parse(raw) : null;
 *   }
 *   async write(key: string, data: Record<string, unknown>, expectedETag?: string | null) {
 *     // WATCH key, compare eTag, MULTI/SET/EXEC
 *   }
 *   // ...
 * }
 * ```
 */
export interface StateStorage {
  /** Read a record. Returns `null` if the key does not exist. */
  read(key: string): Promise<StoredState | null>;
  /** Write a record, replacing any previous value. Returns the stored record with its new eTag. */
  write(key: string, data: Record<string, unknown>, expectedETag?: string | null): Promise<StoredState>;
  /** Delete a record. Returns `true` if it existed. */
  delete(key: string): Promise<boolean>;
}

// ── Combined Storage Provider ──

/**
 * Aggregates the stores the router needs.
 *
 * Both may point at the same `StateStorage`; keys never collide because skill
 * conversation ids are stored under their own prefix.
 */
export interface StorageProvider {
  /** Per-conversation state (delegation record and anything local turn logic keeps) */
  state: StateStorage;
  /** Skill conversation id mappings */
  skillConversations: StateStorage;
}
