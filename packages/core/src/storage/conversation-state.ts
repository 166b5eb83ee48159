import type { TurnContext } from "../turn/turn-context.js";
import type { StateStorage } from "./interfaces.js";
import { withStateErrors } from "./state-helpers.js";

interface CachedState {
  data: Record<string, unknown>;
  /** Serialized snapshot of `data` as last read or written */
  hash: string;
  /** eTag of the stored record, `null` when nothing has been stored yet */
  eTag: string | null;
}

function hashState(data: Record<string, unknown>): string {
  return JSON.stringify(data);
}

/**
 * Per-conversation state, keyed by `<channelId>/conversations/<conversationId>`.
 *
 * The record is read once per turn and cached against the `TurnContext`;
 * `get`/`set`/`delete` work on that cache and nothing reaches storage until
 * `saveChanges()`. Writes carry the eTag that was read, so a concurrent turn
 * that wrote in between surfaces as a `StateStoreError` conflict instead of a
 * lost update.
 */
export class ConversationState {
  private readonly storage: StateStorage;
  private readonly cache = new WeakMap<TurnContext, CachedState>();

  constructor(storage: StateStorage) {
    this.storage = storage;
  }

  getStorageKey(turn: TurnContext): string {
    const { channelId, conversation } = turn.activity;
    return `${channelId}/conversations/${conversation.id}`;
  }

  /** Loads the record into the turn cache. `force` re-reads even when already cached. */
  async load(turn: TurnContext, force = false): Promise<void> {
    await this.loaded(turn, force);
  }

  /** Returns a property value, or `defaultValue` when it is not set. */
  async get(turn: TurnContext, name: string, defaultValue?: unknown): Promise<unknown> {
    const cached = await this.loaded(turn);
    return Object.prototype.hasOwnProperty.call(cached.data, name) ? cached.data[name] : defaultValue;
  }

  async set(turn: TurnContext, name: string, value: unknown): Promise<void> {
    const cached = await this.loaded(turn);
    cached.data[name] = value;
  }

  async delete(turn: TurnContext, name: string): Promise<void> {
    const cached = await this.loaded(turn);
    delete cached.data[name];
  }

  /** Clears every property in the turn cache. Storage is untouched until the next save. */
  async clear(turn: TurnContext): Promise<void> {
    const cached = await this.loaded(turn);
    cached.data = {};
  }

  /**
   * Writes the cached record when it changed since it was read.
   * `force` writes even when nothing changed (and reads first if the turn never touched state).
   */
  async saveChanges(turn: TurnContext, force = false): Promise<void> {
    const cached = force ? await this.loaded(turn) : this.cache.get(turn);
    if (!cached) return;

    const hash = hashState(cached.data);
    if (!force && hash === cached.hash) return;

    const key = this.getStorageKey(turn);
    const stored = await withStateErrors(key, "write", () => this.storage.write(key, cached.data, cached.eTag));
    cached.hash = hash;
    cached.eTag = stored.eTag;
  }

  /** Deletes the whole persisted record and resets the turn cache to empty. */
  async deleteAll(turn: TurnContext): Promise<void> {
    const key = this.getStorageKey(turn);
    this.cache.set(turn, { data: {}, hash: hashState({}), eTag: null });
    await withStateErrors(key, "delete", () => this.storage.delete(key));
  }

  private async loaded(turn: TurnContext, force = false): Promise<CachedState> {
    const existing = this.cache.get(turn);
    if (existing && !force) return existing;

    const key = this.getStorageKey(turn);
    const stored = await withStateErrors(key, "read", () => this.storage.read(key));
    const data = stored?.data ?? {};
    const cached: CachedState = { data, hash: hashState(data), eTag: stored?.eTag ?? null };
    this.cache.set(turn, cached);
    return cached;
  }
}
