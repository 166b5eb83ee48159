import type { StateStorage, StorageProvider, StoredState } from "../interfaces.js";
import { assertWritable } from "../state-helpers.js";

// ── State Storage ──

export function createMemoryStateStorage(): StateStorage {
  const store = new Map<string, StoredState>();
  let nextETag = 1;

  return {
    async read(key) {
      const entry = store.get(key);
      if (!entry) return null;
      return { data: structuredClone(entry.data), eTag: entry.eTag };
    },

    async write(key, data, expectedETag?) {
      assertWritable(key, store.get(key)?.eTag, expectedETag);
      const entry: StoredState = { data: structuredClone(data), eTag: String(nextETag++) };
      store.set(key, entry);
      return { data: structuredClone(entry.data), eTag: entry.eTag };
    },

    async delete(key) {
      return store.delete(key);
    },
  };
}

// ── Combined Provider ──

/**
 * Creates a fully in-memory StorageProvider.
 * All data lives in process memory and is lost on restart.
 * Ideal for testing, development, and demos where disk persistence isn't needed.
 */
export function createMemoryStorage(): StorageProvider {
  return {
    state: createMemoryStateStorage(),
    skillConversations: createMemoryStateStorage(),
  };
}
