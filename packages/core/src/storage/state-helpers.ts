import { StateStoreError } from "../errors.js";
import type { StateOperation } from "../errors.js";

/** Throws a conflict when `expectedETag` does not admit a write over `currentETag`. */
export function assertWritable(key: string, currentETag: string | undefined, expectedETag?: string | null): void {
  if (expectedETag === undefined) return;
  if (expectedETag === null) {
    if (currentETag !== undefined) throw new StateStoreError(key, "write", { conflict: true });
    return;
  }
  if (currentETag !== expectedETag) throw new StateStoreError(key, "write", { conflict: true });
}

/** Runs a storage call, reporting any failure as a `StateStoreError` for `key`. */
export async function withStateErrors<T>(key: string, operation: StateOperation, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StateStoreError) throw err;
    throw new StateStoreError(key, operation, { cause: err });
  }
}
