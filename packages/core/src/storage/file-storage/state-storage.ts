import { readFile, writeFile, mkdir, unlink, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import type { StateStorage, StoredState } from "../interfaces.js";
import { StateStoreError } from "../../errors.js";
import { assertWritable } from "../state-helpers.js";

const storedStateSchema = z.object({
  eTag: z.string(),
  data: z.record(z.unknown()),
});

export function createFileStateStorage(dataDir: string, subdir: string): StateStorage {
  const baseDir = join(dataDir, subdir);

  let lock: Promise<void> = Promise.resolve();
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const result = lock.then(fn);
    lock = result.then(() => undefined, () => undefined);
    return result;
  }

  /** Keys contain slashes (`<channel>/conversations/<id>`), so each key becomes one encoded file name. */
  function filePath(key: string): string {
    return join(baseDir, `${encodeURIComponent(key)}.json`);
  }

  async function ensureDir() {
    if (!existsSync(baseDir)) await mkdir(baseDir, { recursive: true });
  }

  async function readRecord(key: string): Promise<StoredState | null> {
    const path = filePath(key);
    if (!existsSync(path)) return null;
    const raw = await readFile(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new StateStoreError(key, "read", { cause: err });
    }
    const result = storedStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new StateStoreError(key, "read", { cause: result.error });
    }
    return result.data;
  }

  return {
    read(key) {
      return withLock(() => readRecord(key));
    },

    write(key, data, expectedETag?) {
      return withLock(async () => {
        await ensureDir();
        const current = await readRecord(key);
        assertWritable(key, current?.eTag, expectedETag);
        const record: StoredState = { data, eTag: randomUUID() };
        // write-then-rename
        const path = filePath(key);
        const tmp = `${path}.${record.eTag}.tmp`;
        await writeFile(tmp, JSON.stringify(record, null, 2));
        await rename(tmp, path);
        return record;
      });
    },

    delete(key) {
      return withLock(async () => {
        const path = filePath(key);
        if (!existsSync(path)) return false;
        await unlink(path);
        return true;
      });
    },
  };
}
