import { resolve } from "node:path";
import type { StorageProvider } from "../interfaces.js";
import { createFileStateStorage } from "./state-storage.js";

export interface FileStorageOptions {
  /** Base directory for all data files (e.g. "./data") */
  dataDir: string;
}

export function createFileStorage(options: FileStorageOptions): StorageProvider {
  const dataDir = resolve(options.dataDir);

  return {
    state: createFileStateStorage(dataDir, "conversation-state"),
    skillConversations: createFileStateStorage(dataDir, "skill-conversations"),
  };
}

export { createFileStateStorage } from "./state-storage.js";
