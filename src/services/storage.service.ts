import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { StateStorage } from "zustand/middleware";
import { PersistenceError } from "@/shared/utils/errors";
import { logger } from "@/shared/utils/logger";

/**
 * Key/value driver behind every persisted record. Same shape as the storage
 * zustand's persist middleware takes, so `localStorage` fits as well.
 */
export type StorageDriver = StateStorage;

export type VersionedRecord = { schemaVersion: number };

export function createMemoryStorage(initial: Record<string, string> = {}): StorageDriver & {
  snapshot: () => Record<string, string>;
} {
  const data = new Map(Object.entries(initial));
  return {
    getItem: (key) => data.get(key) ?? null,
    setItem: (key, value) => {
      data.set(key, value);
    },
    removeItem: (key) => {
      data.delete(key);
    },
    snapshot: () => Object.fromEntries(data),
  };
}

function fileNameFor(key: string): string {
  return `${key.replace(/[^a-zA-Z0-9._-]/g, "_")}.json`;
}

function isMissingFile(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === "ENOENT";
}

/** One JSON file per key inside `dir`. */
export function createFileStorage(dir: string): StorageDriver {
  return {
    async getItem(key) {
      try {
        return await readFile(path.join(dir, fileNameFor(key)), "utf8");
      } catch (err) {
        if (isMissingFile(err)) return null;
        throw err;
      }
    },
    async setItem(key, value) {
      await mkdir(dir, { recursive: true });
      await writeFile(path.join(dir, fileNameFor(key)), value, "utf8");
    },
    async removeItem(key) {
      await rm(path.join(dir, fileNameFor(key)), { force: true });
    },
  };
}

/**
 * Reads and parses a record. A missing key, malformed JSON or a schema
 * version mismatch yields null; a failing driver throws PersistenceError.
 */
export async function loadRecord<T extends VersionedRecord>(
  storage: StorageDriver,
  key: string,
  schemaVersion: T["schemaVersion"],
): Promise<T | null> {
  let raw: string | null;
  try {
    raw = await storage.getItem(key);
  } catch (err) {
    throw new PersistenceError("read", key, err);
  }
  if (!raw) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    logger.warn("Storage", `Discarding malformed record "${key}"`);
    return null;
  }

  if (!isVersioned(parsed) || parsed.schemaVersion !== schemaVersion) {
    logger.warn("Storage", `Discarding record "${key}" with unexpected schema version`);
    return null;
  }

  return parsed as T;
}

export async function saveRecord<T extends VersionedRecord>(
  storage: StorageDriver,
  key: string,
  record: T,
): Promise<void> {
  try {
    await storage.setItem(key, JSON.stringify(record));
  } catch (err) {
    throw new PersistenceError("write", key, err);
  }
}

export async function clearRecord(storage: StorageDriver, key: string): Promise<void> {
  try {
    await storage.removeItem(key);
  } catch (err) {
    throw new PersistenceError("remove", key, err);
  }
}

function isVersioned(value: unknown): value is VersionedRecord {
  return (
    !!value &&
    typeof value === "object" &&
    "schemaVersion" in value &&
    typeof value.schemaVersion === "number"
  );
}
