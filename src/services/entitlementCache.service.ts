import type { EntitlementState } from "@/types/app.types";
import { loadRecord, saveRecord, type StorageDriver } from "@/services/storage.service";
import { logger } from "@/shared/utils/logger";

const STORAGE_KEY = "party.entitlement.v1";

export type EntitlementCache = {
  /** Fetch-or-create: there is exactly one record per installation. */
  load: () => Promise<EntitlementState>;
  save: (state: EntitlementState) => Promise<void>;
};

export function emptyEntitlementState(now: Date): EntitlementState {
  return {
    schemaVersion: 1,
    hasPremiumAccess: false,
    subscriptionKind: null,
    grantedAt: null,
    expiresAt: null,
    updatedAt: now.toISOString(),
  };
}

export function createEntitlementCache(
  storage: StorageDriver,
  now: () => Date = () => new Date(),
): EntitlementCache {
  return {
    async load() {
      const existing = await loadRecord<EntitlementState>(storage, STORAGE_KEY, 1);
      if (existing) return existing;

      const created = emptyEntitlementState(now());
      try {
        await saveRecord(storage, STORAGE_KEY, created);
      } catch (err) {
        logger.error("Entitlement", "Error saving new entitlement record:", err);
      }
      return created;
    },

    async save(state) {
      await saveRecord(storage, STORAGE_KEY, state);
    },
  };
}
