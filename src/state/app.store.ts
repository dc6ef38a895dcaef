import { createStore, type StoreApi } from "zustand/vanilla";
import type { AppState } from "@/types/app.types";
import { loadRecord, saveRecord, type StorageDriver } from "@/services/storage.service";
import { logger } from "@/shared/utils/logger";

const STORAGE_KEY = "app_state_v1";

type AppStore = AppState & {
  isHydrated: boolean;
  hydrate: () => Promise<void>;

  // Onboarding
  completeOnboarding: () => Promise<void>;

  // Rating prompt
  markAppAsRated: () => Promise<void>;
  markRatingPromptSeen: () => Promise<void>;

  // Sync helpers
  getSnapshot: () => AppState;
  replaceAllData: (next: AppState) => Promise<void>;
};

export type AppStoreApi = StoreApi<AppStore>;

const defaultState: AppState = {
  schemaVersion: 1,
  hasSeenOnboarding: false,
  hasRatedApp: false,
  hasSeenRatingPrompt: false,
};

export function createAppStore(storage: StorageDriver): AppStoreApi {
  return createStore<AppStore>((set, get) => {
    async function persist(): Promise<void> {
      try {
        await saveRecord(storage, STORAGE_KEY, get().getSnapshot());
      } catch (err) {
        // In-memory flags stay set; the next write retries.
        logger.error("AppStore", "Failed to save app state:", err);
      }
    }

    return {
      // ---------- STATE ----------
      ...defaultState,
      isHydrated: false,

      hydrate: async () => {
        try {
          const stored = await loadRecord<AppState>(storage, STORAGE_KEY, 1);
          set({ ...defaultState, ...stored, isHydrated: true });
        } catch (err) {
          logger.error("AppStore", "Failed to load app state:", err);
          set({ isHydrated: true });
        }
      },

      completeOnboarding: async () => {
        set({ hasSeenOnboarding: true });
        await persist();
      },

      markAppAsRated: async () => {
        set({ hasRatedApp: true, hasSeenRatingPrompt: true });
        await persist();
      },

      markRatingPromptSeen: async () => {
        set({ hasSeenRatingPrompt: true });
        await persist();
      },

      // ---------- SYNC HELPERS ----------
      getSnapshot: () => {
        const s = get();
        return {
          schemaVersion: 1 as const,
          hasSeenOnboarding: s.hasSeenOnboarding ?? false,
          hasRatedApp: s.hasRatedApp ?? false,
          hasSeenRatingPrompt: s.hasSeenRatingPrompt ?? false,
        };
      },

      replaceAllData: async (data) => {
        set({
          schemaVersion: 1,
          hasSeenOnboarding: data.hasSeenOnboarding ?? false,
          hasRatedApp: data.hasRatedApp ?? false,
          hasSeenRatingPrompt: data.hasSeenRatingPrompt ?? false,
        });
        await persist();
      },
    };
  });
}
