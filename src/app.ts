import cardsJson from "@/data/cards.json";
import { APP_USER_ID, RUNTIME_FLAGS, STORAGE_DIR } from "@/config";
import { PREMIUM_CATEGORIES, RATING_UNLOCKABLE_CATEGORIES } from "@/constants/categories";
import { createEntitlementResolver, type EntitlementResolver } from "@/features/entitlement/entitlementResolver";
import { buildCategoryGrid, type GatedCategory } from "@/features/gating/categoryGate";
import { createSessionTracker, type SessionTracker } from "@/features/session/sessionTracker";
import type { RandomSource } from "@/features/session/session.model";
import { flushSentry, initSentry } from "@/lib/sentry";
import { createSupabaseClient } from "@/lib/supabaseClient";
import { createCatalogService, parseCardDataset, type CardDataset, type CatalogService } from "@/services/catalog.service";
import { createEntitlementCache } from "@/services/entitlementCache.service";
import { createSessionRepository, type SessionRepository } from "@/services/sessions.service";
import { createFileStorage, createMemoryStorage, type StorageDriver } from "@/services/storage.service";
import { createSupabaseEntitlementSource } from "@/services/subscription.service";
import { createAppStore, type AppStoreApi } from "@/state/app.store";
import type { AccessDecision, Session } from "@/types/app.types";
import type { EntitlementSource } from "@/types/purchases.types";
import i18n from "@/i18n/config";
import { getErrorMessage } from "@/shared/utils/errors";
import { logger } from "@/shared/utils/logger";

export type PartyGamesAppOptions = {
  storage?: StorageDriver;
  source?: EntitlementSource;
  dataset?: CardDataset;
  now?: () => Date;
  random?: RandomSource;
  listenForTransactions?: boolean;
};

export type StartResult = {
  importedCatalog: boolean;
  restoredSession: Session | null;
  access: AccessDecision;
};

export type PartyGamesApp = {
  storage: StorageDriver;
  catalog: CatalogService;
  sessions: SessionRepository;
  tracker: SessionTracker;
  resolver: EntitlementResolver;
  preferences: AppStoreApi;

  start: () => Promise<StartResult>;
  shutdown: () => Promise<void>;
  getCategoryGrid: () => GatedCategory[];
};

function defaultStorage(): StorageDriver {
  return RUNTIME_FLAGS.HAS_FILE_STORAGE ? createFileStorage(STORAGE_DIR) : createMemoryStorage();
}

function defaultSource(): EntitlementSource {
  if (!RUNTIME_FLAGS.HAS_REMOTE_SOURCE || !APP_USER_ID) {
    throw new Error("No entitlement source: set SUPABASE_URL, SUPABASE_ANON_KEY and APP_USER_ID");
  }
  return createSupabaseEntitlementSource(createSupabaseClient(), APP_USER_ID);
}

export function createPartyGamesApp(options: PartyGamesAppOptions = {}): PartyGamesApp {
  const now = options.now ?? (() => new Date());
  const storage = options.storage ?? defaultStorage();
  const source = options.source ?? defaultSource();
  const dataset = options.dataset ?? parseCardDataset(cardsJson);
  const listenForTransactions = options.listenForTransactions ?? true;

  const sessions = createSessionRepository(storage);
  const catalog = createCatalogService({ storage, sessions, now });
  const tracker = createSessionTracker({ catalog, sessions, now, random: options.random });
  const resolver = createEntitlementResolver({
    source,
    cache: createEntitlementCache(storage, now),
    now,
  });
  const preferences = createAppStore(storage);

  return {
    storage,
    catalog,
    sessions,
    tracker,
    resolver,
    preferences,

    start: async () => {
      initSentry();
      logger.info("App", `Starting (${RUNTIME_FLAGS.NODE_ENV}, language: ${i18n.language})`);

      await preferences.getState().hydrate();
      let imported: boolean;
      try {
        ({ imported } = await catalog.ensureCatalog(dataset));
      } catch (err) {
        logger.error("App", "Catalog import failed:", err);
        throw new Error(i18n.t("common:errors.catalogImportFailed", { reason: getErrorMessage(err) }), {
          cause: err,
        });
      }

      try {
        await catalog.applyCategoryAccess({
          premium: PREMIUM_CATEGORIES,
          ratingUnlockable: RATING_UNLOCKABLE_CATEGORIES,
        });
      } catch (err) {
        // Flags from the previous launch stay in effect.
        logger.warn("App", "Failed to update category access:", err);
      }

      const [restoredSession, access] = await Promise.all([
        tracker.getState().restoreMostRecentActive(),
        resolver.getState().reconcile(),
      ]);

      if (listenForTransactions) resolver.getState().startTransactionListener();

      return { importedCatalog: imported, restoredSession, access };
    },

    shutdown: async () => {
      await resolver.getState().stopTransactionListener();
      await flushSentry();
      logger.info("App", "Shut down");
    },

    getCategoryGrid: () =>
      buildCategoryGrid(catalog.getAllCategories(), {
        hasPremiumAccess: resolver.getState().hasPremiumAccess(),
        hasRatedApp: preferences.getState().hasRatedApp ?? false,
      }),
  };
}
