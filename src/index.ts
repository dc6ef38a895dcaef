export { createPartyGamesApp } from "./app";
export type { PartyGamesApp, PartyGamesAppOptions, StartResult } from "./app";

export { createSessionTracker } from "./features/session/sessionTracker";
export type { SessionTracker, SessionTrackerState, StartSessionOptions } from "./features/session/sessionTracker";
export {
  buildSessionStatistics,
  formatDuration,
  shufflePermutation,
  validateSession,
} from "./features/session/session.model";

export { createEntitlementResolver } from "./features/entitlement/entitlementResolver";
export type { EntitlementResolver, EntitlementResolverState } from "./features/entitlement/entitlementResolver";
export { isEffectivelyEntitled, resolvePremiumAccess } from "./features/entitlement/resolvePremiumAccess";

export { buildCategoryGrid, getCategoryGate, sortCategoriesForDisplay } from "./features/gating/categoryGate";

export { createCatalogService, parseCardDataset } from "./services/catalog.service";
export type { CardDataset, CatalogService } from "./services/catalog.service";
export { createSessionRepository } from "./services/sessions.service";
export { createEntitlementCache } from "./services/entitlementCache.service";
export { createFileStorage, createMemoryStorage } from "./services/storage.service";
export type { StorageDriver } from "./services/storage.service";
export { createSupabaseEntitlementSource } from "./services/subscription.service";
export { createSupabaseClient } from "./lib/supabaseClient";
export { createAppStore } from "./state/app.store";

export {
  EmptyCategoryError,
  PersistenceError,
  RemoteUnreachableError,
  VerificationError,
} from "./shared/utils/errors";

export type * from "./types/app.types";
export type * from "./types/purchases.types";
