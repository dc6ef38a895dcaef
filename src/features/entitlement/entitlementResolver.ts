import { createStore, type StoreApi } from "zustand/vanilla";
import type { AccessDecision, EntitlementState, ResolverStatus } from "@/types/app.types";
import type {
  EntitlementSource,
  ProductRecord,
  PurchaseResult,
  Transaction,
  TransactionOutcome,
} from "@/types/purchases.types";
import { ALL_PRODUCT_IDS, FALLBACK_DISPLAY_PRICES, subscriptionKindFor } from "@/constants/pricing";
import { ENTITLEMENT_FETCH_TIMEOUT_MS } from "@/config";
import type { EntitlementCache } from "@/services/entitlementCache.service";
import i18n from "@/i18n/config";
import { getErrorMessage, isNetworkOrServerError, VerificationError, withTimeout } from "@/shared/utils/errors";
import { logger } from "@/shared/utils/logger";
import { isTransactionValid, nextCacheState, resolvePremiumAccess } from "./resolvePremiumAccess";

export type EntitlementResolverState = {
  status: ResolverStatus;
  products: ProductRecord[];
  remoteEntitlements: Transaction[];   // verified, from the last successful fetch or purchase
  cache: EntitlementState | null;
  lastDecision: AccessDecision | null;
  isLoading: boolean;
  isListening: boolean;
  errorMessage: string | null;

  init: () => Promise<EntitlementState | null>;
  reconcile: () => Promise<AccessDecision>;
  purchase: (productId: string) => Promise<PurchaseResult>;
  restorePurchases: () => Promise<AccessDecision>;
  startTransactionListener: () => void;
  stopTransactionListener: () => Promise<void>;

  hasPremiumAccess: (at?: Date) => boolean;
  getDisplayPrice: (productId: string) => string;
  clearError: () => void;
};

export type EntitlementResolver = StoreApi<EntitlementResolverState>;

export type EntitlementResolverDeps = {
  source: EntitlementSource;
  cache: EntitlementCache;
  productIds?: readonly string[];
  now?: () => Date;
  fetchTimeoutMs?: number;
  listenerRetryMs?: number;
};

type ListenerHandle = {
  stopped: boolean;
  iterator: AsyncIterator<TransactionOutcome> | null;
  wake: (() => void) | null;
  done: Promise<void>;
};

export function createEntitlementResolver({
  source,
  cache,
  productIds = ALL_PRODUCT_IDS,
  now = () => new Date(),
  fetchTimeoutMs = ENTITLEMENT_FETCH_TIMEOUT_MS,
  listenerRetryMs = 5000,
}: EntitlementResolverDeps): EntitlementResolver {
  let listener: ListenerHandle | null = null;

  return createStore<EntitlementResolverState>((set, get) => {
    async function ensureCache(): Promise<void> {
      if (!get().cache) await get().init();
    }

    function verifiedOnly(outcomes: TransactionOutcome[]): Transaction[] {
      const verified: Transaction[] = [];
      for (const outcome of outcomes) {
        if (outcome.verified) {
          verified.push(outcome.transaction);
        } else {
          const err = new VerificationError(outcome.transaction.id, outcome.reason);
          logger.warn("Entitlement", `Discarding entitlement: ${err.message}`);
        }
      }
      return verified;
    }

    function currentDecision(at: Date): AccessDecision {
      const { remoteEntitlements, status, cache: cached } = get();
      return resolvePremiumAccess({ remoteEntitlements, status, cache: cached, now: at });
    }

    /** Resolves from the current state and writes the cache when the rule says so. */
    async function applyDecision(): Promise<AccessDecision> {
      const at = now();
      const decision = currentDecision(at);
      const next = nextCacheState({
        decision,
        remoteEntitlements: get().remoteEntitlements,
        previous: get().cache,
        now: at,
      });

      set({ lastDecision: decision });
      if (next) {
        set({ cache: next });
        try {
          await cache.save(next);
        } catch (err) {
          // The in-process answer stands even if the write did not land.
          logger.error("Entitlement", "Error saving entitlement state:", err);
          set({ errorMessage: i18n.t("paywall:errors.saveFailed", { reason: getErrorMessage(err) }) });
        }
      }

      logger.info("Entitlement", `Premium access: ${decision.hasPremiumAccess} (${decision.source})`);
      return decision;
    }

    /** Folds one verified transaction in as a remote answer. */
    async function fold(transaction: Transaction): Promise<AccessDecision> {
      const { remoteEntitlements, status, products } = get();
      set({
        remoteEntitlements: [...remoteEntitlements.filter((t) => t.id !== transaction.id), transaction],
        status: status.kind === "ready" ? status : { kind: "ready", catalogEmpty: products.length === 0 },
      });
      return applyDecision();
    }

    async function handleUpdate(outcome: TransactionOutcome): Promise<void> {
      try {
        if (!outcome.verified) {
          const err = new VerificationError(outcome.transaction.id, outcome.reason);
          logger.warn("Entitlement", `Ignoring transaction update: ${err.message}`);
          return;
        }
        const { transaction } = outcome;
        logger.info("Entitlement", `Transaction update for ${transaction.productId}`);
        if (isTransactionValid(transaction, now())) {
          await fold(transaction);
        } else {
          // Revocation or expiry: the full list is needed to decide.
          await get().reconcile();
        }
      } catch (err) {
        logger.error("Entitlement", "Failed to process transaction update:", err);
      }
    }

    function pause(handle: ListenerHandle, ms: number): Promise<void> {
      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          handle.wake = null;
          resolve();
        }, ms);
        handle.wake = () => {
          clearTimeout(timer);
          handle.wake = null;
          resolve();
        };
      });
    }

    async function listen(handle: ListenerHandle): Promise<void> {
      while (!handle.stopped) {
        try {
          const iterator = source.transactionUpdates()[Symbol.asyncIterator]();
          handle.iterator = iterator;
          while (!handle.stopped) {
            const next = await iterator.next();
            if (next.done) break;
            await handleUpdate(next.value);
          }
          if (handle.stopped) break;
          logger.warn("Entitlement", "Transaction stream ended, re-subscribing");
        } catch (err) {
          if (handle.stopped) break;
          logger.error("Entitlement", "Transaction stream failed:", err);
        }
        handle.iterator = null;
        await pause(handle, listenerRetryMs);
      }
    }

    return {
      status: { kind: "uninitialized" },
      products: [],
      remoteEntitlements: [],
      cache: null,
      lastDecision: null,
      isLoading: false,
      isListening: false,
      errorMessage: null,

      init: async () => {
        const existing = get().cache;
        if (existing) return existing;
        try {
          const loaded = await cache.load();
          set({ cache: loaded });
          return loaded;
        } catch (err) {
          logger.error("Entitlement", "Error loading entitlement state:", err);
          return null;
        }
      },

      reconcile: async () => {
        await ensureCache();
        set({ status: { kind: "loading" }, isLoading: true, errorMessage: null });

        try {
          const [products, outcomes] = await withTimeout(
            Promise.all([source.fetchProducts(productIds), source.fetchCurrentEntitlements()]),
            fetchTimeoutMs,
            "Entitlement fetch",
          );
          set({
            products,
            remoteEntitlements: verifiedOnly(outcomes),
            status: { kind: "ready", catalogEmpty: products.length === 0 },
          });
          logger.info("Entitlement", `Loaded ${products.length} products, ${outcomes.length} entitlements`);
        } catch (err) {
          const reason = getErrorMessage(err);
          const offline = isNetworkOrServerError(err);
          logger.warn("Entitlement", "Remote entitlement fetch failed, using cached state:", reason);
          set({
            remoteEntitlements: [],
            status: { kind: "failed", reason, offline },
            errorMessage: i18n.t("paywall:errors.productsFailed", { reason }),
          });
        }

        const decision = await applyDecision();
        set({ isLoading: false });
        return decision;
      },

      purchase: async (productId) => {
        if (!subscriptionKindFor(productId)) {
          set({ errorMessage: i18n.t("paywall:errors.unknownProduct", { productId }) });
          return "failed";
        }

        await ensureCache();
        set({ isLoading: true, errorMessage: null });
        try {
          const result = await source.purchase(productId);
          switch (result.kind) {
            case "userCancelled":
              logger.info("Entitlement", "User cancelled purchase");
              return "cancelled";
            case "pending":
              logger.info("Entitlement", "Purchase is pending");
              return "pending";
            case "success": {
              const { outcome } = result;
              if (!outcome.verified) {
                const err = new VerificationError(outcome.transaction.id, outcome.reason);
                logger.warn("Entitlement", `Discarding purchase: ${err.message}`);
                set({ errorMessage: i18n.t("paywall:errors.unverified") });
                return "unverified";
              }
              await fold(outcome.transaction);
              logger.info("Entitlement", `Successfully purchased: ${productId}`);
              return "purchased";
            }
          }
        } catch (err) {
          logger.error("Entitlement", "Purchase error:", err);
          set({ errorMessage: i18n.t("paywall:errors.purchaseFailed", { reason: getErrorMessage(err) }) });
          return "failed";
        } finally {
          set({ isLoading: false });
        }
      },

      restorePurchases: async () => {
        await ensureCache();
        set({ isLoading: true, errorMessage: null });
        try {
          await source.restorePurchases();
        } catch (err) {
          logger.error("Entitlement", "Restore error:", err);
          set({
            isLoading: false,
            errorMessage: i18n.t("paywall:errors.restoreFailed", { reason: getErrorMessage(err) }),
          });
          const decision = currentDecision(now());
          set({ lastDecision: decision });
          return decision;
        }
        logger.info("Entitlement", "Restored purchases");
        return get().reconcile();
      },

      startTransactionListener: () => {
        if (listener) return;
        const handle: ListenerHandle = {
          stopped: false,
          iterator: null,
          wake: null,
          done: Promise.resolve(),
        };
        handle.done = listen(handle);
        listener = handle;
        set({ isListening: true });
        logger.info("Entitlement", "Listening for transaction updates");
      },

      stopTransactionListener: async () => {
        const handle = listener;
        if (!handle) return;
        listener = null;
        handle.stopped = true;
        handle.wake?.();
        try {
          await handle.iterator?.return?.();
        } catch (err) {
          logger.warn("Entitlement", "Error closing transaction stream:", err);
        }
        await handle.done;
        set({ isListening: false });
      },

      hasPremiumAccess: (at) => currentDecision(at ?? now()).hasPremiumAccess,

      getDisplayPrice: (productId) => {
        const product = get().products.find((p) => p.id === productId);
        if (product) return product.displayPrice;
        const fallback = Object.entries(FALLBACK_DISPLAY_PRICES).find(([id]) => id === productId);
        return fallback ? fallback[1] : "";
      },

      clearError: () => set({ errorMessage: null }),
    };
  });
}
