import type {
  AccessDecision,
  EntitlementState,
  ResolverStatus,
  SubscriptionKind,
} from "@/types/app.types";
import type { Transaction } from "@/types/purchases.types";
import { PRODUCT_IDS, subscriptionKindFor, WEEKLY_PERIOD_DAYS } from "@/constants/pricing";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Cached flag AND not past the expiry, if there is one. */
export function isEffectivelyEntitled(cache: EntitlementState | null, now: Date): boolean {
  if (!cache?.hasPremiumAccess) return false;
  if (!cache.expiresAt) return true;
  return now.getTime() < Date.parse(cache.expiresAt);
}

export function isTransactionValid(transaction: Transaction, now: Date): boolean {
  if (transaction.revokedAt) return false;
  if (subscriptionKindFor(transaction.productId) === null) return false;
  if (!transaction.expiresAt) return true;
  return now.getTime() < Date.parse(transaction.expiresAt);
}

/**
 * Resolution order:
 *  1. a currently valid remote entitlement grants access;
 *  2. otherwise a reachable remote (status ready) denies it, whatever the cache says;
 *  3. otherwise the cache's effective entitlement decides.
 */
export function resolvePremiumAccess(input: {
  remoteEntitlements: readonly Transaction[];
  status: ResolverStatus;
  cache: EntitlementState | null;
  now: Date;
}): AccessDecision {
  const { remoteEntitlements, status, cache, now } = input;

  if (remoteEntitlements.some((t) => isTransactionValid(t, now))) {
    return { hasPremiumAccess: true, source: "remote" };
  }
  if (status.kind === "ready") {
    return { hasPremiumAccess: false, source: "remote-empty" };
  }
  return { hasPremiumAccess: isEffectivelyEntitled(cache, now), source: "cache" };
}

/**
 * Cache record to persist after a decision. Returns null when the cache must
 * be left untouched (fallback path).
 */
export function nextCacheState(input: {
  decision: AccessDecision;
  remoteEntitlements: readonly Transaction[];
  previous: EntitlementState | null;
  now: Date;
}): EntitlementState | null {
  const { decision, remoteEntitlements, now } = input;
  const updatedAt = now.toISOString();

  if (decision.source === "cache") return null;

  if (decision.source === "remote-empty") {
    return {
      schemaVersion: 1,
      hasPremiumAccess: false,
      subscriptionKind: null,
      grantedAt: null,
      expiresAt: null,
      updatedAt,
    };
  }

  const valid = remoteEntitlements.filter((t) => isTransactionValid(t, now));
  const lifetime = valid.find((t) => t.productId === PRODUCT_IDS.lifetime);
  if (lifetime) {
    return grant("lifetime", lifetime.purchasedAt, null, updatedAt);
  }

  // Weekly: keep the grant with the latest expiry.
  const weekly = [...valid].sort((a, b) => expiryOf(b, now) - expiryOf(a, now))[0];
  if (!weekly) return null;
  return grant("weekly", weekly.purchasedAt, new Date(expiryOf(weekly, now)).toISOString(), updatedAt);
}

function expiryOf(transaction: Transaction, now: Date): number {
  return transaction.expiresAt
    ? Date.parse(transaction.expiresAt)
    : now.getTime() + WEEKLY_PERIOD_DAYS * DAY_MS;
}

function grant(
  kind: SubscriptionKind,
  grantedAt: string,
  expiresAt: string | null,
  updatedAt: string,
): EntitlementState {
  return {
    schemaVersion: 1,
    hasPremiumAccess: true,
    subscriptionKind: kind,
    grantedAt,
    expiresAt,
    updatedAt,
  };
}
