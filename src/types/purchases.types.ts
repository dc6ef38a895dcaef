// ==================== PRODUCTS ====================

export type ProductRecord = {
  id: string;
  displayName: string;
  displayPrice: string;
  kind: 'subscription' | 'nonConsumable';
};

// ==================== TRANSACTIONS ====================

export type Transaction = {
  id: string;
  productId: string;
  purchasedAt: string;          // ISO 8601
  expiresAt: string | null;     // ISO 8601, subscriptions only
  revokedAt: string | null;     // ISO 8601
};

export type TransactionOutcome =
  | { verified: true; transaction: Transaction }
  | { verified: false; transaction: Transaction; reason: string };

export type PurchaseOutcome =
  | { kind: 'success'; outcome: TransactionOutcome }
  | { kind: 'userCancelled' }
  | { kind: 'pending' };

export type PurchaseResult = 'purchased' | 'cancelled' | 'pending' | 'unverified' | 'failed';

// ==================== SOURCE ====================

/**
 * Remote purchase/entitlement backend. Treated as a black box: the resolver
 * only sees product metadata and verified or unverified transactions.
 */
export interface EntitlementSource {
  fetchProducts(productIds: readonly string[]): Promise<ProductRecord[]>;
  fetchCurrentEntitlements(): Promise<TransactionOutcome[]>;
  purchase(productId: string): Promise<PurchaseOutcome>;
  restorePurchases(): Promise<void>;
  /** Long-lived stream of renewals, cross-device purchases and revocations. */
  transactionUpdates(): AsyncIterable<TransactionOutcome>;
}
