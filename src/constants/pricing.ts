import type { SubscriptionKind } from "@/types/app.types";

export const PRODUCT_IDS = {
  weekly: "weekly_399",
  lifetime: "lifetimeplan",
} as const;

export type ProductId = (typeof PRODUCT_IDS)[keyof typeof PRODUCT_IDS];

export const ALL_PRODUCT_IDS: readonly ProductId[] = [PRODUCT_IDS.weekly, PRODUCT_IDS.lifetime];

// Used when a weekly grant arrives without an expiry from the store.
export const WEEKLY_PERIOD_DAYS = 7;

export const FALLBACK_DISPLAY_PRICES: Record<ProductId, string> = {
  weekly_399: "$3.99",
  lifetimeplan: "$19.99",
};

export function subscriptionKindFor(productId: string): SubscriptionKind | null {
  if (productId === PRODUCT_IDS.lifetime) return "lifetime";
  if (productId === PRODUCT_IDS.weekly) return "weekly";
  return null;
}
