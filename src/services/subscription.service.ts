import { REALTIME_SUBSCRIBE_STATES, type SupabaseClient } from "@supabase/supabase-js";
import type {
  EntitlementSource,
  ProductRecord,
  PurchaseOutcome,
  Transaction,
  TransactionOutcome,
} from "@/types/purchases.types";
import { createEventQueue } from "@/shared/utils/eventQueue";
import { getErrorMessage, RemoteUnreachableError } from "@/shared/utils/errors";
import { logger } from "@/shared/utils/logger";

/**
 * Supabase-backed purchase backend.
 *
 * Tables: `products` (catalog metadata) and `entitlements` (one row per
 * store transaction, verified server-side). Purchases and restores run in
 * the `purchase` and `restore-purchases` edge functions; updates arrive as
 * realtime `postgres_changes` on `entitlements`.
 */

const PRODUCT_COLUMNS = "id, display_name, display_price, kind";
const ENTITLEMENT_COLUMNS =
  "transaction_id, product_id, purchased_at, expires_at, revoked_at, verification_status, verification_reason";

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readString(row: Row, key: string): string | null {
  const value = row[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function parseProductRow(value: unknown): ProductRecord | null {
  if (!isRow(value)) return null;
  const id = readString(value, "id");
  if (!id) return null;
  return {
    id,
    displayName: readString(value, "display_name") ?? id,
    displayPrice: readString(value, "display_price") ?? "",
    kind: readString(value, "kind") === "nonConsumable" ? "nonConsumable" : "subscription",
  };
}

export function parseEntitlementRow(value: unknown): TransactionOutcome | null {
  if (!isRow(value)) return null;
  const id = readString(value, "transaction_id");
  const productId = readString(value, "product_id");
  const purchasedAt = readString(value, "purchased_at");
  if (!id || !productId || !purchasedAt) return null;

  const transaction: Transaction = {
    id,
    productId,
    purchasedAt,
    expiresAt: readString(value, "expires_at"),
    revokedAt: readString(value, "revoked_at"),
  };

  if (readString(value, "verification_status") === "verified") {
    return { verified: true, transaction };
  }
  return {
    verified: false,
    transaction,
    reason: readString(value, "verification_reason") ?? "unverified",
  };
}

/** Edge function reply: `{ status, transaction?, verified?, reason? }`. */
export function parsePurchaseReply(value: unknown): PurchaseOutcome {
  if (!isRow(value)) throw new Error("Malformed purchase response");

  switch (readString(value, "status")) {
    case "cancelled":
      return { kind: "userCancelled" };
    case "pending":
      return { kind: "pending" };
    case "success": {
      const outcome = parseEntitlementRow(value.transaction);
      if (!outcome) throw new Error("Purchase response is missing its transaction");
      return { kind: "success", outcome };
    }
    default:
      throw new Error("Malformed purchase response");
  }
}

export function createSupabaseEntitlementSource(
  client: SupabaseClient,
  appUserId: string,
): EntitlementSource {
  return {
    async fetchProducts(productIds) {
      const { data, error } = await client
        .from("products")
        .select(PRODUCT_COLUMNS)
        .in("id", [...productIds]);

      if (error) throw new RemoteUnreachableError(`Failed to load products: ${error.message}`, error);

      const rows: unknown[] = data ?? [];
      return rows.flatMap((row) => parseProductRow(row) ?? []);
    },

    async fetchCurrentEntitlements() {
      const { data, error } = await client
        .from("entitlements")
        .select(ENTITLEMENT_COLUMNS)
        .eq("app_user_id", appUserId);

      if (error) {
        throw new RemoteUnreachableError(`Failed to load entitlements: ${error.message}`, error);
      }

      const rows: unknown[] = data ?? [];
      return rows.flatMap((row) => {
        const outcome = parseEntitlementRow(row);
        if (!outcome) logger.warn("Subscription", "Skipping malformed entitlement row");
        return outcome ?? [];
      });
    },

    async purchase(productId) {
      const { data, error } = await client.functions.invoke<unknown>("purchase", {
        body: { productId, appUserId },
      });
      if (error) throw new RemoteUnreachableError(`Purchase failed: ${getErrorMessage(error)}`, error);
      return parsePurchaseReply(data);
    },

    async restorePurchases() {
      const { error } = await client.functions.invoke("restore-purchases", {
        body: { appUserId },
      });
      if (error) throw new RemoteUnreachableError(`Restore failed: ${getErrorMessage(error)}`, error);
    },

    transactionUpdates() {
      const channel = client.channel(`entitlements:${appUserId}`);
      const removeChannel = async () => {
        await client.removeChannel(channel);
      };
      const queue = createEventQueue<TransactionOutcome>(removeChannel);

      channel
        .on(
          "postgres_changes",
          {
            event: "*",
            schema: "public",
            table: "entitlements",
            filter: `app_user_id=eq.${appUserId}`,
          },
          (payload) => {
            if (payload.eventType === "DELETE") {
              // Row gone: surface it as a revocation so the resolver re-queries.
              const old: Row = payload.old;
              queue.push({
                verified: true,
                transaction: {
                  id: readString(old, "transaction_id") ?? "deleted",
                  productId: readString(old, "product_id") ?? "",
                  purchasedAt: readString(old, "purchased_at") ?? new Date(0).toISOString(),
                  expiresAt: null,
                  revokedAt: new Date().toISOString(),
                },
              });
              return;
            }

            const outcome = parseEntitlementRow(payload.new);
            if (outcome) queue.push(outcome);
            else logger.warn("Subscription", "Skipping malformed realtime entitlement row");
          },
        )
        .subscribe((status, err) => {
          if (status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED) {
            logger.debug("Subscription", "Realtime entitlements channel subscribed");
            return;
          }
          if (queue.closed) return;
          queue.fail(new RemoteUnreachableError(`Realtime channel ${status}`, err));
          removeChannel().catch((removeErr: unknown) => {
            logger.warn("Subscription", "Failed to remove realtime channel:", removeErr);
          });
        });

      return queue;
    },
  };
}
