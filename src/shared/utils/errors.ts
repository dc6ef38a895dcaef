/**
 * Error taxonomy shared by the session and entitlement layers.
 *
 * Only `EmptyCategoryError` is meant to reach callers; the others are caught
 * at operation boundaries, logged, and turned into an observable message.
 */

export class EmptyCategoryError extends Error {
  readonly categoryId: string;

  constructor(categoryId: string, categoryName: string) {
    super(`Category "${categoryName}" has no cards`);
    this.name = "EmptyCategoryError";
    this.categoryId = categoryId;
  }
}

export class PersistenceError extends Error {
  readonly key: string;
  readonly operation: "read" | "write" | "remove";

  constructor(operation: "read" | "write" | "remove", key: string, cause: unknown) {
    super(`Storage ${operation} failed for "${key}": ${getErrorMessage(cause)}`, { cause });
    this.name = "PersistenceError";
    this.key = key;
    this.operation = operation;
  }
}

export class RemoteUnreachableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "RemoteUnreachableError";
  }
}

export class VerificationError extends Error {
  readonly transactionId: string;

  constructor(transactionId: string, reason: string) {
    super(`Transaction ${transactionId} failed verification: ${reason}`);
    this.name = "VerificationError";
    this.transactionId = transactionId;
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

function readStatus(err: unknown): number {
  if (!err || typeof err !== "object") return 0;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return 0;
}

export function isNetworkOrServerError(err: unknown): boolean {
  if (err instanceof RemoteUnreachableError) return true;

  const msg = getErrorMessage(err).toLowerCase();
  const status = readStatus(err);
  return (
    msg.includes("failed to fetch") ||
    msg.includes("fetch failed") ||
    msg.includes("networkerror") ||
    msg.includes("internal server error") ||
    msg.includes("bad gateway") ||
    msg.includes("service unavailable") ||
    msg.includes("gateway timeout") ||
    msg.includes("timeout") ||
    msg.includes("enotfound") ||
    msg.includes("econnrefused") ||
    msg.includes("econnreset") ||
    (status >= 500 && status < 600)
  );
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RemoteUnreachableError(`${label} timeout`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
