import * as Sentry from "@sentry/node";
import { NODE_ENV, SENTRY_DSN } from "@/config";

let initialized = false;

export function initSentry(): boolean {
  if (initialized) return true;
  if (!SENTRY_DSN) return false;

  Sentry.init({
    dsn: SENTRY_DSN,
    environment: NODE_ENV,
    tracesSampleRate: NODE_ENV === "production" ? 0.1 : 1.0,
    sendDefaultPii: false,
  });

  initialized = true;
  return true;
}

export function reportError(error: unknown, tag: string): void {
  if (!initialized) return;
  Sentry.captureException(error, { tags: { area: tag } });
}

export function addBreadcrumb(tag: string, message: string): void {
  if (!initialized) return;
  Sentry.addBreadcrumb({ category: tag, message, level: "info" });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!initialized) return;
  await Sentry.flush(timeoutMs);
}
