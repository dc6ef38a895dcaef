import { LOG_LEVEL, type LogLevel } from "@/config";
import { addBreadcrumb, reportError } from "@/lib/sentry";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return RANK[level] >= RANK[LOG_LEVEL];
}

/**
 * Tagged console logger: `logger.info("Session", "Started", id)` prints
 * `[Session] Started <id>`. Errors are also forwarded to Sentry.
 */
export const logger = {
  debug(tag: string, ...args: unknown[]): void {
    if (enabled("debug")) console.debug(`[${tag}]`, ...args);
  },

  info(tag: string, ...args: unknown[]): void {
    if (enabled("info")) console.info(`[${tag}]`, ...args);
    const [first] = args;
    if (typeof first === "string") addBreadcrumb(tag, first);
  },

  warn(tag: string, ...args: unknown[]): void {
    if (enabled("warn")) console.warn(`[${tag}]`, ...args);
  },

  error(tag: string, ...args: unknown[]): void {
    if (enabled("error")) console.error(`[${tag}]`, ...args);
    const err = args.find((a) => a instanceof Error);
    if (err) reportError(err, tag);
  },
};
