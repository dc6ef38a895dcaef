// src/config.ts

/**
 * Centralized runtime configuration, read once from the environment.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type SupportedLanguage = 'en' | 'es';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const LANGUAGES: readonly SupportedLanguage[] = ['en', 'es'];

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

function parseLanguage(value: string | undefined): SupportedLanguage {
  const lang = value?.split(/[-_]/)[0]?.toLowerCase();
  return LANGUAGES.find((l) => l === lang) ?? 'en';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// -----------------------------
// Env / runtime detection
// -----------------------------
export const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_DEV = NODE_ENV !== 'production';

export const LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL, IS_DEV ? 'debug' : 'info');

export const APP_LANGUAGE = parseLanguage(process.env.APP_LANGUAGE);

// -----------------------------
// Local persistence
// -----------------------------
// Empty means in-memory storage (nothing survives the process).
export const STORAGE_DIR = process.env.STORAGE_DIR || '';

// -----------------------------
// Error reporting
// -----------------------------
export const SENTRY_DSN = process.env.SENTRY_DSN || '';

// -----------------------------
// Remote entitlement source (Supabase)
// -----------------------------
export const SUPABASE_URL = process.env.SUPABASE_URL || '';
export const SUPABASE_ANON_KEY = process.env.SUPABASE_ANON_KEY || '';
export const APP_USER_ID = process.env.APP_USER_ID || '';

export const ENTITLEMENT_FETCH_TIMEOUT_MS = parsePositiveInt(
  process.env.ENTITLEMENT_FETCH_TIMEOUT_MS,
  8000,
);

// Useful for logs/diagnostics
export const RUNTIME_FLAGS = {
  IS_DEV,
  NODE_ENV,
  HAS_REMOTE_SOURCE: !!SUPABASE_URL && !!SUPABASE_ANON_KEY,
  HAS_FILE_STORAGE: !!STORAGE_DIR,
};
