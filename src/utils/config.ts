// ═════════════════════════════════════════════════════════════════════════════
// CONFIG — Application configuration constants and environment variables
// ═════════════════════════════════════════════════════════════════════════════

import * as dotenv from "dotenv";

dotenv.config();

// Nothing is required: the service must boot with an empty environment so the
// /test diagnostic can report what is missing.

function numberFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

// ── Application Metadata ──────────────────────────────────────────────────────────
export const APP_CONFIG = {
  name: "lcr-run-service",
  commit: process.env.GIT_COMMIT || "unknown",
  port: numberFromEnv("PORT", 8000),
  host: process.env.HOST || "0.0.0.0",
} as const;

// ── Database Configuration ────────────────────────────────────────────────────────
// DB_SSL: set "true" or "false" to force; if absent, SSL is enabled only when the
// connection string asks for it (sslmode=require).
const DB_SSL = process.env.DB_SSL !== undefined
  ? process.env.DB_SSL === "true"
  : /sslmode=require/.test(process.env.DATABASE_URL ?? "");

export const DB_CONFIG = {
  connectTimeoutMs: numberFromEnv("DB_CONNECT_TIMEOUT_MS", 5000),
  ssl: DB_SSL ? { rejectUnauthorized: false } : undefined,
  // How many table names /test shows
  collectionsLimit: 10,
} as const;

/**
 * DATABASE_URL and DATABASE_NAME are read per call, not at import, so the
 * diagnostic reflects the environment at request time.
 */
export function readDatabaseEnv(): { url: string | undefined; name: string | undefined } {
  return {
    url: process.env.DATABASE_URL || undefined,
    name: process.env.DATABASE_NAME || undefined,
  };
}

// ── Mock Report Configuration ─────────────────────────────────────────────────────
export const MOCK_CONFIG = {
  seed: numberFromEnv("MOCK_SEED", 42),
  valueRange: { min: 1000, max: 5000 },
  prevFactorRange: { min: 0.9, max: 1.1 },
} as const;

// ── Environment Detection ─────────────────────────────────────────────────────────
export const ENV = {
  isProd: process.env.NODE_ENV === "production",
  isTest: process.env.NODE_ENV === "test",
  sslEnabled: DB_SSL,
} as const;

export type LogLevel = "silent" | "error" | "info";

function resolveLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (raw === "silent" || raw === "error" || raw === "info") return raw;
  return ENV.isTest ? "silent" : "info";
}

export const LOG_CONFIG = {
  level: resolveLogLevel(),
} as const;

// ── Logging Boot Information ──────────────────────────────────────────────────────
export function logBootInfo(): void {
  const db = readDatabaseEnv();
  console.log(`[BOOT] ${APP_CONFIG.name} commit = ${APP_CONFIG.commit}`);
  console.log(`[BOOT] DATABASE_URL ${db.url ? "set" : "not set"} DB_SSL=${ENV.sslEnabled}`);
  console.log(`[BOOT] mock seed = ${MOCK_CONFIG.seed}`);
}
