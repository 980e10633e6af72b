// ═════════════════════════════════════════════════════════════════════════════
// DATABASE — Optional database connection and connectivity probe
// ═════════════════════════════════════════════════════════════════════════════

import type { Pool } from "pg";
import type { drizzle } from "drizzle-orm/node-postgres";
import type { sql } from "drizzle-orm";
import { DB_CONFIG, readDatabaseEnv } from "./config";
import { logError } from "./logger";

/**
 * What the diagnostic needs from a database: list its tables and close it.
 */
export interface DatabaseHandle {
  listCollections(): Promise<string[]>;
  close(): Promise<void>;
}

/**
 * Resolves the optional database.
 * - throws DatabaseModuleMissingError when the driver is not installed
 * - returns null when the driver is there but no DATABASE_URL is configured
 */
export type DatabaseResolver = () => Promise<DatabaseHandle | null>;

export class DatabaseModuleMissingError extends Error {
  constructor(detail: string) {
    super(`Database driver not installed: ${detail}`);
    this.name = "DatabaseModuleMissingError";
  }
}

export interface Driver {
  Pool:    typeof Pool;
  drizzle: typeof drizzle;
  sql:     typeof sql;
}

function isModuleNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "MODULE_NOT_FOUND" || err.code === "ERR_MODULE_NOT_FOUND")
  );
}

/**
 * The driver is loaded on first use so the service still boots (and /test can
 * say so) on a deployment installed without it.
 */
async function loadDriver(): Promise<Driver> {
  try {
    const [pg, nodePg, orm] = await Promise.all([
      import("pg"),
      import("drizzle-orm/node-postgres"),
      import("drizzle-orm"),
    ]);
    return { Pool: pg.Pool, drizzle: nodePg.drizzle, sql: orm.sql };
  } catch (err) {
    if (isModuleNotFound(err)) {
      throw new DatabaseModuleMissingError(err instanceof Error ? err.message : String(err));
    }
    throw err;
  }
}

function createHandle(driver: Driver, connectionString: string): DatabaseHandle {
  const pool = new driver.Pool({
    connectionString,
    connectionTimeoutMillis: DB_CONFIG.connectTimeoutMs,
    ...(DB_CONFIG.ssl ? { ssl: DB_CONFIG.ssl } : {}),
  });
  // An idle client losing its connection must not take the process down
  pool.on("error", (err) => logError("db", "pool_error", err));

  const db = driver.drizzle(pool);

  return {
    async listCollections(): Promise<string[]> {
      const result = await db.execute<{ table_name: string }>(driver.sql`
        SELECT table_name
        FROM   information_schema.tables
        WHERE  table_schema = 'public'
        ORDER  BY table_name
      `);
      return result.rows.map((row) => row.table_name);
    },
    close: () => pool.end(),
  };
}

export type HandleFactory = (driver: Driver, connectionString: string) => DatabaseHandle;

export interface DatabaseConnection {
  resolve: DatabaseResolver;
  close:   () => Promise<void>;
}

/**
 * One pool per DATABASE_URL. When the URL changes (or is unset) between
 * probes, the old pool is ended before the next one is opened.
 */
export function createDatabaseConnection(open: HandleFactory = createHandle): DatabaseConnection {
  let cached: { url: string; handle: DatabaseHandle } | undefined;

  async function close(): Promise<void> {
    const current = cached;
    cached = undefined;
    if (current) {
      await current.handle.close();
    }
  }

  async function resolve(): Promise<DatabaseHandle | null> {
    const driver = await loadDriver();
    const { url } = readDatabaseEnv();

    if (cached && cached.url !== url) {
      await close();
    }
    if (!url) return null;

    if (!cached) {
      cached = { url, handle: open(driver, url) };
    }
    return cached.handle;
  }

  return { resolve, close };
}

const defaultConnection = createDatabaseConnection();

/** Default resolver, shared by the app and the shutdown hook. */
export const resolveDatabase: DatabaseResolver = defaultConnection.resolve;

/**
 * Closes the pool if one was opened. Safe to call more than once.
 */
export const closeDatabase = defaultConnection.close;
