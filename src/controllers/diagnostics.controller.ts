// ═════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS CONTROLLER — Reports whether the optional database is usable
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Never throws. Every outcome of the probe, including a missing driver or a
 * missing DATABASE_URL, is reported as text in the diagnostic.
 */

import { DatabaseModuleMissingError, type DatabaseResolver } from "../utils/database";
import { DB_CONFIG, readDatabaseEnv } from "../utils/config";
import type { DiagnosticReport } from "../utils/types";
import { log } from "../utils/logger";

// Error details are clipped so the report stays one line per field
const DETAIL_LIMIT = 50;

function detail(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.slice(0, DETAIL_LIMIT);
}

export async function runDiagnostics(
  resolveDatabase: DatabaseResolver,
  reqId: string
): Promise<DiagnosticReport> {
  const report: DiagnosticReport = {
    backend: "✅ Running",
    database: "❌ Not Available",
    database_url: null,
    database_name: null,
    connection_status: "Not Connected",
    collections: [],
  };

  try {
    const db = await resolveDatabase();

    if (db) {
      report.database = "✅ Available";
      report.connection_status = "Connected";

      try {
        const collections = await db.listCollections();
        report.collections = collections.slice(0, DB_CONFIG.collectionsLimit);
        report.database = "✅ Connected & Working";
      } catch (err) {
        report.database = `⚠️  Connected but Error: ${detail(err)}`;
      }
    } else {
      report.database = "⚠️  Available but not initialized";
    }
  } catch (err) {
    report.database = err instanceof DatabaseModuleMissingError
      ? "❌ Database module not found (install pg and drizzle-orm to enable it)"
      : `❌ Error: ${detail(err)}`;
  }

  // Presence only; values are never echoed back
  const env = readDatabaseEnv();
  report.database_url  = env.url ? "✅ Set" : "❌ Not Set";
  report.database_name = env.name ? "✅ Set" : "❌ Not Set";

  log(reqId, "diagnostics_done", {
    connection_status: report.connection_status,
    collections: report.collections.length,
  });

  return report;
}
