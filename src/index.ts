// ═════════════════════════════════════════════════════════════════════════════
// MAIN — Server startup and shutdown
// ═════════════════════════════════════════════════════════════════════════════

/**
 * This file:
 * 1. Logs boot information
 * 2. Builds the Express app
 * 3. Starts the HTTP server
 * 4. Closes the server and the database pool on SIGINT/SIGTERM
 */

import type { Server } from "node:http";
import { createApp } from "./app";
import { APP_CONFIG, logBootInfo } from "./utils/config";
import { closeDatabase } from "./utils/database";
import { logError } from "./utils/logger";

function listen(): Promise<Server> {
  const app = createApp();
  return new Promise((resolve, reject) => {
    const server = app.listen(APP_CONFIG.port, APP_CONFIG.host, () => resolve(server));
    server.once("error", reject);
  });
}

function shutdown(server: Server, signal: string): void {
  console.log(`[shutdown] ${signal} received, closing`);
  server.close((closeErr) => {
    if (closeErr) logError("shutdown", "server_close", closeErr);
    closeDatabase()
      .then(() => process.exit(closeErr ? 1 : 0))
      .catch((err: unknown) => {
        logError("shutdown", "database_close", err);
        process.exit(1);
      });
  });
}

/**
 * Performs startup:
 * 1. Logs configuration (nothing is required; /test reports what is missing)
 * 2. Starts listening for HTTP requests
 */
async function startup(): Promise<void> {
  logBootInfo();

  const server = await listen();
  const { host, port } = APP_CONFIG;
  console.log(`🚀 LCR run service running on http://${host}:${port}`);
  console.log(`   GET  /  |  GET /api/hello`);
  console.log(`   GET  /test`);
  console.log(`   POST /run  { "from_date": "31AUG2019", "lines": "6,17", "country": "SG" }`);

  process.once("SIGINT", () => shutdown(server, "SIGINT"));
  process.once("SIGTERM", () => shutdown(server, "SIGTERM"));
}

// Execute startup sequence
startup().catch((err) => {
  console.error("[startup] Fatal error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
