// ═════════════════════════════════════════════════════════════════════════════
// APP — Express application factory
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Builds the application without listening, so tests can drive it in process.
 *
 *              HTTP Request
 *                   ↓
 *              ROUTES Layer
 *        (HTTP parsing & status codes)
 *                   ↓
 *           CONTROLLERS Layer
 *          (orchestration, logging)
 *                   ↓
 *            SERVICES Layer
 *   (validation, report dates, mock rows)
 *                   ↓
 *        Optional database (/test only)
 */

import express, { type Express } from "express";
import cors from "cors";
import { greetingRouter } from "./routes/greeting.route";
import { runRouter } from "./routes/run.route";
import { createDiagnosticsRouter } from "./routes/diagnostics.route";
import { requestIdMiddleware } from "./middleware/request-id";
import { errorHandler, notFoundHandler } from "./middleware/errors";
import { type DatabaseResolver, resolveDatabase as defaultResolver } from "./utils/database";

export interface AppOptions {
  /** How GET /test finds the optional database. */
  resolveDatabase?: DatabaseResolver;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  // ── Middleware ──────────────────────────────────────────────────────────────
  app.disable("x-powered-by");
  // Any origin, with credentials: the origin is reflected rather than "*"
  app.use(cors({ origin: true, credentials: true }));
  app.use(requestIdMiddleware());
  app.use(express.json());

  // ── Register Routes ─────────────────────────────────────────────────────────
  app.use(greetingRouter);                                                      // GET /, GET /api/hello
  app.use(createDiagnosticsRouter(options.resolveDatabase ?? defaultResolver)); // GET /test
  app.use(runRouter);                                                           // POST /run

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
