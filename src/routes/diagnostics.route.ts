// ═════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS ROUTE — Handles GET /test endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Route: GET /test
 * Purpose: Tell an operator whether the optional database is reachable
 *
 * Always 200: a missing driver, a missing DATABASE_URL or an unreachable
 * server are all reported in the body.
 *
 * Response (200 OK):
 *   {
 *     "backend": "✅ Running",
 *     "database": "✅ Connected & Working",
 *     "database_url": "✅ Set",
 *     "database_name": "❌ Not Set",
 *     "connection_status": "Connected",
 *     "collections": ["report_runs"]
 *   }
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { runDiagnostics } from "../controllers/diagnostics.controller";
import { requestId } from "../middleware/request-id";
import type { DatabaseResolver } from "../utils/database";
import { log } from "../utils/logger";

export function createDiagnosticsRouter(resolveDatabase: DatabaseResolver): Router {
  const router = Router();

  router.get("/test", async (_req: Request, res: Response, next: NextFunction) => {
    const reqId = requestId(res);
    log(reqId, "request_received", { method: "GET", path: "/test" });

    try {
      const report = await runDiagnostics(resolveDatabase, reqId);
      res.json(report);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
