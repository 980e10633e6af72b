// ═════════════════════════════════════════════════════════════════════════════
// RUN ROUTE — Handles POST /run endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * ROUTE RESPONSIBILITY: Receive HTTP request, call controller, send HTTP response
 *
 * Route: POST /run
 * Purpose: Accept report parameters from the UI and return the report rows
 *
 * Request body:
 *   {
 *     "from_date": "31AUG2019",
 *     "to_date":   "31JUL2019",      (optional)
 *     "lines":     "6,17",
 *     "country":   "SG"
 *   }
 *
 * Response (200 OK):
 *   {
 *     "rows": [
 *       { "COUNTRY": "SG", "LINE": 6, "REPORT_DATE": "31Aug2019", "PREV_DATE": "31Jul2019",
 *         "VALUE": 1234.56, "PREV_VALUE": 1200.12, "DELTA": 34.44 }
 *     ]
 *   }
 *
 * Response (400 Bad Request):
 *   { "error": "lines must be comma-separated integers, e.g., '6,17'",
 *     "issues": [{ "field": "lines", "message": "..." }] }
 *
 * Response (500 Internal Server Error):
 *   { "error": "Error message describing what went wrong" }
 */

import { Router, type Request, type Response } from "express";
import { executeRun } from "../controllers/run.controller";
import { ValidationError } from "../services/run-request.service";
import { requestId } from "../middleware/request-id";
import { log, logError } from "../utils/logger";
import type { ErrorResponse, RunResponse } from "../utils/types";

export const runRouter = Router();

runRouter.post("/run", (req: Request, res: Response) => {
  const reqId  = requestId(res);
  const tTotal = Date.now();

  log(reqId, "request_received", { method: "POST", path: "/run" });

  try {
    const result = executeRun(req.body, reqId);

    log(reqId, "response_sent", { status: 200, totalMs: result.executionTime });
    return res.json({ rows: result.rows } satisfies RunResponse);

  } catch (err) {
    // ────────────────────────────────────────────────────────────────────────
    // VALIDATION: Bad parameters are the caller's fault → 400
    // ────────────────────────────────────────────────────────────────────────
    if (err instanceof ValidationError) {
      log(reqId, "validation_failed", { fields: err.issues.map((i) => i.field).join(",") });
      log(reqId, "response_sent", { status: 400, totalMs: Date.now() - tTotal });
      return res.status(400).json({
        error: err.message,
        issues: err.issues,
      } satisfies ErrorResponse);
    }

    logError(reqId, "run_endpoint", err);
    log(reqId, "response_sent", { status: 500, totalMs: Date.now() - tTotal });
    return res.status(500).json({
      error: err instanceof Error ? err.message : "Unknown error",
    } satisfies ErrorResponse);
  }
});
