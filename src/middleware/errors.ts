// ═════════════════════════════════════════════════════════════════════════════
// ERRORS — Fallback 404 and error handlers
// ═════════════════════════════════════════════════════════════════════════════

import type { ErrorRequestHandler, RequestHandler } from "express";
import { log, logError } from "../utils/logger";
import type { ErrorResponse } from "../utils/types";
import { requestId } from "./request-id";

// body-parser marks unparsable JSON with this type (status 400)
function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    const body: ErrorResponse = { error: `Not found: ${req.method} ${req.path}` };
    res.status(404).json(body);
  };
};

export const errorHandler = (): ErrorRequestHandler => {
  return (err: unknown, req, res, _next) => {
    const reqId = requestId(res);

    if (isMalformedJson(err)) {
      log(reqId, "validation_failed", { reason: "malformed_json" });
      const body: ErrorResponse = { error: "Malformed JSON body" };
      res.status(400).json(body);
      return;
    }

    logError(reqId, `${req.method} ${req.path}`, err);
    const body: ErrorResponse = {
      error: err instanceof Error ? err.message : "Unknown error",
    };
    res.status(500).json(body);
  };
};
