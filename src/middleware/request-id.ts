// ═════════════════════════════════════════════════════════════════════════════
// REQUEST ID — Tag every request with an id for log correlation
// ═════════════════════════════════════════════════════════════════════════════

import type { RequestHandler, Response } from "express";
import { genId } from "../utils/logger";

const HEADER = "x-request-id";

/**
 * Reuses the caller's x-request-id when present, otherwise generates one.
 * The id is echoed back on the response.
 */
export const requestIdMiddleware = (): RequestHandler => {
  return (req, res, next) => {
    const hdr = req.headers[HEADER];
    const id  = (Array.isArray(hdr) ? hdr[0] : hdr) || genId();
    res.locals.reqId = id;
    res.setHeader(HEADER, id);
    next();
  };
};

export function requestId(res: Response): string {
  const id: unknown = res.locals.reqId;
  return typeof id === "string" ? id : "-";
}
