// ═════════════════════════════════════════════════════════════════════════════
// GREETING ROUTE — Handles GET / and GET /api/hello
// ═════════════════════════════════════════════════════════════════════════════

/**
 * ROUTE RESPONSIBILITY: Answer static greetings so the UI and the host's
 * health checks can see the service is up.
 *
 * Request body: None
 *
 * Response (200 OK):
 *   { "message": "..." }
 */

import { Router, type Request, type Response } from "express";
import type { GreetingResponse } from "../utils/types";

export const greetingRouter = Router();

greetingRouter.get("/", (_req: Request, res: Response) => {
  res.json({ message: "Hello from the LCR run service!" } satisfies GreetingResponse);
});

/**
 * GET /api/hello
 *
 * Greeting used by the UI to check it can reach the API.
 * Does not touch the database.
 */
greetingRouter.get("/api/hello", (_req: Request, res: Response) => {
  res.json({ message: "Hello from the backend API!" } satisfies GreetingResponse);
});
