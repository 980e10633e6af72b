// ═════════════════════════════════════════════════════════════════════════════
// RUN CONTROLLER — Orchestrates the mock report run
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Responsibility:
 * - Validate the run parameters
 * - Parse dates and line numbers
 * - Generate the simulated report rows
 *
 * In a real deployment this is where the report job would be submitted and its
 * output dataset read back. Here the rows come from the mock report service.
 *
 * Controllers are independent of Express: they take inputs and return outputs.
 */

import { validateRunRequest } from "../services/run-request.service";
import { parseReportDate } from "../services/report-date.service";
import { generateMockRows, parseLineNumbers } from "../services/mock-report.service";
import type { OutputRow, ReportDate } from "../utils/types";
import { log, logError } from "../utils/logger";

function requireDate(text: string, field: string): ReportDate {
  const date = parseReportDate(text);
  if (!date) {
    throw new Error(`${field} could not be parsed: ${text}`);
  }
  return date;
}

/**
 * Executes a run:
 *
 * 1. VALIDATION: Check and normalize the raw body (throws ValidationError)
 * 2. PARSING: Report date, optional previous date, line numbers
 * 3. GENERATION: One mock row per line number
 */
export function executeRun(
  body: unknown,
  reqId: string
): { rows: OutputRow[]; executionTime: number } {
  const tTotal = Date.now();

  try {
    const request = validateRunRequest(body);
    log(reqId, "input_validated", {
      from_date: request.from_date,
      to_date: request.to_date ?? "",
      lines: request.lines,
      country: request.country,
    });

    const reportDate   = requireDate(request.from_date, "from_date");
    const previousDate = request.to_date ? requireDate(request.to_date, "to_date") : null;
    const lines        = parseLineNumbers(request.lines);

    const rows = generateMockRows({ reportDate, previousDate, lines, country: request.country });

    const executionTime = Date.now() - tTotal;
    log(reqId, "rows_generated", { rows: rows.length, totalMs: executionTime });

    return { rows, executionTime };
  } catch (err) {
    logError(reqId, "run", err);
    throw err; // Re-throw to be handled by route
  }
}
