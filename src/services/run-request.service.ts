// ═════════════════════════════════════════════════════════════════════════════
// RUN REQUEST SERVICE — Validate and normalize /run parameters
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Responsibility:
 * - Describe the RunRequest body as a zod schema
 * - Normalize fields (uppercase dates and country, trimmed line tokens)
 * - Turn zod issues into a ValidationError the route maps to 400
 *
 * Validation is all-or-nothing: any failing field rejects the request.
 */

import { z } from "zod";
import { isReportDate } from "./report-date.service";
import type { ValidatedRunRequest, ValidationIssue } from "../utils/types";

// A line token: optional sign, then decimal digits
const INTEGER_TOKEN = /^[+-]?\d+$/;

function isLineToken(token: string): boolean {
  return INTEGER_TOKEN.test(token) && Number.isSafeInteger(Number(token));
}

const LINES_MESSAGE = "lines must be comma-separated integers, e.g., '6,17'";
const COUNTRY_MESSAGE = "country must be ISO code like 'SG' or 'SGP'";

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((i) => i.message).join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

function requiredString(field: string) {
  return z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  });
}

function dateMessage(field: string, example: string): string {
  return `${field} must be DDMMMYYYY, e.g., ${example}`;
}

/**
 * Splits a comma-separated line list into trimmed, non-blank tokens.
 */
export function splitLineTokens(lines: string): string[] {
  return lines
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p !== "");
}

export const zRunRequest = z.object(
  {
    from_date: requiredString("from_date")
      .transform((v) => v.toUpperCase())
      .refine(isReportDate, { message: dateMessage("from_date", "31AUG2019") }),

    // null, missing and "" all mean "no previous date"
    to_date: z
      .string({ invalid_type_error: "to_date must be a string" })
      .nullish()
      .transform((v) => (v ? v.toUpperCase() : null))
      .refine((v) => v === null || isReportDate(v), {
        message: dateMessage("to_date", "31JUL2019"),
      }),

    lines: requiredString("lines").transform((v, ctx) => {
      const parts = splitLineTokens(v);
      if (parts.length === 0 || !parts.every(isLineToken)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: LINES_MESSAGE });
        return z.NEVER;
      }
      return parts.join(",");
    }),

    country: requiredString("country")
      .transform((v) => v.trim().toUpperCase())
      .refine((v) => v.length === 2 || v.length === 3, { message: COUNTRY_MESSAGE }),
  },
  {
    required_error: "Request body must be a JSON object",
    invalid_type_error: "Request body must be a JSON object",
  }
);

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? String(issue.path[0]) : "body",
    message: issue.message,
  }));
}

/**
 * Validates a raw /run body.
 *
 * @throws ValidationError listing every failing field
 */
export function validateRunRequest(body: unknown): ValidatedRunRequest {
  const parsed = zRunRequest.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}
