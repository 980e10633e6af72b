// ═════════════════════════════════════════════════════════════════════════════
// TYPES — Shared type definitions used across routes, controllers, and services
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Request body for the /run endpoint, as the UI sends it.
 * Everything is unchecked until it passes the run-request validator.
 */
export interface RunRequestBody {
  from_date?: unknown;
  to_date?: unknown;
  lines?: unknown;
  country?: unknown;
}

/**
 * A RunRequest after validation: dates uppercased, lines re-joined without
 * blanks ("6,17"), country trimmed and uppercased.
 */
export interface ValidatedRunRequest {
  from_date: string;
  to_date:   string | null;
  lines:     string;
  country:   string;
}

/** A calendar date as the report understands it (month is 1-12). */
export interface ReportDate {
  year:  number;
  month: number;
  day:   number;
}

/**
 * One row of the simulated report dataset.
 * Keys are upper case to match the columns of the downstream dataset.
 */
export interface OutputRow {
  COUNTRY:     string;
  LINE:        number;
  REPORT_DATE: string;
  PREV_DATE:   string;
  VALUE:       number;
  PREV_VALUE:  number | "";
  DELTA:       number | "";
}

/**
 * Response from the /run endpoint.
 */
export interface RunResponse {
  rows: OutputRow[];
}

/**
 * Response from the /test endpoint.
 */
export interface DiagnosticReport {
  backend:           string;
  database:          string;
  database_url:      string | null;
  database_name:     string | null;
  connection_status: "Connected" | "Not Connected";
  collections:       string[];
}

/**
 * Response from the greeting endpoints.
 */
export interface GreetingResponse {
  message: string;
}

export interface ValidationIssue {
  field:   string;
  message: string;
}

/**
 * Error response for all endpoints.
 */
export interface ErrorResponse {
  error:   string;
  issues?: ValidationIssue[];
}
