// ═════════════════════════════════════════════════════════════════════════════
// MOCK REPORT SERVICE — Fabricate report rows from a seeded generator
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Stands in for the downstream report job: instead of running it and reading
 * back its dataset, rows are synthesized from a seeded pseudo-random source so
 * the UI can be developed against stable output.
 *
 * Each call gets its own generator; nothing is shared between requests.
 */

import { MOCK_CONFIG } from "../utils/config";
import type { OutputRow, ReportDate } from "../utils/types";
import { formatReportDate } from "./report-date.service";
import { splitLineTokens } from "./run-request.service";

/** Source of floats in [0, 1). */
export type RandomSource = () => number;

export interface MockReportParams {
  reportDate:   ReportDate;
  previousDate: ReportDate | null;
  lines:        number[];
  country:      string;
}

/**
 * Mulberry32: a 32-bit seeded generator. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Turns a normalized line list ("6,17") into line numbers, in order.
 */
export function parseLineNumbers(lines: string): number[] {
  return splitLineTokens(lines).map((p) => parseInt(p, 10));
}

/**
 * Produces one row per line number.
 *
 * Draw order matters for reproducibility: per line, the base value is drawn
 * first, then the previous-value factor (only when a previous date is given).
 */
export function generateMockRows(
  params: MockReportParams,
  random: RandomSource = createSeededRandom(MOCK_CONFIG.seed)
): OutputRow[] {
  const { valueRange, prevFactorRange } = MOCK_CONFIG;
  const reportDate = formatReportDate(params.reportDate);
  const prevDate   = params.previousDate ? formatReportDate(params.previousDate) : "";

  return params.lines.map((line) => {
    const value = round2(uniform(random, valueRange.min, valueRange.max) * (1 + line / 100));
    const prevValue = params.previousDate
      ? round2(value * uniform(random, prevFactorRange.min, prevFactorRange.max))
      : null;

    return {
      COUNTRY:     params.country,
      LINE:        line,
      REPORT_DATE: reportDate,
      PREV_DATE:   prevDate,
      VALUE:       value,
      PREV_VALUE:  prevValue ?? "",
      DELTA:       prevValue !== null ? round2(value - prevValue) : "",
    };
  });
}
