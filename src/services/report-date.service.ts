// ═════════════════════════════════════════════════════════════════════════════
// REPORT DATE SERVICE — Parse and format DDMMMYYYY report dates
// ═════════════════════════════════════════════════════════════════════════════

import type { ReportDate } from "../utils/types";

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

// Day of one or two digits, three-letter month, four-digit year: 31AUG2019, 1AUG2019
const REPORT_DATE_PATTERN = /^(\d{1,2})([A-Z]{3})(\d{4})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Parses a DDMMMYYYY string (case-insensitive).
 * Returns null when the text does not match or names a day the month does not have.
 */
export function parseReportDate(text: string): ReportDate | null {
  const match = REPORT_DATE_PATTERN.exec(text.toUpperCase());
  if (!match) return null;

  const [, dayText, monthText, yearText] = match;
  const monthIndex = MONTHS.indexOf(monthText);
  if (monthIndex === -1) return null;

  const year  = Number(yearText);
  const month = monthIndex + 1;
  const day   = Number(dayText);
  if (year < 1 || day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function isReportDate(text: string): boolean {
  return parseReportDate(text) !== null;
}

/**
 * Formats a date the way the report dataset prints it: zero-padded day,
 * title-case month, four-digit year (31Aug2019).
 */
export function formatReportDate(date: ReportDate): string {
  const month = MONTHS[date.month - 1];
  const day   = String(date.day).padStart(2, "0");
  const year  = String(date.year).padStart(4, "0");
  return `${day}${month.charAt(0)}${month.slice(1).toLowerCase()}${year}`;
}
