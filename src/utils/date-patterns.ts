/**
 * Date/time pattern recognition for keys and string values
 *
 * The same recognizer serves key abstraction (date-shaped object keys become
 * placeholders) and value annotation (string leaves get a `format`).
 */

import type { DateFormatToken, DateParts } from "../types/date-patterns.js";

/**
 * A recognizable date/time shape
 */
export interface DatePatternDefinition {
  token: DateFormatToken;
  regex: RegExp;
  description: string;
  /** Pull calendar fields out of a regex match, or null when a field is not a number/month name */
  extract: (match: RegExpExecArray) => DateParts | null;
}

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const MONTH_ABBREVIATIONS = MONTH_NAMES.map((name) => name.slice(0, 3));

// Longest recognized shape is a datetime with nanoseconds and an offset
const MAX_CANDIDATE_LENGTH = 40;

/**
 * Resolve a full English month name (case-insensitive) to 1-12
 */
export function monthFromName(name: string): number | null {
  const index = MONTH_NAMES.indexOf(name.toLowerCase());
  return index === -1 ? null : index + 1;
}

function int(text: string | undefined): number | undefined {
  return text === undefined ? undefined : parseInt(text, 10);
}

function timestampParts(match: RegExpExecArray): DateParts {
  return {
    year: parseInt(match[1], 10),
    month: parseInt(match[2], 10),
    day: parseInt(match[3], 10),
    hour: parseInt(match[4], 10),
    minute: parseInt(match[5], 10),
    second: int(match[6]),
  };
}

/**
 * Built-in date/time patterns in precedence order: a stricter shape is
 * always tried before a looser one that could shadow it.
 */
export const DATE_PATTERNS: readonly DatePatternDefinition[] = [
  {
    token: "datetime",
    regex:
      /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-](?:[01]\d|2[0-3]):?[0-5]\d)$/i,
    description: "ISO 8601 date-time with UTC marker or offset",
    extract: timestampParts,
  },
  {
    token: "datetime-local",
    regex: /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?$/,
    description: "ISO 8601 date-time without offset",
    extract: timestampParts,
  },
  {
    token: "http-date",
    regex:
      /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/,
    description: "RFC 7231 HTTP date",
    extract: (match) => ({
      year: parseInt(match[3], 10),
      month: MONTH_ABBREVIATIONS.indexOf(match[2].toLowerCase()) + 1,
      day: parseInt(match[1], 10),
      hour: parseInt(match[4], 10),
      minute: parseInt(match[5], 10),
      second: parseInt(match[6], 10),
    }),
  },
  {
    token: "yyyy-mm-dd",
    regex: /^(\d{4})-(\d{2})-(\d{2})$/,
    description: "ISO calendar date, e.g. 2021-11-08",
    extract: (match) => ({
      year: parseInt(match[1], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[3], 10),
    }),
  },
  {
    token: "yyyy/mm/dd",
    regex: /^(\d{4})\/(\d{2})\/(\d{2})$/,
    description: "Slash-separated calendar date, e.g. 2021/11/08",
    extract: (match) => ({
      year: parseInt(match[1], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[3], 10),
    }),
  },
  {
    token: "dd-mm-yyyy",
    regex: /^(\d{2})-(\d{2})-(\d{4})$/,
    description: "Day-first date, e.g. 08-11-2021",
    extract: (match) => ({
      year: parseInt(match[3], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[1], 10),
    }),
  },
  {
    token: "dd/mm/yyyy",
    regex: /^(\d{2})\/(\d{2})\/(\d{4})$/,
    description: "Day-first slash date, e.g. 08/11/2021",
    extract: (match) => ({
      year: parseInt(match[3], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[1], 10),
    }),
  },
  {
    token: "yyyymmdd",
    regex: /^(\d{4})(\d{2})(\d{2})$/,
    description: "Compact date, e.g. 20211108",
    extract: (match) => ({
      year: parseInt(match[1], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[3], 10),
    }),
  },
  {
    token: "ddmmyyyy",
    regex: /^(\d{2})(\d{2})(\d{4})$/,
    description: "Compact day-first date, e.g. 08112021",
    extract: (match) => ({
      year: parseInt(match[3], 10),
      month: parseInt(match[2], 10),
      day: parseInt(match[1], 10),
    }),
  },
  {
    token: "month dd, yyyy",
    regex: /^([A-Za-z]+) (\d{1,2}), (\d{4})$/,
    description: "Month-name date, e.g. November 08, 2021",
    extract: (match) => {
      const month = monthFromName(match[1]);
      return month === null
        ? null
        : { year: parseInt(match[3], 10), month, day: parseInt(match[2], 10) };
    },
  },
  {
    token: "dd month yyyy",
    regex: /^(\d{1,2}) ([A-Za-z]+) (\d{4})$/,
    description: "Day-first month-name date, e.g. 08 November 2021",
    extract: (match) => {
      const month = monthFromName(match[2]);
      return month === null
        ? null
        : { year: parseInt(match[3], 10), month, day: parseInt(match[1], 10) };
    },
  },
  {
    token: "yyyy-mm",
    regex: /^(\d{4})-(\d{2})$/,
    description: "Year and month, e.g. 2021-11",
    extract: (match) => ({
      year: parseInt(match[1], 10),
      month: parseInt(match[2], 10),
    }),
  },
  {
    token: "mm-yyyy",
    regex: /^(\d{2})-(\d{4})$/,
    description: "Month and year, e.g. 11-2021",
    extract: (match) => ({
      year: parseInt(match[2], 10),
      month: parseInt(match[1], 10),
    }),
  },
];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month of the proleptic Gregorian calendar
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Check that extracted fields name a real calendar instant
 */
export function isValidDateParts(parts: DateParts): boolean {
  if (parts.year < 1 || parts.month < 1 || parts.month > 12) {
    return false;
  }

  if (
    parts.day !== undefined &&
    (parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month))
  ) {
    return false;
  }

  if (parts.hour !== undefined && parts.hour > 23) return false;
  if (parts.minute !== undefined && parts.minute > 59) return false;
  if (parts.second !== undefined && parts.second > 59) return false;

  return true;
}

/**
 * Test a string against a single pattern, including calendar validity
 */
export function matchesDatePattern(
  text: string,
  pattern: DatePatternDefinition,
): boolean {
  const match = pattern.regex.exec(text);
  if (!match) {
    return false;
  }

  const parts = pattern.extract(match);
  return parts !== null && isValidDateParts(parts);
}

/**
 * Recognize a date/time shape
 *
 * @param text - Object key or string value
 * @returns The first matching token in precedence order, or undefined
 *
 * @example
 * recognizeDatePattern("2024-03-20T15:30:00Z"); // "datetime"
 * recognizeDatePattern("2024/01/15");           // "yyyy/mm/dd"
 * recognizeDatePattern("2024-13-01");           // undefined
 */
export function recognizeDatePattern(
  text: string,
  patterns: readonly DatePatternDefinition[] = DATE_PATTERNS,
): DateFormatToken | undefined {
  if (text.length === 0 || text.length > MAX_CANDIDATE_LENGTH) {
    return undefined;
  }

  for (const pattern of patterns) {
    if (matchesDatePattern(text, pattern)) {
      return pattern.token;
    }
  }

  return undefined;
}
