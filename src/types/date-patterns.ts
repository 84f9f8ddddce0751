/**
 * Type definitions for date/time pattern recognition
 */

/**
 * Canonical format tokens, listed in recognition precedence
 */
export const DATE_FORMAT_TOKENS = [
  "datetime",
  "datetime-local",
  "http-date",
  "yyyy-mm-dd",
  "yyyy/mm/dd",
  "dd-mm-yyyy",
  "dd/mm/yyyy",
  "yyyymmdd",
  "ddmmyyyy",
  "month dd, yyyy",
  "dd month yyyy",
  "yyyy-mm",
  "mm-yyyy",
] as const;

export type DateFormatToken = (typeof DATE_FORMAT_TOKENS)[number];

/**
 * Calendar fields extracted from a candidate string
 */
export interface DateParts {
  year: number;
  month: number;
  /** Absent for month-precision shapes such as yyyy-mm */
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
}
