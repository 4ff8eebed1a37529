/**
 * Date utilities for the chart telemetry reconciler
 *
 * Dates travel through the pipeline as YYYY-MM-DD strings and months as
 * YYYY-MM strings, matching the dashboard's date pickers.
 */

import { endOfMonth, format, isValid, parseISO, startOfMonth } from 'date-fns';
import { ValidationError } from './errors';

// Standard date format used across the application: YYYY-MM-DD
export const DATE_FORMAT_REGEX = /^\d{4}-\d{2}-\d{2}$/;
export const YEAR_MONTH_FORMAT_REGEX = /^\d{4}-\d{2}$/;

/**
 * Validate a date string in YYYY-MM-DD format
 */
export function isValidDateString(dateStr: string): boolean {
  if (!DATE_FORMAT_REGEX.test(dateStr)) {
    return false;
  }
  return isValid(parseISO(dateStr));
}

/**
 * Validate a year-month string in YYYY-MM format
 */
export function isValidYearMonth(yearMonth: string): boolean {
  if (!YEAR_MONTH_FORMAT_REGEX.test(yearMonth)) {
    return false;
  }
  const month = Number(yearMonth.slice(5, 7));
  return month >= 1 && month <= 12;
}

/**
 * Parse a date string and ensure it's valid
 * Throws ValidationError if invalid
 */
export function parseDate(dateStr: string): Date {
  if (!isValidDateString(dateStr)) {
    throw new ValidationError(`Invalid date format: '${dateStr}'. Expected format: YYYY-MM-DD`);
  }
  return parseISO(dateStr);
}

/**
 * Format a Date object to YYYY-MM-DD string
 */
export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * First and last calendar day of a YYYY-MM month
 */
export function getMonthBounds(yearMonth: string): { startDate: string; endDate: string } {
  if (!isValidYearMonth(yearMonth)) {
    throw new ValidationError(`Invalid year-month format: '${yearMonth}'. Expected format: YYYY-MM`);
  }
  const first = parseISO(`${yearMonth}-01`);
  return {
    startDate: formatDate(startOfMonth(first)),
    endDate: formatDate(endOfMonth(first))
  };
}

/**
 * Compact period label used in artifact file names, e.g. 2024-06 or 2024-06-15
 */
export function periodLabel(startDate: string, endDate: string): string {
  if (startDate === endDate) {
    return startDate;
  }
  const start = parseDate(startDate);
  const end = parseDate(endDate);
  if (formatDate(startOfMonth(start)) === startDate && formatDate(endOfMonth(start)) === endDate) {
    return format(start, 'yyyy-MM');
  }
  return `${formatDate(start)}_${formatDate(end)}`;
}
