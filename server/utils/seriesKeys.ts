/**
 * Helpers for the chronological keys that identify chart points: "HH:MM" for
 * intraday charts and the day number for monthly charts.
 */

import { format, getDate, isValid, parseISO } from 'date-fns';
import type { ChartMode } from '../types/telemetry';

const TIME_PATTERN = /(?<!\d)(\d{1,2}):(\d{2})(?!\d)/;
const LEADING_TIME_PATTERN = /^(\d{1,2}):(\d{2})/;
const LEADING_DAY_PATTERN = /^(\d+)/;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

export interface TimeKeyMatch {
  key: string;
  index: number;
  length: number;
}

function formatTimeKey(hours: number, minutes: number): string {
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Find the first H:MM / HH:MM time of day in a text
 */
export function findTimeKey(text: string): TimeKeyMatch | null {
  const pattern = new RegExp(TIME_PATTERN.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    if (hours < 24 && minutes < 60) {
      return { key: formatTimeKey(hours, minutes), index: match.index, length: match[0].length };
    }
  }
  return null;
}

/**
 * Day number from a label such as "15 - June", "15 June" or "Day 15"
 */
export function extractDayKey(value: string | null | undefined, maxDay = 31): string | null {
  if (!value) {
    return null;
  }
  const match = /\d+/.exec(value);
  if (!match) {
    return null;
  }
  const day = parseInt(match[0], 10);
  return day >= 1 && day <= maxDay ? String(day) : null;
}

/**
 * Sort rank of a key: minutes since midnight, day of month, or null when the
 * key has no sortable prefix
 */
export function chronologicalRank(key: string): number | null {
  const time = LEADING_TIME_PATTERN.exec(key);
  if (time) {
    return Number(time[1]) * 60 + Number(time[2]);
  }
  const day = LEADING_DAY_PATTERN.exec(key);
  if (day) {
    return parseInt(day[1], 10);
  }
  return null;
}

/**
 * Comparator for keys; unparsable keys rank as zero
 */
export function compareKeys(a: string, b: string): number {
  const rankA = chronologicalRank(a) ?? 0;
  const rankB = chronologicalRank(b) ?? 0;
  if (rankA !== rankB) {
    return rankA - rankB;
  }
  return a.localeCompare(b);
}

function keyFromDate(date: Date, mode: ChartMode): string {
  return mode === 'monthly' ? String(getDate(date)) : format(date, 'HH:mm');
}

/**
 * Derive the chart key for a value read from the reference store's native
 * date/time column
 */
export function referenceKey(value: unknown, mode: ChartMode): string | null {
  if (value instanceof Date) {
    return isValid(value) ? keyFromDate(value, mode) : null;
  }

  if (typeof value === 'number' && Number.isInteger(value)) {
    return mode === 'monthly' ? extractDayKey(String(value)) : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (ISO_DATE_PREFIX.test(text)) {
    const parsed = parseISO(text.replace(' ', 'T'));
    if (isValid(parsed)) {
      return keyFromDate(parsed, mode);
    }
  }

  return mode === 'monthly' ? extractDayKey(text) : findTimeKey(text)?.key ?? null;
}
