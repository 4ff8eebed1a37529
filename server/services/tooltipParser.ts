/**
 * Tooltip Parser
 *
 * Turns the text of a chart hover tooltip into a chronological key and a map
 * of parameter values. The dashboard exposes no structured data, so this is a
 * layered set of text heuristics; everything downstream depends only on the
 * ParsedTooltip shape.
 *
 * Order of extraction, first success per field wins:
 *   1. time of day (intraday charts) becomes the key and is cut from the text
 *   2. "<name>: <value>" for each target parameter
 *   3. "<name> - <value>" for target parameters still missing
 *   4. every other "<token>: <value>" / "<token> - <value>" pair
 */

import type { ChartMode, ParsedTooltip } from '../types/telemetry';
import { extractDayKey, findTimeKey } from '../utils/seriesKeys';

export interface TooltipParseOptions {
  mode: ChartMode;
  keyField: string;
  // upper bound for day keys on monthly charts
  maxDay?: number;
}

type Separator = ':' | '-';

// A value runs to the end of the line or the next "|"
const VALUE_PATTERN = '([^\\n|]*)';

const HARVEST_PATTERN = /([A-Za-z][A-Za-z0-9 ]*?)[ \t]*(?::|[ \t]-[ \t])[ \t]*([^\n|]+)/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchNamedValue(text: string, name: string, separator: Separator): string | null {
  const separatorPattern = separator === ':' ? '[ \\t]*:' : '[ \\t]*-';
  const pattern = new RegExp(
    `(?<![A-Za-z0-9])${escapeRegExp(name)}${separatorPattern}[ \\t]*${VALUE_PATTERN}`,
    'i'
  );
  const match = pattern.exec(text);
  return match ? match[1].trim() : null;
}

function findNamedValue(text: string, name: string): string | null {
  return matchNamedValue(text, name, ':') ?? matchNamedValue(text, name, '-');
}

function hasFieldIgnoreCase(fields: Map<string, string | null>, name: string): boolean {
  const lower = name.toLowerCase();
  for (const existing of fields.keys()) {
    if (existing.toLowerCase() === lower) {
      return true;
    }
  }
  return false;
}

/**
 * Every "<token>: <value>" or "<token> - <value>" pair in a text, in order
 */
export function harvestPairs(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const match of text.matchAll(HARVEST_PATTERN)) {
    pairs.push([match[1].trim(), match[2].trim()]);
  }
  return pairs;
}

/**
 * Parse tooltip text. Returns null when there is no text at all; a result with
 * a null key means the text carried no usable key.
 *
 * Target parameters that are not found are present in `fields` as null, a
 * parameter shown without a value is present as "".
 */
export function parseTooltip(
  rawText: string | null | undefined,
  targetParameters: readonly string[],
  options: TooltipParseOptions
): ParsedTooltip | null {
  if (!rawText || rawText.trim().length === 0) {
    return null;
  }

  const keyFieldLower = options.keyField.toLowerCase();
  let searchText = rawText;
  let key: string | null = null;

  if (options.mode === 'intraday') {
    const time = findTimeKey(rawText);
    if (time) {
      key = time.key;
      searchText = rawText.slice(0, time.index) + rawText.slice(time.index + time.length);
    }
  } else {
    key = extractDayKey(findNamedValue(rawText, options.keyField), options.maxDay);
  }

  const fields = new Map<string, string | null>();

  for (const name of targetParameters) {
    if (name.toLowerCase() === keyFieldLower || hasFieldIgnoreCase(fields, name)) {
      continue;
    }
    fields.set(name, findNamedValue(searchText, name));
  }

  for (const [token, value] of harvestPairs(searchText)) {
    if (token.toLowerCase() === keyFieldLower || hasFieldIgnoreCase(fields, token)) {
      continue;
    }
    fields.set(token, value);
  }

  return { key, fields, rawText };
}

/**
 * Leading numeric part of a display value: "29.88 A" -> "29.88",
 * "1,204.5 kWh" -> "1204.5". Values without digits pass through unchanged.
 */
export function cleanNumericValue(value: string): string;
export function cleanNumericValue(value: string | null): string | null;
export function cleanNumericValue(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const withoutGrouping = value.replace(/(\d),(?=\d{3}(?!\d))/g, '$1');
  const match = /[-+]?\d*\.?\d+/.exec(withoutGrouping);
  return match ? match[0] : value;
}
