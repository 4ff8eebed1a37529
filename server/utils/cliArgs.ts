/**
 * Command line arguments for the comparison script
 */

import type { ChartCategory, ChartMode } from '../types/telemetry';
import { isChartMode, parseCategory } from '../config/categories';
import { ConfigurationError } from './errors';
import { getMonthBounds, isValidDateString, isValidYearMonth } from './dates';

export interface ComparisonArgs {
  help: false;
  category: ChartCategory;
  mode: ChartMode;
  startDate: string;
  endDate: string;
  entityId?: number;
  meterSerial?: string;
  density?: number;
  settleMs?: number;
  tolerance?: number;
}

export type CliArgs = { help: true } | ComparisonArgs;

export const USAGE = `
Usage:
  npm run compare -- --category <Voltage|Current|Energy|Demand> --month YYYY-MM --entity <meter id>
  npm run compare -- --category <name> --date YYYY-MM-DD --meter <serial number>

Options:
  --category    Chart category (case-insensitive)
  --mode        monthly or intraday (inferred from --month / --date)
  --month       Month shown on a monthly chart
  --date        Day shown on an intraday chart
  --entity      Meter id in the reference store
  --meter       Meter serial number, resolved to its meter id
  --density     Number of probe positions
  --settle-ms   Wait after each pointer move
  --tolerance   Numeric match tolerance (default 0.01)
  --help        Show this message
`;

const VALUE_FLAGS = new Set([
  'category', 'mode', 'month', 'date', 'entity', 'meter', 'density', 'settle-ms', 'tolerance'
]);

function positiveInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function positiveNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} must be a positive number, got '${value}'`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = new Map<string, string>();
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('--') && VALUE_FLAGS.has(arg.slice(2)) && i + 1 < argv.length) {
      values.set(arg.slice(2), argv[i + 1]);
      i++;
    } else {
      throw new ConfigurationError(`Unexpected argument '${arg}'`);
    }
  }

  if (help) {
    return { help: true };
  }

  const categoryArg = values.get('category');
  if (!categoryArg) {
    throw new ConfigurationError('--category is required');
  }
  const category = parseCategory(categoryArg);

  const month = values.get('month');
  const date = values.get('date');
  if (month && date) {
    throw new ConfigurationError('Use either --month or --date, not both');
  }

  const modeArg = values.get('mode');
  if (modeArg !== undefined && !isChartMode(modeArg)) {
    throw new ConfigurationError(`--mode must be monthly or intraday, got '${modeArg}'`);
  }
  const mode: ChartMode = modeArg ?? (date ? 'intraday' : 'monthly');

  let startDate: string;
  let endDate: string;
  if (mode === 'monthly') {
    if (!month || !isValidYearMonth(month)) {
      throw new ConfigurationError('Monthly charts need --month YYYY-MM');
    }
    ({ startDate, endDate } = getMonthBounds(month));
  } else {
    if (!date || !isValidDateString(date)) {
      throw new ConfigurationError('Intraday charts need --date YYYY-MM-DD');
    }
    startDate = date;
    endDate = date;
  }

  const entity = values.get('entity');
  const meterSerial = values.get('meter');
  if (!entity && !meterSerial) {
    throw new ConfigurationError('One of --entity or --meter is required');
  }

  const density = values.get('density');
  const settleMs = values.get('settle-ms');
  const tolerance = values.get('tolerance');

  return {
    help: false,
    category,
    mode,
    startDate,
    endDate,
    entityId: entity ? positiveInteger('--entity', entity) : undefined,
    meterSerial,
    density: density ? positiveInteger('--density', density) : undefined,
    settleMs: settleMs ? positiveInteger('--settle-ms', settleMs) : undefined,
    tolerance: tolerance ? positiveNumber('--tolerance', tolerance) : undefined
  };
}
