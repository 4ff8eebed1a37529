/**
 * Schema Reconciler
 *
 * Aligns chart parameter names with reference column names and compares the
 * two datasets key by key.
 *
 * Field mapping runs in tiers, each over the chart fields and reference
 * columns that earlier tiers left unpaired; a reference column is consumed by
 * the first chart field that claims it:
 *   exact             identical names
 *   case-insensitive  identical ignoring case
 *   configured        category table entry whose column is present
 *   substring         one name contains the other, ignoring case
 *   positional        remaining fields paired in order (flagged on every row)
 */

import type {
  ChartDataset,
  ComparisonReport,
  ComparisonRow,
  Difference,
  FieldMapping,
  FieldPair,
  MappingTier,
  ReferenceDataset,
  ReferenceRow,
  SeriesRecord,
  SeriesValue
} from '../types/telemetry';
import { compareKeys, referenceKey } from '../utils/seriesKeys';
import { logger } from '../utils/logger';
import { ReconciliationError } from '../utils/errors';

export const DEFAULT_TOLERANCE = 0.01;
export const MISSING_IN_CHART = 'DATA MISSING IN CHART';
export const MISSING_IN_REFERENCE = 'DATA MISSING IN REFERENCE';

export interface ReconcileOptions {
  // chart parameter -> reference column from the category table
  columnMapping?: Record<string, string>;
  tolerance?: number;
}

type TierMatcher = (field: string, column: string) => boolean;

const exactName: TierMatcher = (field, column) => field === column;
const caseInsensitiveName: TierMatcher = (field, column) => field.toLowerCase() === column.toLowerCase();
const substringName: TierMatcher = (field, column) => {
  const a = field.toLowerCase().trim();
  const b = column.toLowerCase().trim();
  return a.length > 0 && b.length > 0 && (a.includes(b) || b.includes(a));
};

/**
 * Pair chart fields with reference columns
 */
export function buildFieldMapping(
  chartFields: readonly string[],
  referenceColumns: readonly string[],
  configured: Record<string, string> = {}
): FieldMapping {
  const pairs: FieldPair[] = [];
  let pendingFields = [...chartFields];
  let available = [...referenceColumns];

  const claim = (field: string, column: string, tier: MappingTier): void => {
    pairs.push({ chartField: field, referenceColumn: column, tier });
    pendingFields = pendingFields.filter(pending => pending !== field);
    available = available.filter(candidate => candidate !== column);
  };

  const configuredColumn: TierMatcher = (field, column) =>
    Object.prototype.hasOwnProperty.call(configured, field) && configured[field] === column;

  const tiers: Array<[MappingTier, TierMatcher]> = [
    ['exact', exactName],
    ['case-insensitive', caseInsensitiveName],
    ['configured', configuredColumn],
    ['substring', substringName]
  ];

  for (const [tier, matches] of tiers) {
    for (const field of [...pendingFields]) {
      const column = available.find(candidate => matches(field, candidate));
      if (column !== undefined) {
        claim(field, column, tier);
      }
    }
  }

  const positional = pendingFields.slice(0, available.length);
  if (positional.length > 0) {
    const positionalColumns = available.slice(0, positional.length);
    positional.forEach((field, index) => claim(field, positionalColumns[index], 'positional'));
    logger.warning('Fields paired by position only; review these comparisons', {
      module: 'schemaReconciler',
      context: { pairs: positional.map((field, index) => `${field} -> ${positionalColumns[index]}`) }
    });
  }

  if (pendingFields.length > 0) {
    logger.warning(`No reference column left for: ${pendingFields.join(', ')}`, {
      module: 'schemaReconciler'
    });
  }

  const order = new Map(chartFields.map((field, index) => [field, index]));
  pairs.sort((a, b) => (order.get(a.chartField) ?? 0) - (order.get(b.chartField) ?? 0));

  return { pairs, unmapped: pendingFields };
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toComparableText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

/**
 * Compare one chart value with one reference value: numerically when both
 * sides parse as numbers, otherwise as trimmed text
 */
export function compareValues(
  chartValue: SeriesValue,
  refValue: unknown,
  tolerance: number = DEFAULT_TOLERANCE
): { difference: Difference; match: boolean } {
  const chartNumber = toNumber(chartValue);
  const refNumber = toNumber(refValue);

  if (chartNumber !== null && refNumber !== null) {
    const difference = chartNumber - refNumber;
    return {
      difference: Number(difference.toFixed(6)),
      match: Math.abs(difference) < tolerance
    };
  }

  return {
    difference: 'N/A',
    match: toComparableText(chartValue) === toComparableText(refValue)
  };
}

function indexReferenceRows(reference: ReferenceDataset): Map<string, ReferenceRow> {
  const byKey = new Map<string, ReferenceRow>();
  let unkeyed = 0;
  let duplicates = 0;

  for (const row of reference.rows) {
    const key = referenceKey(row[reference.keyColumn], reference.mode);
    if (key === null) {
      unkeyed++;
      continue;
    }
    if (byKey.has(key)) {
      duplicates++;
      continue;
    }
    byKey.set(key, row);
  }

  if (unkeyed > 0 || duplicates > 0) {
    logger.warning('Some reference rows were not used', {
      module: 'schemaReconciler',
      context: { keyColumn: reference.keyColumn, unkeyed, duplicates }
    });
  }

  return byKey;
}

function compareRecord(
  key: string,
  record: SeriesRecord,
  row: ReferenceRow,
  chartFields: readonly string[],
  pairsByField: Map<string, FieldPair>,
  tolerance: number
): ComparisonRow[] {
  return chartFields.map((field): ComparisonRow => {
    const chartValue = record.values.get(field) ?? null;
    const pair = pairsByField.get(field);

    if (!pair) {
      return {
        kind: 'unmapped-field',
        key,
        parameter: field,
        referenceColumn: null,
        mappingTier: null,
        chartValue,
        refValue: null,
        difference: 'N/A',
        match: false
      };
    }

    const refValue = row[pair.referenceColumn];
    return {
      kind: 'field',
      key,
      parameter: field,
      referenceColumn: pair.referenceColumn,
      mappingTier: pair.tier,
      chartValue,
      refValue,
      ...compareValues(chartValue, refValue, tolerance)
    };
  });
}

function missingRow(key: string, kind: 'missing-in-chart' | 'missing-in-reference'): ComparisonRow {
  return {
    kind,
    key,
    parameter: kind === 'missing-in-chart' ? MISSING_IN_CHART : MISSING_IN_REFERENCE,
    referenceColumn: null,
    mappingTier: null,
    chartValue: null,
    refValue: null,
    difference: 'N/A',
    match: false
  };
}

/**
 * Join the datasets on their keys and compare every mapped field
 */
export function reconcileDatasets(
  chart: ChartDataset,
  reference: ReferenceDataset,
  options: ReconcileOptions = {}
): ComparisonReport {
  if (chart.category !== reference.category || chart.mode !== reference.mode) {
    throw new ReconciliationError('Chart and reference datasets describe different charts', {
      context: {
        chart: `${chart.category}/${chart.mode}`,
        reference: `${reference.category}/${reference.mode}`
      }
    });
  }

  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const keyField = chart.keyField.toLowerCase();
  const chartFields = chart.targetParameters.filter(field => field.toLowerCase() !== keyField);
  const referenceColumns = reference.columns.filter(column => column !== reference.keyColumn);

  const mapping = buildFieldMapping(chartFields, referenceColumns, options.columnMapping);
  const pairsByField = new Map(mapping.pairs.map(pair => [pair.chartField, pair]));

  const chartByKey = new Map(chart.records.map(record => [record.key, record]));
  const referenceByKey = indexReferenceRows(reference);
  const allKeys = Array.from(new Set([...chartByKey.keys(), ...referenceByKey.keys()])).sort(compareKeys);

  const rows: ComparisonRow[] = [];
  let comparedKeys = 0;
  let missingInChart = 0;
  let missingInReference = 0;

  for (const key of allKeys) {
    const record = chartByKey.get(key);
    const row = referenceByKey.get(key);

    if (record && row) {
      comparedKeys++;
      rows.push(...compareRecord(key, record, row, chartFields, pairsByField, tolerance));
    } else if (record) {
      missingInReference++;
      rows.push(missingRow(key, 'missing-in-reference'));
    } else {
      missingInChart++;
      rows.push(missingRow(key, 'missing-in-chart'));
    }
  }

  const fieldRows = rows.filter(row => row.kind === 'field');
  const summary = {
    comparedKeys,
    fieldComparisons: fieldRows.length,
    mismatches: fieldRows.filter(row => !row.match).length,
    missingInChart,
    missingInReference,
    unmappedFields: [...mapping.unmapped],
    positionalMappings: mapping.pairs.filter(pair => pair.tier === 'positional').map(pair => pair.chartField)
  };

  logger.info(`Reconciled ${allKeys.length} keys: ${summary.mismatches} mismatches, ` +
    `${missingInChart} missing in chart, ${missingInReference} missing in reference`, {
    module: 'schemaReconciler',
    context: { category: chart.category, mode: chart.mode }
  });

  return {
    status: rows.length === 0 ? 'no-matching-data' : 'complete',
    rows,
    mapping,
    summary
  };
}
