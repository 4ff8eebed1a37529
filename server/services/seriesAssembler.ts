/**
 * Series Assembler
 *
 * Turns the scanner's key -> sample map into a ChartDataset: one record per
 * key, numeric values where the tooltip text allows it, ordered by time of
 * day or day of month.
 */

import type {
  ChartCategory,
  ChartDataset,
  ChartMode,
  SamplePoint,
  SeriesRecord,
  SeriesValue
} from '../types/telemetry';
import { cleanNumericValue } from './tooltipParser';
import { chronologicalRank, compareKeys } from '../utils/seriesKeys';
import { logger } from '../utils/logger';

export interface DatasetMeta {
  category: ChartCategory;
  mode: ChartMode;
  keyField: string;
  targetParameters: readonly string[];
}

/**
 * Cleaned numeric text becomes a number; anything else stays text
 */
export function coerceValue(raw: string | null | undefined): SeriesValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  const cleaned = cleanNumericValue(raw).trim();
  if (cleaned.length === 0) {
    return cleaned;
  }
  const numeric = Number(cleaned);
  return Number.isFinite(numeric) ? numeric : cleaned;
}

export function assembleSeries(
  points: Map<string, SamplePoint> | Iterable<SamplePoint>,
  meta: DatasetMeta
): ChartDataset {
  const samples = points instanceof Map ? Array.from(points.values()) : Array.from(points);
  const byKey = new Map<string, SeriesRecord>();

  for (const sample of samples) {
    if (chronologicalRank(sample.key) === null) {
      logger.warning(`Key '${sample.key}' has no chronological rank, ordering it first`, {
        module: 'seriesAssembler'
      });
    }

    const values = new Map<string, SeriesValue>();
    for (const name of meta.targetParameters) {
      values.set(name, coerceValue(sample.fields.get(name)));
    }
    byKey.set(sample.key, { key: sample.key, values });
  }

  const records = Array.from(byKey.values()).sort((a, b) => compareKeys(a.key, b.key));

  return {
    category: meta.category,
    mode: meta.mode,
    keyField: meta.keyField,
    targetParameters: [...meta.targetParameters],
    records
  };
}
