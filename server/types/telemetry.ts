export type ChartCategory = 'Voltage' | 'Current' | 'Energy' | 'Demand';

export const CHART_CATEGORIES: readonly ChartCategory[] = ['Voltage', 'Current', 'Energy', 'Demand'];

/**
 * monthly: one point per day of month, keyed by day number.
 * intraday: one point per interval, keyed by HH:MM.
 */
export type ChartMode = 'monthly' | 'intraday';

export interface ChartRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ParsedTooltip {
  key: string | null;
  fields: Map<string, string | null>;
  rawText: string;
}

export interface SamplePoint {
  key: string;
  position: number;
  rawText: string;
  fields: Map<string, string | null>;
}

export type SeriesValue = number | string | null;

export interface SeriesRecord {
  key: string;
  values: Map<string, SeriesValue>;
}

export interface ChartDataset {
  category: ChartCategory;
  mode: ChartMode;
  keyField: string;
  targetParameters: string[];
  records: SeriesRecord[];
}

export type ReferenceRow = Record<string, unknown>;

export interface ReferenceDataset {
  category: ChartCategory;
  mode: ChartMode;
  keyColumn: string;
  columns: string[];
  rows: ReferenceRow[];
}

export type MappingTier = 'configured' | 'exact' | 'case-insensitive' | 'substring' | 'positional';

export interface FieldPair {
  chartField: string;
  referenceColumn: string;
  tier: MappingTier;
}

export interface FieldMapping {
  pairs: FieldPair[];
  unmapped: string[];
}

export type Difference = number | 'N/A';

export interface FieldComparisonRow {
  kind: 'field';
  key: string;
  parameter: string;
  referenceColumn: string;
  mappingTier: MappingTier;
  chartValue: SeriesValue;
  refValue: unknown;
  difference: Difference;
  match: boolean;
}

export interface UnmappedFieldRow {
  kind: 'unmapped-field';
  key: string;
  parameter: string;
  referenceColumn: null;
  mappingTier: null;
  chartValue: SeriesValue;
  refValue: null;
  difference: 'N/A';
  match: false;
}

export interface MissingKeyRow {
  kind: 'missing-in-chart' | 'missing-in-reference';
  key: string;
  parameter: string;
  referenceColumn: null;
  mappingTier: null;
  chartValue: null;
  refValue: null;
  difference: 'N/A';
  match: false;
}

export type ComparisonRow = FieldComparisonRow | UnmappedFieldRow | MissingKeyRow;

export interface ComparisonSummary {
  comparedKeys: number;
  fieldComparisons: number;
  mismatches: number;
  missingInChart: number;
  missingInReference: number;
  unmappedFields: string[];
  positionalMappings: string[];
}

export interface ComparisonReport {
  status: 'complete' | 'no-matching-data';
  rows: ComparisonRow[];
  mapping: FieldMapping;
  summary: ComparisonSummary;
}
