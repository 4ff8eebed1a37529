/**
 * Report Writer
 *
 * Persists the three artifacts of a comparison run as CSV files (RFC 4180
 * quoting) plus a JSON summary of the comparison. A run's files are staged
 * under a temporary suffix and only renamed into place once all of them are
 * written; on failure every file of the run is removed again.
 */

import fs from 'fs/promises';
import path from 'path';
import type {
  ChartCategory,
  ChartDataset,
  ChartMode,
  ComparisonReport,
  ComparisonRow,
  ReferenceDataset
} from '../types/telemetry';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const NO_MATCHING_DATA = 'NO MATCHING DATA FOUND';

export const COMPARISON_HEADER = [
  'Key',
  'Parameter',
  'Chart Value',
  'Reference Value',
  'Difference',
  'Match',
  'Mapping Tier'
];

export interface ArtifactLabel {
  category: ChartCategory;
  mode: ChartMode;
  period: string;
}

export interface RunArtifacts {
  chart: ChartDataset;
  reference: ReferenceDataset;
  report: ComparisonReport;
}

export interface ArtifactPaths {
  chart: string;
  reference: string;
  comparison: string;
}

export interface ReportSink {
  // writes all artifacts of a run or none of them
  writeArtifacts(artifacts: RunArtifacts, label: ArtifactLabel): Promise<ArtifactPaths>;
}

export const STAGING_SUFFIX = '.partial';

export function formatCell(value: unknown): string {
  let text: string;
  if (value === null || value === undefined) {
    text = '';
  } else if (value instanceof Date) {
    text = value.toISOString();
  } else if (typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly (readonly unknown[])[]): string {
  return rows.map(row => row.map(formatCell).join(',')).join('\r\n') + '\r\n';
}

export function artifactBaseName(kind: 'chart' | 'reference' | 'comparison', label: ArtifactLabel): string {
  return `${kind}_${label.category}_${label.mode}_${label.period}`;
}

function comparisonCells(row: ComparisonRow): unknown[] {
  return [
    row.key,
    row.parameter,
    row.chartValue,
    row.refValue,
    row.difference,
    row.match ? 'YES' : 'NO',
    row.mappingTier ?? ''
  ];
}

export function comparisonTable(report: ComparisonReport): unknown[][] {
  if (report.status === 'no-matching-data') {
    return [COMPARISON_HEADER, [NO_MATCHING_DATA, '', '', '', '', '', '']];
  }
  return [COMPARISON_HEADER, ...report.rows.map(comparisonCells)];
}

export function chartTable(dataset: ChartDataset): unknown[][] {
  const fields = dataset.targetParameters.filter(field => field !== dataset.keyField);
  return [
    [dataset.keyField, ...fields],
    ...dataset.records.map(record => [record.key, ...fields.map(field => record.values.get(field) ?? null)])
  ];
}

export function referenceTable(dataset: ReferenceDataset): unknown[][] {
  return [
    dataset.columns,
    ...dataset.rows.map(row => dataset.columns.map(column => row[column]))
  ];
}

export function comparisonSummary(report: ComparisonReport, label: ArtifactLabel): object {
  return {
    ...label,
    status: report.status,
    summary: report.summary,
    mapping: report.mapping
  };
}

export class CsvReportSink implements ReportSink {
  constructor(private readonly outputDir: string) {}

  async writeArtifacts(artifacts: RunArtifacts, label: ArtifactLabel): Promise<ArtifactPaths> {
    const comparisonBase = artifactBaseName('comparison', label);
    const paths: ArtifactPaths = {
      chart: path.join(this.outputDir, `${artifactBaseName('chart', label)}.csv`),
      reference: path.join(this.outputDir, `${artifactBaseName('reference', label)}.csv`),
      comparison: path.join(this.outputDir, `${comparisonBase}.csv`)
    };
    const files: Array<[string, string]> = [
      [paths.chart, toCsv(chartTable(artifacts.chart))],
      [paths.reference, toCsv(referenceTable(artifacts.reference))],
      [
        path.join(this.outputDir, `${comparisonBase}.json`),
        `${JSON.stringify(comparisonSummary(artifacts.report, label), null, 2)}\n`
      ],
      [paths.comparison, toCsv(comparisonTable(artifacts.report))]
    ];

    await fs.mkdir(this.outputDir, { recursive: true });

    // files of this run currently on disk, staged or in place
    const written: string[] = [];
    try {
      for (const [filePath, content] of files) {
        await fs.writeFile(`${filePath}${STAGING_SUFFIX}`, content, 'utf8');
        written.push(`${filePath}${STAGING_SUFFIX}`);
      }
      for (const [filePath] of files) {
        await fs.rename(`${filePath}${STAGING_SUFFIX}`, filePath);
        written[written.indexOf(`${filePath}${STAGING_SUFFIX}`)] = filePath;
      }
    } catch (error) {
      await this.discard(written);
      throw error;
    }

    logger.info(`Wrote ${files.length} report files to ${this.outputDir}`, {
      module: 'reportWriter',
      context: { files: files.map(([filePath]) => path.basename(filePath)) }
    });
    return paths;
  }

  private async discard(filePaths: readonly string[]): Promise<void> {
    for (const filePath of filePaths) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        logger.error(`Failed to remove ${filePath}`, {
          module: 'reportWriter',
          error: toError(error)
        });
      }
    }
  }
}
