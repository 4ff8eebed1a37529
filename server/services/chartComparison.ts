/**
 * Comparison Run
 *
 * One extraction run end to end: locate the chart, discover its parameters,
 * scan it, assemble the series, fetch the reference rows, reconcile and write
 * the artifacts. Either every artifact is written or the run fails; nothing is
 * written for a run whose scan or reference fetch failed.
 */

import { getDaysInMonth } from 'date-fns';
import type {
  ChartCategory,
  ChartDataset,
  ChartMode,
  ChartRect,
  ComparisonReport,
  ReferenceDataset
} from '../types/telemetry';
import { getCategoryProfile } from '../config/categories';
import type { ChartSession, TooltipReaderOptions } from './chartSession';
import { discoverParameters, DiscoveryResult } from './parameterDiscovery';
import { SCAN_DEFAULTS, scanPositions, ScanResult, ScanSettings } from './positionScanner';
import { assembleSeries } from './seriesAssembler';
import type { ReferenceStore } from './referenceFetcher';
import { reconcileDatasets } from './schemaReconciler';
import type { ArtifactLabel, ArtifactPaths, ReportSink } from './reportWriter';
import { CollaboratorError, ConfigurationError, EmptyScanResultError } from '../utils/errors';
import { parseDate, periodLabel } from '../utils/dates';
import { logger } from '../utils/logger';

export interface ComparisonRequest {
  category: ChartCategory;
  mode: ChartMode;
  // inclusive YYYY-MM-DD bounds; a single day for intraday charts
  startDate: string;
  endDate: string;
  entityId: number;
  // minutes per load survey interval, when already known for the meter
  surveyIntervalMinutes?: number;
  chartSelector: string;
  chartWaitMs: number;
  tooltip: TooltipReaderOptions;
  scan?: Partial<ScanSettings>;
  screenshotDir?: string;
  tolerance?: number;
}

export interface ComparisonDependencies {
  session: ChartSession;
  store: ReferenceStore;
  sink: ReportSink;
}

export interface ChartExtraction {
  dataset: ChartDataset;
  discovery: DiscoveryResult;
  scan: Omit<ScanResult, 'points'>;
}

export interface ComparisonResult {
  report: ComparisonReport;
  chart: ChartExtraction;
  reference: ReferenceDataset;
  artifacts: ArtifactPaths;
}

const sessionsInUse = new WeakSet<ChartSession>();

/**
 * Scan the chart on screen into a ChartDataset
 */
export async function extractChartDataset(
  session: ChartSession,
  request: ComparisonRequest
): Promise<ChartExtraction> {
  const profile = getCategoryProfile(request.category, request.mode);
  const settings: ScanSettings = { ...SCAN_DEFAULTS[request.mode], ...request.scan };

  let rect: ChartRect | null;
  try {
    rect = await session.findElement(request.chartSelector, request.chartWaitMs);
  } catch (error) {
    throw CollaboratorError.wrap('browser', error, { chartSelector: request.chartSelector });
  }
  if (!rect) {
    throw new CollaboratorError('browser',
      `Chart '${request.chartSelector}' did not appear within ${request.chartWaitMs}ms`, {
        context: { chartSelector: request.chartSelector }
      });
  }

  const discovery = await discoverParameters(session, rect, {
    tooltip: request.tooltip,
    settleMs: settings.settleMs,
    mode: request.mode,
    keyField: profile.keyField,
    defaultParameters: profile.defaultParameters
  });

  const period = periodLabel(request.startDate, request.endDate);
  let scan: ScanResult;
  try {
    scan = await scanPositions(session, rect, {
      ...settings,
      mode: request.mode,
      keyField: profile.keyField,
      parameters: discovery.parameters,
      tooltip: request.tooltip,
      maxDay: request.mode === 'monthly' ? getDaysInMonth(parseDate(request.startDate)) : undefined,
      screenshot: request.screenshotDir ? {
        dir: request.screenshotDir,
        prefix: `${request.category}_${request.mode}_${period}`
      } : undefined
    });
  } catch (error) {
    throw CollaboratorError.wrap('browser', error);
  }

  if (scan.points.size === 0) {
    throw new EmptyScanResultError(`No ${request.category} data points found on the chart`, {
      context: { probes: scan.probes, failures: scan.failures, misses: scan.misses }
    });
  }

  const dataset = assembleSeries(scan.points, {
    category: request.category,
    mode: request.mode,
    keyField: profile.keyField,
    targetParameters: discovery.parameters
  });

  return {
    dataset,
    discovery,
    scan: { probes: scan.probes, failures: scan.failures, misses: scan.misses }
  };
}

export async function runChartComparison(
  dependencies: ComparisonDependencies,
  request: ComparisonRequest
): Promise<ComparisonResult> {
  const { session, store, sink } = dependencies;
  if (sessionsInUse.has(session)) {
    throw new ConfigurationError('Chart session is already running a comparison');
  }

  sessionsInUse.add(session);
  try {
    logger.info(`Comparing ${request.category} (${request.mode}) for entity ${request.entityId}, ` +
      `${request.startDate} to ${request.endDate}`, { module: 'chartComparison' });

    const chart = await extractChartDataset(session, request);

    let reference: ReferenceDataset;
    try {
      reference = await store.fetchRange({
        category: request.category,
        mode: request.mode,
        startDate: request.startDate,
        endDate: request.endDate,
        entityId: request.entityId,
        surveyIntervalMinutes: request.surveyIntervalMinutes
      });
    } catch (error) {
      throw CollaboratorError.wrap('datastore', error, { entityId: request.entityId });
    }

    const profile = getCategoryProfile(request.category, request.mode);
    const report = reconcileDatasets(chart.dataset, reference, {
      columnMapping: profile.columnMapping,
      tolerance: request.tolerance
    });

    const label: ArtifactLabel = {
      category: request.category,
      mode: request.mode,
      period: periodLabel(request.startDate, request.endDate)
    };

    let artifacts: ArtifactPaths;
    try {
      artifacts = await sink.writeArtifacts({ chart: chart.dataset, reference, report }, label);
    } catch (error) {
      throw CollaboratorError.wrap('report', error);
    }

    return { report, chart, reference, artifacts };
  } finally {
    sessionsInUse.delete(session);
  }
}
