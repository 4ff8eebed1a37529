import type { ReferenceDataset } from '../types/telemetry';
import { ComparisonRequest, runChartComparison } from '../services/chartComparison';
import type { ReportSink } from '../services/reportWriter';
import {
  CollaboratorError,
  ConfigurationError,
  DatabaseError,
  EmptyScanResultError
} from '../utils/errors';
import {
  energyTooltip,
  FakeChartSession,
  FakeReferenceStore,
  RecordingSink,
  TOOLTIP_SELECTOR
} from './helpers/fakes';

const rect = { x: 0, y: 0, width: 100, height: 50 };

const request: ComparisonRequest = {
  category: 'Energy',
  mode: 'monthly',
  startDate: '2024-06-01',
  endDate: '2024-06-30',
  entityId: 42,
  chartSelector: 'svg rect',
  chartWaitMs: 1000,
  tooltip: { selectors: [TOOLTIP_SELECTOR], documentFallback: false },
  scan: { density: 10, settleMs: 0, insetRatio: 0 }
};

function energyReference(days: number[]): ReferenceDataset {
  return {
    category: 'Energy',
    mode: 'monthly',
    keyColumn: 'dateandtime',
    columns: ['dateandtime', 'activepowersum', 'apparentpowersum', 'reactivepowersum'],
    rows: days.map(day => ({
      dateandtime: new Date(2024, 5, day),
      activepowersum: String(day * 10),
      apparentpowersum: String(day * 11),
      reactivepowersum: String(day)
    }))
  };
}

describe('runChartComparison', () => {
  it('compares a scanned chart with the reference rows and writes every artifact', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });
    const store = new FakeReferenceStore(() => energyReference([1, 2, 3, 4, 5]));
    const sink = new RecordingSink();

    const result = await runChartComparison({ session, store, sink }, request);

    expect(result.chart.discovery).toEqual({ parameters: ['Active', 'Apparent', 'Reactive'], source: 'discovered' });
    expect(result.report.status).toBe('complete');
    expect(result.report.summary.comparedKeys).toBe(5);
    expect(result.report.summary.fieldComparisons).toBe(15);
    expect(result.report.summary.mismatches).toBe(0);
    expect(store.queries).toEqual([{
      category: 'Energy',
      mode: 'monthly',
      startDate: '2024-06-01',
      endDate: '2024-06-30',
      entityId: 42
    }]);
    expect(sink.calls).toHaveLength(1);
    expect(sink.calls[0].artifacts.report).toBe(result.report);
    expect(sink.calls[0].label).toEqual({ category: 'Energy', mode: 'monthly', period: '2024-06' });
    expect(result.artifacts.comparison).toBe('memory://comparison/2024-06');
  });

  it('fails on an empty scan without fetching or writing anything', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: () => null });
    const store = new FakeReferenceStore(() => energyReference([1]));
    const sink = new RecordingSink();

    await expect(runChartComparison({ session, store, sink }, request)).rejects.toThrow(EmptyScanResultError);
    expect(store.queries).toHaveLength(0);
    expect(sink.calls).toHaveLength(0);
  });

  it('fails when the reference fetch fails and writes nothing', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });
    const store = new FakeReferenceStore(() => {
      throw new DatabaseError('connection refused');
    });
    const sink = new RecordingSink();

    const run = runChartComparison({ session, store, sink }, request);

    await expect(run).rejects.toThrow(CollaboratorError);
    await expect(run).rejects.toThrow('datastore failure: connection refused');
    expect(sink.calls).toHaveLength(0);
  });

  it('reports a sink failure as a report collaborator failure', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });
    const store = new FakeReferenceStore(() => energyReference([1, 2, 3, 4, 5]));
    const sink: ReportSink = {
      writeArtifacts: () => Promise.reject(new Error('disk full'))
    };

    await expect(runChartComparison({ session, store, sink }, request))
      .rejects.toThrow('report failure: disk full');
  });

  it('fails when the chart never appears', async () => {
    const session = new FakeChartSession({ rect: null, tooltipAt: energyTooltip });
    const sink = new RecordingSink();

    await expect(runChartComparison(
      { session, store: new FakeReferenceStore(() => energyReference([1])), sink },
      request
    )).rejects.toThrow("Chart 'svg rect' did not appear within 1000ms");
    expect(sink.calls).toHaveLength(0);
  });

  it('refuses a session that is already running a comparison', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });
    const store = new FakeReferenceStore(() => energyReference([1, 2, 3, 4, 5]));

    const first = runChartComparison({ session, store, sink: new RecordingSink() }, request);
    const second = runChartComparison({ session, store, sink: new RecordingSink() }, request);

    await expect(second).rejects.toThrow(ConfigurationError);
    await expect(first).resolves.toMatchObject({ report: { status: 'complete' } });
    await expect(runChartComparison({ session, store, sink: new RecordingSink() }, request))
      .resolves.toMatchObject({ report: { status: 'complete' } });
  });
});
