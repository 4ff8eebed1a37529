import path from 'path';
import type { SamplePoint } from '../types/telemetry';
import {
  intradayDensity,
  minimumSpacing,
  probePositions,
  SampleDeduplicator,
  scanPositions,
  ScanOptions
} from '../services/positionScanner';
import { energyTooltip, FakeChartSession, TOOLTIP_SELECTOR } from './helpers/fakes';

const rect = { x: 0, y: 0, width: 100, height: 50 };

const baseOptions: ScanOptions = {
  density: 10,
  settleMs: 0,
  insetRatio: 0,
  mode: 'monthly',
  keyField: 'Date',
  parameters: ['Active', 'Apparent', 'Reactive'],
  tooltip: { selectors: [TOOLTIP_SELECTOR], documentFallback: false },
  maxDay: 30
};

function sample(key: string, position: number): SamplePoint {
  return { key, position, rawText: '', fields: new Map() };
}

describe('probePositions', () => {
  it('spreads probes evenly between the insets', () => {
    const positions = probePositions({ x: 10, y: 0, width: 200, height: 10 }, 3, 0.02);

    expect(positions).toHaveLength(3);
    expect(positions[0]).toBeCloseTo(14);
    expect(positions[1]).toBeCloseTo(110);
    expect(positions[2]).toBeCloseTo(206);
  });

  it('uses a single probe at the start inset for density 1', () => {
    expect(probePositions({ x: 0, y: 0, width: 100, height: 10 }, 1, 0)).toEqual([0]);
  });
});

describe('scan density helpers', () => {
  it('derives the minimum spacing from width and density', () => {
    expect(minimumSpacing(100, 10)).toBe(20);
  });

  it('probes three times per survey interval', () => {
    expect(intradayDensity(15)).toBe(288);
    expect(intradayDensity(30)).toBe(144);
    expect(intradayDensity(7)).toBe(615);
  });
});

describe('SampleDeduplicator', () => {
  it('skips close repeats of the last key and overwrites otherwise', () => {
    const deduplicator = new SampleDeduplicator(20);

    expect(deduplicator.offer(sample('1', 0))).toBe('new');
    expect(deduplicator.offer(sample('1', 10))).toBe('skipped');
    expect(deduplicator.offer(sample('1', 25))).toBe('updated');
    expect(deduplicator.offer(sample('2', 30))).toBe('new');
    expect(deduplicator.offer(sample('1', 35))).toBe('updated');

    const points = deduplicator.result();
    expect(Array.from(points.keys())).toEqual(['1', '2']);
    expect(points.get('1')?.position).toBe(35);
  });
});

describe('scanPositions', () => {
  it('collects one point per day across the chart', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });

    const result = await scanPositions(session, rect, baseOptions);

    expect(Array.from(result.points.keys())).toEqual(['1', '2', '3', '4', '5']);
    expect(result.probes).toBe(10);
    expect(result.failures).toBe(0);
    expect(result.misses).toBe(0);
    expect(result.points.get('1')?.position).toBeCloseTo(22.22, 1);
    expect(result.points.get('3')?.fields.get('Active')).toBe('30 kW');
  });

  it('moves the pointer off the chart before probing at mid height', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });

    await scanPositions(session, rect, baseOptions);

    expect(session.moves[0]).toEqual([0, 0]);
    expect(session.moves.slice(1).every(([, y]) => y === 25)).toBe(true);
  });

  it('keeps scanning after a failed probe', async () => {
    const session = new FakeChartSession({
      rect,
      tooltipAt: energyTooltip,
      failWhen: x => x > 50 && x < 60
    });

    const result = await scanPositions(session, rect, baseOptions);

    expect(result.failures).toBe(1);
    expect(Array.from(result.points.keys())).toEqual(['1', '2', '3', '4', '5']);
  });

  it('counts probes without a tooltip as misses', async () => {
    const session = new FakeChartSession({
      rect,
      tooltipAt: x => (x > 90 ? null : energyTooltip(x))
    });

    const result = await scanPositions(session, rect, baseOptions);

    expect(result.misses).toBe(1);
    expect(Array.from(result.points.keys())).toEqual(['1', '2', '3', '4']);
  });

  it('captures the chart once per new key', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: energyTooltip });

    await scanPositions(session, rect, {
      ...baseOptions,
      screenshot: { dir: '/shots', prefix: 'Energy_monthly_2024-06' }
    });

    expect(session.screenshots).toHaveLength(5);
    expect(session.screenshots[0]).toBe(path.join('/shots', 'Energy_monthly_2024-06_1.png'));
  });

  it('returns an empty map when nothing parses', async () => {
    const session = new FakeChartSession({ rect, tooltipAt: () => null });

    const result = await scanPositions(session, rect, baseOptions);

    expect(result.points.size).toBe(0);
    expect(result.misses).toBe(10);
  });
});
