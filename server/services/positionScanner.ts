/**
 * Position Scanner
 *
 * Sweeps the pointer across the plotting area at evenly spaced positions and
 * collects one sample per chart key. The dashboard snaps its tooltip to the
 * nearest data point, so neighbouring probes often report the same key; the
 * deduplicator keeps the latest reading for a key unless it comes from a
 * probe that is closer than the minimum spacing to the previous accepted one.
 */

import path from 'path';
import type { ChartMode, ChartRect, SamplePoint } from '../types/telemetry';
import { ChartSession, readTooltipText, TooltipReaderOptions } from './chartSession';
import { parseTooltip } from './tooltipParser';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import { delay } from '../utils/delay';

export interface ScanSettings {
  density: number;
  settleMs: number;
  // fraction of the width skipped at each edge
  insetRatio: number;
}

export const SCAN_DEFAULTS: Record<ChartMode, ScanSettings> = {
  monthly: { density: 100, settleMs: 500, insetRatio: 0.02 },
  intraday: { density: 300, settleMs: 100, insetRatio: 0.01 }
};

export interface ScanOptions extends ScanSettings {
  mode: ChartMode;
  keyField: string;
  parameters: readonly string[];
  tooltip: TooltipReaderOptions;
  maxDay?: number;
  screenshot?: {
    dir: string;
    prefix: string;
  };
}

export interface ScanResult {
  points: Map<string, SamplePoint>;
  probes: number;
  failures: number;
  misses: number;
}

export type SampleOutcome = 'new' | 'updated' | 'skipped';

/**
 * Horizontal probe coordinates, evenly spaced between the insets
 */
export function probePositions(rect: ChartRect, density: number, insetRatio: number): number[] {
  const start = rect.x + rect.width * insetRatio;
  const end = rect.x + rect.width * (1 - insetRatio);
  if (density <= 1) {
    return [start];
  }
  const step = (end - start) / (density - 1);
  return Array.from({ length: density }, (_, index) => start + step * index);
}

/**
 * Probe count for an intraday chart: three probes per survey interval
 */
export function intradayDensity(surveyIntervalMinutes: number): number {
  return Math.floor(1440 / surveyIntervalMinutes) * 3;
}

export function minimumSpacing(width: number, density: number): number {
  return width / (density * 0.5);
}

export class SampleDeduplicator {
  private readonly points = new Map<string, SamplePoint>();
  private lastKey: string | null = null;
  private lastPosition = 0;

  constructor(private readonly minSpacing: number) {}

  offer(point: SamplePoint): SampleOutcome {
    if (point.key === this.lastKey && Math.abs(point.position - this.lastPosition) < this.minSpacing) {
      return 'skipped';
    }

    const outcome: SampleOutcome = this.points.has(point.key) ? 'updated' : 'new';
    this.points.set(point.key, point);
    this.lastKey = point.key;
    this.lastPosition = point.position;
    return outcome;
  }

  result(): Map<string, SamplePoint> {
    return new Map(this.points);
  }
}

function screenshotFileName(prefix: string, key: string): string {
  return `${prefix}_${key.replace(/[^A-Za-z0-9]+/g, '-')}.png`;
}

export async function scanPositions(
  session: ChartSession,
  rect: ChartRect,
  options: ScanOptions
): Promise<ScanResult> {
  const positions = probePositions(rect, options.density, options.insetRatio);
  const deduplicator = new SampleDeduplicator(minimumSpacing(rect.width, options.density));
  const midY = rect.y + rect.height / 2;
  let failures = 0;
  let misses = 0;

  // start from outside the chart so the first probe opens a fresh tooltip
  await session.dispatchPointerMove(Math.max(0, rect.x - 100), Math.max(0, rect.y - 100));

  logger.info(`Scanning ${positions.length} positions across ${Math.round(rect.width)}px`, {
    module: 'positionScanner',
    context: { mode: options.mode, parameters: options.parameters }
  });

  for (const [index, x] of positions.entries()) {
    let text: string | null;
    try {
      await session.dispatchPointerMove(x, midY);
      await delay(options.settleMs);
      text = await readTooltipText(session, options.tooltip);
    } catch (error) {
      failures++;
      logger.warning(`Probe ${index + 1}/${positions.length} failed`, {
        module: 'positionScanner',
        context: { x },
        error: toError(error)
      });
      continue;
    }

    const parsed = parseTooltip(text, options.parameters, {
      mode: options.mode,
      keyField: options.keyField,
      maxDay: options.maxDay
    });
    if (!parsed || parsed.key === null) {
      misses++;
      continue;
    }

    const outcome = deduplicator.offer({
      key: parsed.key,
      position: x,
      rawText: parsed.rawText,
      fields: parsed.fields
    });

    if (outcome === 'new') {
      logger.debug(`New key ${parsed.key} at x=${Math.round(x)}`, { module: 'positionScanner' });
      if (options.screenshot) {
        const filePath = path.join(options.screenshot.dir, screenshotFileName(options.screenshot.prefix, parsed.key));
        try {
          await session.captureScreenshot(rect, filePath);
        } catch (error) {
          logger.warning(`Screenshot for key ${parsed.key} failed`, {
            module: 'positionScanner',
            error: toError(error)
          });
        }
      }
    }
  }

  const points = deduplicator.result();
  logger.info(`Scan finished with ${points.size} unique keys`, {
    module: 'positionScanner',
    context: { probes: positions.length, failures, misses }
  });

  return { points, probes: positions.length, failures, misses };
}
