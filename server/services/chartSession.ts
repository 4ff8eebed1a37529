/**
 * The browser-facing side of an extraction run.
 *
 * A ChartSession is the only thing the sampling code knows about the browser:
 * element lookup with a bounded wait, pointer moves at viewport coordinates,
 * reading visible text and rectangular screenshots. Each run owns exactly one
 * session and releases it on every exit path.
 */

import type { ChartRect } from '../types/telemetry';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export interface ChartSession {
  /**
   * Wait up to `timeoutMs` for an element matching `query` and return its
   * bounding box in viewport coordinates, or null when it never appears
   */
  findElement(query: string, timeoutMs: number): Promise<ChartRect | null>;
  dispatchPointerMove(x: number, y: number): Promise<void>;
  /**
   * Text of the first visible element matching `query`, or of the whole
   * document when no query is given
   */
  readVisibleText(query?: string): Promise<string | null>;
  captureScreenshot(area: ChartRect, filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface TooltipReaderOptions {
  selectors: readonly string[];
  // read the whole document when no tooltip selector matches
  documentFallback: boolean;
}

/**
 * Text of the hover tooltip currently on screen, trying each known tooltip
 * selector in turn
 */
export async function readTooltipText(
  session: ChartSession,
  options: TooltipReaderOptions
): Promise<string | null> {
  for (const selector of options.selectors) {
    const text = await session.readVisibleText(selector);
    if (text && text.trim().length > 0) {
      return text;
    }
  }

  if (options.documentFallback) {
    const text = await session.readVisibleText();
    return text && text.trim().length > 0 ? text : null;
  }

  return null;
}

/**
 * Open a session, run `fn` with it and close it afterwards, whatever happens
 */
export async function withChartSession<T>(
  open: () => Promise<ChartSession>,
  fn: (session: ChartSession) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      logger.error('Failed to close chart session', {
        module: 'chartSession',
        error: toError(error)
      });
    }
  }
}
