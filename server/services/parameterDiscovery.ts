/**
 * Parameter Discoverer
 *
 * Hovers the middle of the chart once and harvests every parameter name the
 * tooltip shows there. Charts sometimes hide series the category normally
 * carries (or show extra ones), so the discovered list wins over the
 * configured defaults whenever it is not empty.
 */

import type { ChartMode, ChartRect } from '../types/telemetry';
import { ChartSession, readTooltipText, TooltipReaderOptions } from './chartSession';
import { parseTooltip } from './tooltipParser';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import { delay } from '../utils/delay';

export interface DiscoveryOptions {
  tooltip: TooltipReaderOptions;
  settleMs: number;
  mode: ChartMode;
  keyField: string;
  defaultParameters: readonly string[];
}

export interface DiscoveryResult {
  parameters: string[];
  source: 'discovered' | 'default';
}

export async function discoverParameters(
  session: ChartSession,
  rect: ChartRect,
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const fallback: DiscoveryResult = { parameters: [...options.defaultParameters], source: 'default' };

  try {
    await session.dispatchPointerMove(rect.x + rect.width / 2, rect.y + rect.height / 2);
    await delay(options.settleMs);

    const text = await readTooltipText(session, options.tooltip);
    const parsed = parseTooltip(text, [], { mode: options.mode, keyField: options.keyField });
    const keyField = options.keyField.toLowerCase();
    const parameters = parsed ?
      Array.from(parsed.fields.keys()).filter(name => name.toLowerCase() !== keyField) :
      [];

    if (parameters.length === 0) {
      logger.warning('No parameters found at chart midpoint, using category defaults', {
        module: 'parameterDiscovery',
        context: { defaults: fallback.parameters }
      });
      return fallback;
    }

    logger.info(`Discovered parameters: ${parameters.join(', ')}`, { module: 'parameterDiscovery' });
    return { parameters, source: 'discovered' };
  } catch (error) {
    logger.warning('Parameter discovery probe failed, using category defaults', {
      module: 'parameterDiscovery',
      context: { defaults: fallback.parameters },
      error: toError(error)
    });
    return fallback;
  }
}
