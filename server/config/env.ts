/**
 * Environment configuration
 *
 * Values come from the process environment and are validated once with zod.
 * Entry points seed the environment from .env before anything reads it.
 */

import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../utils/errors';

const DEFAULT_TOOLTIP_SELECTORS = [
  '.dxc-tooltip',
  '.chart-tooltip',
  "[role='tooltip']",
  '.highcharts-tooltip',
  '.tooltip',
  '.c3-tooltip',
  '.nvtooltip',
  '.chartjs-tooltip'
];

const DEFAULT_CHART_SELECTOR = "svg.dxc.dxc-chart rect";

const optionalPositiveInt = z.coerce.number().int().positive().optional();

export const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL must be set'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(5),
  BROWSER_URL: z.string().url('BROWSER_URL must be the remote debugging URL of a running browser'),
  DASHBOARD_URL_MATCH: z.string().optional(),
  CHART_SELECTOR: z.string().min(1).default(DEFAULT_CHART_SELECTOR),
  CHART_WAIT_MS: z.coerce.number().int().positive().default(10000),
  TOOLTIP_SELECTORS: z.string().optional()
    .transform(value => value ?
      value.split(',').map(selector => selector.trim()).filter(selector => selector.length > 0) :
      DEFAULT_TOOLTIP_SELECTORS),
  TOOLTIP_DOCUMENT_FALLBACK: z.enum(['true', 'false']).default('false')
    .transform(value => value === 'true'),
  SCAN_DENSITY: optionalPositiveInt,
  SETTLE_MS: optionalPositiveInt,
  OUTPUT_DIR: z.string().min(1).default('./reports'),
  SCREENSHOT_DIR: z.string().optional()
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate an environment map into the application config
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const validation = ValidationError.fromZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${validation.message}`, {
      context: validation.context,
      originalError: result.error
    });
  }
  return result.data;
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}
