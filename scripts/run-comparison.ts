#!/usr/bin/env node
/**
 * Run Chart Comparison
 *
 * Scans one chart in an already signed-in dashboard tab and compares it with
 * the reference store. The browser must be running with remote debugging
 * enabled (BROWSER_URL) and showing the chart for the requested period.
 *
 * Usage:
 *   npm run compare -- --category Energy --month 2024-06 --entity 42
 *   npm run compare -- --category Voltage --date 2024-06-15 --meter SN-0001
 */

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../server/config/env';
import { withChartSession } from '../server/services/chartSession';
import { PuppeteerChartSession } from '../server/services/puppeteerSession';
import { runChartComparison } from '../server/services/chartComparison';
import { PgReferenceStore, withReferenceStore } from '../server/services/referenceFetcher';
import { CsvReportSink } from '../server/services/reportWriter';
import { intradayDensity, ScanSettings } from '../server/services/positionScanner';
import { ComparisonArgs, parseCliArgs, USAGE } from '../server/utils/cliArgs';
import { CollaboratorError, ConfigurationError, toError } from '../server/utils/errors';
import { logger } from '../server/utils/logger';

async function resolveEntity(
  store: PgReferenceStore,
  args: ComparisonArgs
): Promise<{ entityId: number; surveyIntervalMinutes?: number }> {
  if (args.entityId !== undefined) {
    return { entityId: args.entityId };
  }
  if (!args.meterSerial) {
    throw new ConfigurationError('One of --entity or --meter is required');
  }

  const meter = await store.resolveMeter(args.meterSerial);
  if (!meter) {
    throw new ConfigurationError(`Meter '${args.meterSerial}' is not registered`);
  }
  logger.info(`Meter ${args.meterSerial} is ${meter.name ?? 'unnamed'} (id ${meter.meterId}, ` +
    `${meter.surveyIntervalMinutes} min survey interval)`, { module: 'run-comparison' });
  return { entityId: meter.meterId, surveyIntervalMinutes: meter.surveyIntervalMinutes };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();

  const result = await withReferenceStore(config.DATABASE_URL, config.DB_POOL_MAX, async store => {
    if (!(await store.checkHealth())) {
      throw new CollaboratorError('datastore', 'Reference database is not reachable');
    }

    const { entityId, surveyIntervalMinutes } = await resolveEntity(store, args);

    const scan: Partial<ScanSettings> = {};
    const density = args.density ?? config.SCAN_DENSITY ??
      (args.mode === 'intraday' && surveyIntervalMinutes ? intradayDensity(surveyIntervalMinutes) : undefined);
    if (density !== undefined) {
      scan.density = density;
    }
    const settleMs = args.settleMs ?? config.SETTLE_MS;
    if (settleMs !== undefined) {
      scan.settleMs = settleMs;
    }

    return withChartSession(
      () => PuppeteerChartSession.attach({
        browserURL: config.BROWSER_URL,
        pageUrlMatch: config.DASHBOARD_URL_MATCH
      }),
      session => runChartComparison(
        { session, store, sink: new CsvReportSink(config.OUTPUT_DIR) },
        {
          category: args.category,
          mode: args.mode,
          startDate: args.startDate,
          endDate: args.endDate,
          entityId,
          surveyIntervalMinutes,
          chartSelector: config.CHART_SELECTOR,
          chartWaitMs: config.CHART_WAIT_MS,
          tooltip: {
            selectors: config.TOOLTIP_SELECTORS,
            documentFallback: config.TOOLTIP_DOCUMENT_FALLBACK
          },
          scan,
          screenshotDir: config.SCREENSHOT_DIR,
          tolerance: args.tolerance
        }
      )
    );
  });

  const { summary, status } = result.report;
  console.log('\n=== Comparison Summary ===');
  console.log(`Status:               ${status}`);
  console.log(`Keys compared:        ${summary.comparedKeys}`);
  console.log(`Field comparisons:    ${summary.fieldComparisons}`);
  console.log(`Mismatches:           ${summary.mismatches}`);
  console.log(`Missing in chart:     ${summary.missingInChart}`);
  console.log(`Missing in reference: ${summary.missingInReference}`);
  if (summary.unmappedFields.length > 0) {
    console.log(`Unmapped fields:      ${summary.unmappedFields.join(', ')}`);
  }
  if (summary.positionalMappings.length > 0) {
    console.log(`Paired by position:   ${summary.positionalMappings.join(', ')}`);
  }
  console.log('\nArtifacts:');
  for (const filePath of Object.values(result.artifacts)) {
    console.log(`  ${filePath}`);
  }
}

main()
  .catch(error => {
    const err = toError(error);
    logger.logError(err, { module: 'run-comparison' });
    if (err instanceof ConfigurationError) {
      console.error(USAGE);
    }
    process.exitCode = 1;
  })
  .finally(() => logger.close());
