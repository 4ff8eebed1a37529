/**
 * Reference Fetcher
 *
 * Reads the datastore's own copy of the charted values for one entity and
 * date range. Rows keep the store's native column names; translating them to
 * chart parameter names is the reconciler's job.
 */

import { addDays } from 'date-fns';
import { eq, SQL, sql } from 'drizzle-orm';
import { createDatabase, Database } from '../../db';
import { distributionTransformers, lvFeeders, meterMasterDetails, TENANT_SCHEMA } from '../../db/schema';
import type { ChartCategory, ChartMode, ReferenceDataset, ReferenceRow } from '../types/telemetry';
import { CategoryProfile, getCategoryProfile } from '../config/categories';
import { checkDatabaseHealth, executeQuery } from '../utils/database';
import { formatDate, parseDate } from '../utils/dates';
import { toError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ReferenceQuery {
  category: ChartCategory;
  mode: ChartMode;
  // inclusive YYYY-MM-DD bounds
  startDate: string;
  endDate: string;
  entityId: number;
  // survey interval of the meter, looked up when a category needs it and it is not given
  surveyIntervalMinutes?: number;
}

export interface ReferenceStore {
  fetchRange(query: ReferenceQuery): Promise<ReferenceDataset>;
}

export interface MeterInfo {
  meterId: number;
  name: string | null;
  source: 'distribution-transformer' | 'lv-feeder';
  surveyIntervalMinutes: number;
}

export interface MeterDirectory {
  resolveMeter(serialNumber: string): Promise<MeterInfo | null>;
}

// Survey interval assumed when the meter master has none
export const DEFAULT_SURVEY_INTERVAL_MINUTES = 15;

/**
 * Columns read for a category: the key column followed by every mapped column
 */
export function referenceColumns(profile: CategoryProfile): string[] {
  const columns = [profile.source.keyColumn];
  for (const column of Object.values(profile.columnMapping)) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }
  return columns;
}

/**
 * Parameterized range query for a category; the end date is inclusive.
 * Interval rate columns are computed from their energy column and the
 * meter's survey interval.
 */
export function buildReferenceQuery(profile: CategoryProfile, query: ReferenceQuery): SQL {
  const start = parseDate(query.startDate);
  const end = parseDate(query.endDate);
  if (end < start) {
    throw new ValidationError(`End date ${query.endDate} is before start date ${query.startDate}`, {
      context: { startDate: query.startDate, endDate: query.endDate }
    });
  }

  const { table, keyColumn, entityColumn, fixedFilters } = profile.source;
  const key = sql.identifier(keyColumn);

  const conditions: SQL[] = [
    sql`${sql.identifier(entityColumn)} = ${query.entityId}`,
    sql`${key} >= ${formatDate(start)}`,
    sql`${key} < ${formatDate(addDays(end, 1))}`
  ];
  for (const [column, value] of Object.entries(fixedFilters)) {
    conditions.push(sql`${sql.identifier(column)} = ${value}`);
  }

  const rates = profile.source.intervalRates ?? {};
  const intervalHours = (query.surveyIntervalMinutes ?? DEFAULT_SURVEY_INTERVAL_MINUTES) / 60;
  const columns = sql.join(referenceColumns(profile).map(column => {
    const energyColumn = Object.prototype.hasOwnProperty.call(rates, column) ? rates[column] : undefined;
    return energyColumn === undefined ?
      sql.identifier(column) :
      sql`${sql.identifier(energyColumn)} / ${intervalHours} AS ${sql.identifier(column)}`;
  }), sql`, `);

  return sql`SELECT ${columns} FROM ${sql.identifier(TENANT_SCHEMA)}.${sql.identifier(table)} WHERE ${sql.join(conditions, sql` AND `)} ORDER BY ${key}`;
}

export class PgReferenceStore implements ReferenceStore, MeterDirectory {
  constructor(private readonly db: Database) {}

  checkHealth(): Promise<boolean> {
    return checkDatabaseHealth(this.db);
  }

  async fetchRange(query: ReferenceQuery): Promise<ReferenceDataset> {
    const profile = getCategoryProfile(query.category, query.mode);
    const surveyIntervalMinutes = profile.source.intervalRates && query.surveyIntervalMinutes === undefined ?
      await this.surveyInterval(query.entityId) :
      query.surveyIntervalMinutes;
    const statement = buildReferenceQuery(profile, { ...query, surveyIntervalMinutes });

    const result = await executeQuery(
      'fetchReferenceRange',
      () => this.db.execute<ReferenceRow>(statement),
      { ...query, table: profile.source.table }
    );

    const columns = result.fields.length > 0 ?
      result.fields.map(field => field.name) :
      referenceColumns(profile);

    logger.info(`Fetched ${result.rows.length} reference rows from ${profile.source.table}`, {
      module: 'referenceFetcher',
      context: { category: query.category, mode: query.mode, entityId: query.entityId }
    });

    return {
      category: query.category,
      mode: query.mode,
      keyColumn: profile.source.keyColumn,
      columns,
      rows: result.rows
    };
  }

  async resolveMeter(serialNumber: string): Promise<MeterInfo | null> {
    const transformer = await executeQuery(
      'findDistributionTransformer',
      () => this.db
        .select({ meterId: distributionTransformers.meterId, name: distributionTransformers.dtName })
        .from(distributionTransformers)
        .where(eq(distributionTransformers.meterSerialNo, serialNumber))
        .limit(1),
      { serialNumber }
    );

    let match: { meterId: number | null; name: string | null } | undefined = transformer[0];
    let source: MeterInfo['source'] = 'distribution-transformer';

    if (!match || match.meterId === null) {
      const feeder = await executeQuery(
        'findLvFeeder',
        () => this.db
          .select({ meterId: lvFeeders.meterId, name: lvFeeders.lvFeederName })
          .from(lvFeeders)
          .where(eq(lvFeeders.meterSerialNo, serialNumber))
          .limit(1),
        { serialNumber }
      );
      match = feeder[0];
      source = 'lv-feeder';
    }

    if (!match || match.meterId === null) {
      logger.warning(`No meter registered with serial ${serialNumber}`, { module: 'referenceFetcher' });
      return null;
    }

    return {
      meterId: match.meterId,
      name: match.name,
      source,
      surveyIntervalMinutes: await this.surveyInterval(match.meterId)
    };
  }

  async surveyInterval(meterId: number): Promise<number> {
    const master = await executeQuery(
      'findSurveyInterval',
      () => this.db
        .select({ sip: meterMasterDetails.sip })
        .from(meterMasterDetails)
        .where(eq(meterMasterDetails.mtrid, meterId))
        .limit(1),
      { meterId }
    );
    const sip = master[0]?.sip;
    return sip && sip > 0 ? sip : DEFAULT_SURVEY_INTERVAL_MINUTES;
  }
}

/**
 * Open a pool, run `fn` against a store backed by it and end the pool
 * afterwards, whatever happens
 */
export async function withReferenceStore<T>(
  connectionString: string,
  poolMax: number,
  fn: (store: PgReferenceStore) => Promise<T>
): Promise<T> {
  const { db, pool } = createDatabase(connectionString, poolMax);
  try {
    return await fn(new PgReferenceStore(db));
  } finally {
    try {
      await pool.end();
    } catch (error) {
      logger.error('Failed to close database pool', {
        module: 'referenceFetcher',
        error: toError(error)
      });
    }
  }
}
