import { PgDialect } from 'drizzle-orm/pg-core';
import { getCategoryProfile } from '../config/categories';
import { buildReferenceQuery, referenceColumns } from '../services/referenceFetcher';
import { ValidationError } from '../utils/errors';

const dialect = new PgDialect();

describe('buildReferenceQuery', () => {
  it('reads a month of daily report rows for one meter', () => {
    const profile = getCategoryProfile('Energy', 'monthly');

    const query = dialect.sqlToQuery(buildReferenceQuery(profile, {
      category: 'Energy',
      mode: 'monthly',
      startDate: '2024-06-01',
      endDate: '2024-06-30',
      entityId: 42
    }));

    expect(query.sql).toBe(
      'SELECT "dateandtime", "activepowersum", "apparentpowersum", "reactivepowersum" ' +
      'FROM "tenant01"."tb_rpt_dtmis_daily" ' +
      'WHERE "mtrid" = $1 AND "dateandtime" >= $2 AND "dateandtime" < $3 AND "version_no" = $4 ' +
      'ORDER BY "dateandtime"'
    );
    expect(query.params).toEqual([42, '2024-06-01', '2024-07-01', 2]);
  });

  it('reads one day of load survey rows', () => {
    const profile = getCategoryProfile('Voltage', 'intraday');

    const query = dialect.sqlToQuery(buildReferenceQuery(profile, {
      category: 'Voltage',
      mode: 'intraday',
      startDate: '2024-06-15',
      endDate: '2024-06-15',
      entityId: 7
    }));

    expect(query.sql).toBe(
      'SELECT "surveydate", "v1", "v2", "v3", "avg_v" ' +
      'FROM "tenant01"."tb_raw_loadsurveydata" ' +
      'WHERE "mtrid" = $1 AND "surveydate" >= $2 AND "surveydate" < $3 ' +
      'ORDER BY "surveydate"'
    );
    expect(query.params).toEqual([7, '2024-06-15', '2024-06-16']);
  });

  it('reads intraday demand as interval energy over the survey interval in hours', () => {
    const profile = getCategoryProfile('Demand', 'intraday');

    const query = dialect.sqlToQuery(buildReferenceQuery(profile, {
      category: 'Demand',
      mode: 'intraday',
      startDate: '2024-06-15',
      endDate: '2024-06-15',
      entityId: 7,
      surveyIntervalMinutes: 30
    }));

    expect(query.sql).toBe(
      'SELECT "surveydate", "kwh_i" / $1 AS "kw_i", "kvah_i" / $2 AS "kva_i", "kvar_i_total" / $3 AS "kvar_i" ' +
      'FROM "tenant01"."tb_raw_loadsurveydata" ' +
      'WHERE "mtrid" = $4 AND "surveydate" >= $5 AND "surveydate" < $6 ' +
      'ORDER BY "surveydate"'
    );
    expect(query.params).toEqual([0.5, 0.5, 0.5, 7, '2024-06-15', '2024-06-16']);
  });

  it('assumes a fifteen minute survey interval when none is given', () => {
    const profile = getCategoryProfile('Demand', 'intraday');

    const query = dialect.sqlToQuery(buildReferenceQuery(profile, {
      category: 'Demand',
      mode: 'intraday',
      startDate: '2024-06-15',
      endDate: '2024-06-15',
      entityId: 7
    }));

    expect(query.params.slice(0, 3)).toEqual([0.25, 0.25, 0.25]);
  });

  it('rejects a range that ends before it starts', () => {
    const profile = getCategoryProfile('Energy', 'monthly');

    expect(() => buildReferenceQuery(profile, {
      category: 'Energy',
      mode: 'monthly',
      startDate: '2024-06-30',
      endDate: '2024-06-01',
      entityId: 42
    })).toThrow(ValidationError);
  });
});

describe('referenceColumns', () => {
  it('lists the key column followed by the mapped columns', () => {
    expect(referenceColumns(getCategoryProfile('Demand', 'intraday'))).toEqual(['surveydate', 'kw_i', 'kva_i', 'kvar_i']);
  });

  it('lists a column shared by two parameters once', () => {
    const profile = getCategoryProfile('Energy', 'intraday');
    profile.columnMapping = { ...profile.columnMapping, Total: 'kwh_i' };

    expect(referenceColumns(profile)).toEqual(['surveydate', 'kwh_i', 'kvah_i', 'kvar_i_total']);
  });
});
