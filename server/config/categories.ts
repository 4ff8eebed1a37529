/**
 * Static category table
 *
 * Each chart category fixes the parameter names the dashboard shows in its
 * tooltips and the native columns the reference store keeps them in. Monthly
 * charts are backed by the daily report table, intraday charts by the raw load
 * survey table.
 */

import { CHART_CATEGORIES, ChartCategory, ChartMode } from '../types/telemetry';
import { ConfigurationError } from '../utils/errors';

export interface ReferenceSource {
  table: string;
  keyColumn: string;
  entityColumn: string;
  fixedFilters: Record<string, string | number>;
  // derived column -> interval energy column; read as energy / (survey interval in hours)
  intervalRates?: Record<string, string>;
}

export interface CategoryProfile {
  category: ChartCategory;
  mode: ChartMode;
  keyField: string;
  defaultParameters: string[];
  // chart parameter -> native reference column, in display order
  columnMapping: Record<string, string>;
  source: ReferenceSource;
}

interface ProfileDefinition {
  columnMapping: Record<string, string>;
  intervalRates?: Record<string, string>;
}

const DAILY_REPORT_SOURCE: ReferenceSource = {
  table: 'tb_rpt_dtmis_daily',
  keyColumn: 'dateandtime',
  entityColumn: 'mtrid',
  fixedFilters: { version_no: 2 }
};

const LOAD_SURVEY_SOURCE: ReferenceSource = {
  table: 'tb_raw_loadsurveydata',
  keyColumn: 'surveydate',
  entityColumn: 'mtrid',
  fixedFilters: {}
};

const KEY_FIELDS: Record<ChartMode, string> = {
  monthly: 'Date',
  intraday: 'Time'
};

const SOURCES: Record<ChartMode, ReferenceSource> = {
  monthly: DAILY_REPORT_SOURCE,
  intraday: LOAD_SURVEY_SOURCE
};

const PROFILES: Record<ChartMode, Record<ChartCategory, ProfileDefinition>> = {
  monthly: {
    Voltage: {
      columnMapping: {
        'Phase 1': 'avgvoltage_ph1',
        'Phase 2': 'avgvoltage_ph2',
        'Phase 3': 'avgvoltage_ph3',
        'Avg': 'avgvoltage_avg'
      }
    },
    Current: {
      columnMapping: {
        'Line 1': 'avgcurrent_ph1',
        'Line 2': 'avgcurrent_ph2',
        'Line 3': 'avgcurrent_ph3',
        'Avg': 'avgcurrent_avg',
        'Neutral': 'avgneutralcurrent'
      }
    },
    Energy: {
      columnMapping: {
        'Active': 'activepowersum',
        'Apparent': 'apparentpowersum',
        'Reactive': 'reactivepowersum'
      }
    },
    Demand: {
      columnMapping: {
        'Active': 'avgdemand_kw',
        'Apparent': 'avgdemand_kva',
        'Reactive': 'avgdemand_kvar'
      }
    }
  },
  intraday: {
    Voltage: {
      columnMapping: {
        'Phase 1': 'v1',
        'Phase 2': 'v2',
        'Phase 3': 'v3',
        'Avg': 'avg_v'
      }
    },
    Current: {
      columnMapping: {
        'Line 1': 'i1_line',
        'Line 2': 'i2_line',
        'Line 3': 'i3_line',
        'Avg': 'avg_i'
      }
    },
    Energy: {
      columnMapping: {
        'Active': 'kwh_i',
        'Apparent': 'kvah_i',
        'Reactive': 'kvar_i_total'
      }
    },
    Demand: {
      columnMapping: {
        'Active': 'kw_i',
        'Apparent': 'kva_i',
        'Reactive': 'kvar_i'
      },
      // load survey rows hold energy per interval; the chart plots the average demand over it
      intervalRates: {
        'kw_i': 'kwh_i',
        'kva_i': 'kvah_i',
        'kvar_i': 'kvar_i_total'
      }
    }
  }
};

export function isChartMode(value: string): value is ChartMode {
  return value === 'monthly' || value === 'intraday';
}

/**
 * Resolve a category name case-insensitively ("energy" -> "Energy")
 */
export function parseCategory(value: string): ChartCategory {
  const match = CHART_CATEGORIES.find(category => category.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Unknown chart category '${value}'. Expected one of: ${CHART_CATEGORIES.join(', ')}`, {
      context: { value }
    });
  }
  return match;
}

export function getCategoryProfile(category: ChartCategory, mode: ChartMode): CategoryProfile {
  const definition = PROFILES[mode][category];
  return {
    category,
    mode,
    keyField: KEY_FIELDS[mode],
    defaultParameters: Object.keys(definition.columnMapping),
    columnMapping: { ...definition.columnMapping },
    source: {
      ...SOURCES[mode],
      fixedFilters: { ...SOURCES[mode].fixedFilters },
      ...(definition.intervalRates ? { intervalRates: { ...definition.intervalRates } } : {})
    }
  };
}
