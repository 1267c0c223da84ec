/**
 * Time Series Normalizer
 *
 * Turns the raw market price, redispatch price and carbon intensity rows into
 * hour-keyed lookups in local wall-clock time. Rows with unparsable timestamps
 * or values are dropped and counted; a later row for the same hour replaces an
 * earlier one (source files are chronological).
 */

import type { DateTime } from 'luxon';
import { logger } from '../utils/logger';
import { parseDecimal } from '../utils/calculations';
import { DEFAULT_LOCAL_TIMEZONE, parseDayFirstDateTime, parseUtcToLocal, toHourKey, type HourKey } from '../utils/dates';
import {
  CARBON_INTENSITY_COLUMNS,
  MARKET_PRICE_COLUMNS,
  REDISPATCH_PRICE_COLUMNS,
  isCarbonIntensityColumn,
  trimColumnNames,
  type ExternalSeriesRows,
  type RawCell,
  type RawRow
} from '../types/sources';
import type {
  ExternalSeries,
  HourlyBucket,
  HourlySeries,
  SeriesDiagnostics,
  SeriesKind,
  SeriesSummary,
  SourceZone
} from '../models/curtailment';

const MODULE = 'timeSeriesNormalizer';

export interface SeriesDefinition {
  kind: SeriesKind;
  timestampColumn: string;
  /** Exact column name, or a matcher over the trimmed column names */
  valueColumn: string | ((column: string) => boolean);
  zone: SourceZone;
  unit: string;
}

export const MARKET_PRICE_SERIES: SeriesDefinition = {
  kind: 'marketPrice',
  timestampColumn: MARKET_PRICE_COLUMNS.timestamp,
  valueColumn: MARKET_PRICE_COLUMNS.price,
  zone: 'local',
  unit: '€/MWh'
};

export const REDISPATCH_PRICE_SERIES: SeriesDefinition = {
  kind: 'redispatchPrice',
  timestampColumn: REDISPATCH_PRICE_COLUMNS.timestamp,
  valueColumn: REDISPATCH_PRICE_COLUMNS.price,
  zone: 'local',
  unit: '€/MWh'
};

export const CARBON_INTENSITY_SERIES: SeriesDefinition = {
  kind: 'carbonIntensity',
  timestampColumn: CARBON_INTENSITY_COLUMNS.timestamp,
  valueColumn: isCarbonIntensityColumn,
  zone: 'utc',
  unit: 'g/kWh'
};

function resolveValueColumn(definition: SeriesDefinition, rows: readonly Record<string, RawCell>[]): string | null {
  const matcher = definition.valueColumn;
  if (typeof matcher === 'string') {
    return rows.some(row => matcher in row) ? matcher : null;
  }

  for (const row of rows) {
    const column = Object.keys(row).find(matcher);
    if (column !== undefined) {
      return column;
    }
  }
  return null;
}

function parseTimestamp(value: RawCell, zone: SourceZone, timezone: string): DateTime | null {
  if (typeof value !== 'string') {
    return null;
  }
  return zone === 'utc' ? parseUtcToLocal(value, timezone) : parseDayFirstDateTime(value);
}

function summarize(values: Iterable<number>): SeriesSummary | null {
  let count = 0;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;

  for (const value of values) {
    count++;
    sum += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }

  return count === 0 ? null : { min, max, mean: sum / count };
}

function emptyDiagnostics(totalRows: number, valueColumn: string | null): SeriesDiagnostics {
  return {
    totalRows,
    acceptedRows: 0,
    unparsableTimestamps: 0,
    unparsableValues: 0,
    duplicateHours: 0,
    valueColumn
  };
}

/**
 * Build the hour-keyed lookup for one series
 *
 * @param timezone - local zone UTC series are converted into
 */
export function normalizeSeries(
  rows: readonly RawRow[],
  definition: SeriesDefinition,
  timezone: string = DEFAULT_LOCAL_TIMEZONE
): HourlySeries {
  const trimmedRows = rows.map(trimColumnNames);
  const valueColumn = resolveValueColumn(definition, trimmedRows);
  const diagnostics = emptyDiagnostics(rows.length, valueColumn);
  const values = new Map<HourKey, number>();

  if (valueColumn === null) {
    if (rows.length > 0) {
      logger.error(`Could not find the ${definition.kind} value column; series treated as empty`, {
        module: MODULE,
        context: { columns: Object.keys(trimmedRows[0] ?? {}) }
      });
    }
    return Object.freeze({
      kind: definition.kind,
      values,
      diagnostics: Object.freeze(diagnostics),
      summary: null
    });
  }

  for (const row of trimmedRows) {
    const time = parseTimestamp(row[definition.timestampColumn], definition.zone, timezone);
    if (!time) {
      diagnostics.unparsableTimestamps++;
      continue;
    }

    const value = parseDecimal(row[valueColumn]);
    if (value === null) {
      diagnostics.unparsableValues++;
      continue;
    }

    const key = toHourKey(time);
    if (values.has(key)) {
      diagnostics.duplicateHours++;
    }
    values.set(key, value);
    diagnostics.acceptedRows++;
  }

  const summary = summarize(values.values());

  logger.info(`Loaded ${values.size} ${definition.kind} hours from ${rows.length} rows`, {
    module: MODULE,
    context: {
      ...diagnostics,
      ...(summary ? { min: summary.min, max: summary.max, mean: summary.mean, unit: definition.unit } : {})
    }
  });

  if (diagnostics.unparsableTimestamps > 0 || diagnostics.unparsableValues > 0) {
    logger.warning(
      `Dropped ${diagnostics.unparsableTimestamps + diagnostics.unparsableValues} unparsable ${definition.kind} rows`,
      { module: MODULE }
    );
  }

  return Object.freeze({
    kind: definition.kind,
    values,
    diagnostics: Object.freeze(diagnostics),
    summary: summary ? Object.freeze(summary) : null
  });
}

/**
 * Normalize the three standard external series. The result can be shared
 * across analyses of several plants.
 */
export function normalizeExternalSeries(
  rows: ExternalSeriesRows,
  timezone: string = DEFAULT_LOCAL_TIMEZONE
): ExternalSeries {
  return Object.freeze({
    marketPrice: normalizeSeries(rows.marketPrice, MARKET_PRICE_SERIES, timezone),
    redispatchPrice: normalizeSeries(rows.redispatchPrice, REDISPATCH_PRICE_SERIES, timezone),
    carbonIntensity: normalizeSeries(rows.carbonIntensity, CARBON_INTENSITY_SERIES, timezone)
  });
}

/**
 * Join the three lookups for one hour
 */
export function lookupHourlyBucket(series: ExternalSeries, hourKey: HourKey): HourlyBucket {
  const bucket: HourlyBucket = {};
  const marketPrice = series.marketPrice.values.get(hourKey);
  const redispatchPrice = series.redispatchPrice.values.get(hourKey);
  const carbonIntensity = series.carbonIntensity.values.get(hourKey);

  if (marketPrice !== undefined) bucket.marketPrice = marketPrice;
  if (redispatchPrice !== undefined) bucket.redispatchPrice = redispatchPrice;
  if (carbonIntensity !== undefined) bucket.carbonIntensity = carbonIntensity;

  return bucket;
}

/**
 * True when none of the series holds a single usable hour
 */
export function hasNoExternalData(series: ExternalSeries): boolean {
  return series.marketPrice.values.size === 0
    && series.redispatchPrice.values.size === 0
    && series.carbonIntensity.values.size === 0;
}
