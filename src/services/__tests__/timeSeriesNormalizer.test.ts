import { describe, expect, test } from 'vitest';
import {
  CARBON_INTENSITY_SERIES,
  MARKET_PRICE_SERIES,
  REDISPATCH_PRICE_SERIES,
  hasNoExternalData,
  lookupHourlyBucket,
  normalizeExternalSeries,
  normalizeSeries
} from '../timeSeriesNormalizer';

const MARKET = 'Deutschland/Luxemburg [€/MWh]';
const CARBON = 'Carbon intensity gCO₂eq/kWh (direct)';

describe('normalizeSeries', () => {
  test('keys market prices by local hour and counts dropped rows', () => {
    const series = normalizeSeries(
      [
        { 'Datum von': '01.01.2024 00:00', [MARKET]: '39,48' },
        { 'Datum von': '01.01.2024 01:00', [MARKET]: 31.5 },
        { 'Datum von': 'Summe', [MARKET]: '12,00' },
        { 'Datum von': '01.01.2024 02:00', [MARKET]: '-' }
      ],
      MARKET_PRICE_SERIES
    );

    expect(series.kind).toBe('marketPrice');
    expect([...series.values.entries()]).toEqual([
      ['2024-01-01 00:00', 39.48],
      ['2024-01-01 01:00', 31.5]
    ]);
    expect(series.diagnostics).toEqual({
      totalRows: 4,
      acceptedRows: 2,
      unparsableTimestamps: 1,
      unparsableValues: 1,
      duplicateHours: 0,
      valueColumn: MARKET
    });
    expect(series.summary?.min).toBe(31.5);
    expect(series.summary?.max).toBe(39.48);
    expect(series.summary?.mean).toBeCloseTo(35.49, 10);
  });

  test('trims padded column names', () => {
    const series = normalizeSeries(
      [{ ' Datum von ': '01.01.2024 05:00', 'Preis [€/MWh] ': '12,75' }],
      REDISPATCH_PRICE_SERIES
    );

    expect(series.values.get('2024-01-01 05:00')).toBe(12.75);
  });

  test('lets the later row win for a repeated hour', () => {
    const series = normalizeSeries(
      [
        { 'Datum von': '01.01.2024 10:00', [MARKET]: 50 },
        { 'Datum von': '01.01.2024 10:30', [MARKET]: 70 }
      ],
      MARKET_PRICE_SERIES
    );

    expect(series.values.get('2024-01-01 10:00')).toBe(70);
    expect(series.values.size).toBe(1);
    expect(series.diagnostics.duplicateHours).toBe(1);
    expect(series.diagnostics.acceptedRows).toBe(2);
  });

  test('converts UTC carbon intensity to local hours', () => {
    const series = normalizeSeries(
      [
        { 'Datetime (UTC)': '2024-01-15 09:00:00', [CARBON]: 350 },
        { 'Datetime (UTC)': '2024-07-01 09:00:00', [CARBON]: '210,5' }
      ],
      CARBON_INTENSITY_SERIES
    );

    expect(series.diagnostics.valueColumn).toBe(CARBON);
    expect(series.values.get('2024-01-15 10:00')).toBe(350);
    expect(series.values.get('2024-07-01 11:00')).toBe(210.5);
  });

  test('folds the repeated autumn hour into one key', () => {
    const series = normalizeSeries(
      [
        { 'Datetime (UTC)': '2024-10-27 00:00:00', [CARBON]: 300 },
        { 'Datetime (UTC)': '2024-10-27 01:00:00', [CARBON]: 280 }
      ],
      CARBON_INTENSITY_SERIES
    );

    expect([...series.values.entries()]).toEqual([['2024-10-27 02:00', 280]]);
    expect(series.diagnostics.duplicateHours).toBe(1);
  });

  test('treats a series without its value column as empty', () => {
    const series = normalizeSeries(
      [{ 'Datetime (UTC)': '2024-01-15 09:00:00', 'Carbon intensity (lifecycle)': 400 }],
      CARBON_INTENSITY_SERIES
    );

    expect(series.values.size).toBe(0);
    expect(series.summary).toBeNull();
    expect(series.diagnostics.valueColumn).toBeNull();
    expect(series.diagnostics.totalRows).toBe(1);
  });
});

describe('external series', () => {
  const series = normalizeExternalSeries({
    marketPrice: [{ 'Datum von': '01.01.2024 10:00', [MARKET]: '100,00' }],
    redispatchPrice: [{ 'Datum von': '01.01.2024 11:00', 'Preis [€/MWh]': '20' }],
    carbonIntensity: [{ 'Datetime (UTC)': '2024-01-01 09:00:00', [CARBON]: 400 }]
  });

  test('joins the three lookups per hour', () => {
    expect(lookupHourlyBucket(series, '2024-01-01 10:00')).toEqual({ marketPrice: 100, carbonIntensity: 400 });
    expect(lookupHourlyBucket(series, '2024-01-01 11:00')).toEqual({ redispatchPrice: 20 });
    expect(lookupHourlyBucket(series, '2024-01-01 12:00')).toEqual({});
  });

  test('reports whether any hourly data exists', () => {
    expect(hasNoExternalData(series)).toBe(false);
    expect(hasNoExternalData(normalizeExternalSeries({ marketPrice: [], redispatchPrice: [], carbonIntensity: [] }))).toBe(true);
  });
});
