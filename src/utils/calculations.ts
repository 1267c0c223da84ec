/**
 * Utility functions for the energy, money and emission figures used throughout the analysis
 */

export const MINUTES_PER_HOUR = 60;
export const MINUTES_PER_DAY = 1440;
export const KWH_PER_MWH = 1000;
export const GRAMS_PER_TONNE = 1_000_000;

export type SourceNumber = string | number | null | undefined;

/**
 * Parse a numeric cell. Accepts numbers and text with `.` or `,` as the
 * decimal separator (German exports write `12,34`). Returns null for blanks
 * and anything non-numeric.
 */
export function parseDecimal(value: SourceNumber): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  let text = value.trim().replace(/\s/g, '');
  if (!text) {
    return null;
  }

  // "1.234,56" -> thousands dot, decimal comma
  if (text.includes(',') && text.includes('.')) {
    text = text.lastIndexOf(',') > text.lastIndexOf('.')
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else {
    text = text.replace(',', '.');
  }

  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(text)) {
    return null;
  }

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Curtailed energy of an event in MWh
 */
export function calculateCurtailedEnergy(
  durationMinutes: number,
  turbineCapacityMW: number,
  curtailmentLevelPercent: number
): number {
  return (durationMinutes / MINUTES_PER_HOUR) * turbineCapacityMW * (curtailmentLevelPercent / 100);
}

/**
 * MWh x g/kWh -> tonnes of CO2
 */
export function calculateCo2Tonnes(energyMWh: number, carbonIntensityGramsPerKWh: number): number {
  return (energyMWh * KWH_PER_MWH * carbonIntensityGramsPerKWh) / GRAMS_PER_TONNE;
}

/**
 * Division that yields `fallback` instead of NaN/Infinity for a zero denominator
 */
export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  return denominator === 0 ? fallback : numerator / denominator;
}

export function minutesToHours(minutes: number): number {
  return minutes / MINUTES_PER_HOUR;
}

export function minutesToDays(minutes: number): number {
  return minutes / MINUTES_PER_DAY;
}

/**
 * Format a number with thousands separators and fixed decimals (e.g. "1,234.50")
 */
export function formatNumber(value: number, fractionDigits = 2): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits
  });
}

/**
 * Format a number as a euro amount (e.g. "€1,234.50")
 */
export function formatCurrency(value: number): string {
  return `${value < 0 ? '-' : ''}€${formatNumber(Math.abs(value))}`;
}
