/**
 * Raw source rows as handed over by the spreadsheet loader, before any parsing.
 */

export type RawCell = string | number | null | undefined;

export type RawRow = Readonly<Record<string, RawCell>>;

/**
 * Copy a row with its column names trimmed (exports pad some headers)
 */
export function trimColumnNames(row: RawRow): Record<string, RawCell> {
  const trimmed: Record<string, RawCell> = {};
  for (const [column, value] of Object.entries(row)) {
    trimmed[column.trim()] = value;
  }
  return trimmed;
}

export const CURTAILMENT_COLUMNS = {
  start: 'Start',
  end: 'Ende',
  statedDuration: 'Dauer (Min)',
  level: 'Stufe (%)',
  plantId: 'Anlagenschlüssel'
} as const;

export const MARKET_PRICE_COLUMNS = {
  timestamp: 'Datum von',
  price: 'Deutschland/Luxemburg [€/MWh]'
} as const;

export const REDISPATCH_PRICE_COLUMNS = {
  timestamp: 'Datum von',
  price: 'Preis [€/MWh]'
} as const;

export const CARBON_INTENSITY_COLUMNS = {
  timestamp: 'Datetime (UTC)'
} as const;

/**
 * The carbon intensity export names its column with special characters
 * (e.g. "Carbon intensity gCO₂eq/kWh (direct)"), so it is matched loosely.
 */
export function isCarbonIntensityColumn(column: string): boolean {
  return column.includes('Carbon intensity') && column.includes('direct');
}

export interface ExternalSeriesRows {
  marketPrice: readonly RawRow[];
  redispatchPrice: readonly RawRow[];
  carbonIntensity: readonly RawRow[];
}
