/**
 * Curtailment Data Models
 *
 * Domain types shared by the normalizer, sanitizer, apportionment engine,
 * aggregator and report assembler.
 */

import type { DateTime } from 'luxon';
import type { HourKey } from '../utils/dates';

export type SeriesKind = 'marketPrice' | 'redispatchPrice' | 'carbonIntensity';

export const SERIES_KINDS: readonly SeriesKind[] = ['marketPrice', 'redispatchPrice', 'carbonIntensity'];

/** Zone the source writes its timestamps in */
export type SourceZone = 'local' | 'utc';

/**
 * A sanitized curtailment event. Immutable.
 */
export interface CurtailmentEvent {
  readonly plantId: string;

  /** Local wall-clock start */
  readonly start: DateTime;

  /** Local wall-clock end, always after start */
  readonly end: DateTime;

  /** Duration as reported by the source, null when missing or not positive */
  readonly statedDurationMinutes: number | null;

  /** Duration derived from start/end; authoritative for all calculations */
  readonly computedDurationMinutes: number;

  /** Share of capacity curtailed, in (0, 100] */
  readonly curtailmentLevelPercent: number;

  /** Stated and computed durations disagree beyond the tolerance */
  readonly durationMismatch: boolean;

  /** Row index in the source, for diagnostics */
  readonly sourceIndex: number;
}

export interface SeriesDiagnostics {
  totalRows: number;
  acceptedRows: number;
  unparsableTimestamps: number;
  unparsableValues: number;
  /** Rows that overwrote an earlier row for the same hour */
  duplicateHours: number;
  /** Resolved value column, null when the column was not found */
  valueColumn: string | null;
}

export interface SeriesSummary {
  min: number;
  max: number;
  mean: number;
}

/**
 * Canonical hour-keyed lookup built from one external series
 */
export interface HourlySeries {
  readonly kind: SeriesKind;
  readonly values: ReadonlyMap<HourKey, number>;
  readonly diagnostics: Readonly<SeriesDiagnostics>;
  readonly summary: Readonly<SeriesSummary> | null;
}

export type ExternalSeries = Readonly<Record<SeriesKind, HourlySeries>>;

/**
 * Joined view of the three series for one hour. Absent fields mean "no data".
 */
export interface HourlyBucket {
  marketPrice?: number;
  redispatchPrice?: number;
  carbonIntensity?: number;
}

/**
 * One event x hour slice
 */
export interface EventContribution {
  hourKey: HourKey;
  overlapMinutes: number;
  energyMWh: number;
  missedRevenue: number;
  compensation: number;
  redispatchCost: number;
  co2Tonnes: number;
  /** Series with no value for this hour */
  missing: SeriesKind[];
}

export type MissingDataCounts = Record<SeriesKind, number>;

export interface EventApportionment {
  event: CurtailmentEvent;
  energyMWh: number;
  contributions: EventContribution[];
  missing: MissingDataCounts;
}

export interface AggregateTotals {
  curtailedEnergyMWh: number;
  missedRevenue: number;
  compensation: number;
  redispatchCost: number;
  /** compensation + redispatch cost */
  economicImpact: number;
  co2Tonnes: number;
  eventCount: number;
  processedEventCount: number;
  durationMinutes: number;
}

export interface DurationBreakdown {
  minutes: number;
  hours: number;
  days: number;
}

export interface AggregateInsights {
  averageEnergyPerEventMWh: number;
  capacityFactorLossPercent: number;
  /** Energy-weighted, €/MWh */
  averagePriceDuringCurtailment: number;
  duration: DurationBreakdown;
}

export interface AggregateResult {
  totals: AggregateTotals;
  insights: AggregateInsights;
  /** Per-series count of slices without data */
  missingData: MissingDataCounts;
}

export type RejectionReason =
  | 'unparsable-start'
  | 'unparsable-end'
  | 'non-positive-duration'
  | 'level-out-of-range';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'unparsable-start',
  'unparsable-end',
  'non-positive-duration',
  'level-out-of-range'
];

export interface RejectedRow {
  sourceIndex: number;
  reason: RejectionReason;
  start: string | null;
  end: string | null;
}

export interface EventDiagnostics {
  totalRows: number;
  otherPlantRows: number;
  outOfPeriodRows: number;
  rejectedRows: Record<RejectionReason, number>;
  zeroLevelRows: number;
  durationMismatches: number;
  acceptedEvents: number;
}

export interface EventSummary {
  totalDurationMinutes: number;
  maxDurationMinutes: number;
  minDurationMinutes: number;
  averageLevelPercent: number;
}

export type AnalysisOutcome =
  | 'complete'
  | 'no-matching-events'
  | 'all-events-rejected'
  | 'no-impactful-events'
  | 'no-external-data';
