/**
 * Event Sanitizer
 *
 * Validates curtailment log rows and turns them into immutable
 * CurtailmentEvents. Defective rows are dropped and counted, never fatal.
 * Zero-level rows are counted separately from rejected rows so a report can
 * tell "nothing was curtailed" apart from "the data was unusable".
 */

import type { DateTime } from 'luxon';
import { logger } from '../utils/logger';
import { parseDecimal } from '../utils/calculations';
import { minutesBetween, parseDayFirstDateTime } from '../utils/dates';
import { CURTAILMENT_COLUMNS, trimColumnNames, type RawCell, type RawRow } from '../types/sources';
import type {
  CurtailmentEvent,
  EventDiagnostics,
  EventSummary,
  RejectedRow,
  RejectionReason
} from '../models/curtailment';

const MODULE = 'eventSanitizer';

export type PlantPredicate = (plantId: string) => boolean;

export interface AnalysisWindow {
  /** Inclusive */
  start: DateTime;
  /** Exclusive */
  end: DateTime;
}

export interface SanitizeOptions {
  plantFilter: PlantPredicate;
  period?: AnalysisWindow;
  durationMismatchToleranceMinutes: number;
  diagnosticSampleSize: number;
}

export type RowOutcome =
  | { status: 'accepted'; event: CurtailmentEvent }
  | { status: 'rejected'; rejection: RejectedRow }
  | { status: 'zero-level' }
  | { status: 'other-plant' }
  | { status: 'out-of-period' };

export interface SanitizedEvents {
  events: readonly CurtailmentEvent[];
  diagnostics: EventDiagnostics;
  /** First events whose stated duration disagreed with the computed one */
  flaggedEvents: readonly CurtailmentEvent[];
  /** First rejected rows */
  rejectedSample: readonly RejectedRow[];
  summary: EventSummary | null;
}

/**
 * Predicate matching a single plant identifier
 */
export function matchPlant(plantId: string): PlantPredicate {
  const wanted = plantId.trim();
  return candidate => candidate === wanted;
}

function cellText(value: RawCell): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value).trim();
}

function reject(sourceIndex: number, reason: RejectionReason, row: Record<string, RawCell>): RowOutcome {
  return {
    status: 'rejected',
    rejection: {
      sourceIndex,
      reason,
      start: cellText(row[CURTAILMENT_COLUMNS.start]),
      end: cellText(row[CURTAILMENT_COLUMNS.end])
    }
  };
}

/**
 * Sanitize a single curtailment log row
 */
export function sanitizeEventRow(rawRow: RawRow, sourceIndex: number, options: SanitizeOptions): RowOutcome {
  const row = trimColumnNames(rawRow);

  const plantId = cellText(row[CURTAILMENT_COLUMNS.plantId]) ?? '';
  if (!options.plantFilter(plantId)) {
    return { status: 'other-plant' };
  }

  const start = parseDayFirstDateTime(row[CURTAILMENT_COLUMNS.start]);
  if (!start) {
    return reject(sourceIndex, 'unparsable-start', row);
  }
  const end = parseDayFirstDateTime(row[CURTAILMENT_COLUMNS.end]);
  if (!end) {
    return reject(sourceIndex, 'unparsable-end', row);
  }
  if (end <= start) {
    return reject(sourceIndex, 'non-positive-duration', row);
  }

  if (options.period && (start < options.period.start || start >= options.period.end)) {
    return { status: 'out-of-period' };
  }

  // Missing level means no curtailment
  const level = parseDecimal(row[CURTAILMENT_COLUMNS.level]) ?? 0;
  if (level <= 0) {
    return { status: 'zero-level' };
  }
  if (level > 100) {
    return reject(sourceIndex, 'level-out-of-range', row);
  }

  const computedDurationMinutes = minutesBetween(start, end);
  const stated = parseDecimal(row[CURTAILMENT_COLUMNS.statedDuration]);
  const statedDurationMinutes = stated !== null && stated > 0 ? stated : null;
  const durationMismatch = statedDurationMinutes !== null
    && Math.abs(statedDurationMinutes - computedDurationMinutes) > options.durationMismatchToleranceMinutes;

  const event: CurtailmentEvent = Object.freeze({
    plantId,
    start,
    end,
    statedDurationMinutes,
    computedDurationMinutes,
    curtailmentLevelPercent: level,
    durationMismatch,
    sourceIndex
  });

  return { status: 'accepted', event };
}

function summarizeEvents(events: readonly CurtailmentEvent[]): EventSummary | null {
  if (events.length === 0) {
    return null;
  }

  const durations = events.map(event => event.computedDurationMinutes);
  const totalLevel = events.reduce((sum, event) => sum + event.curtailmentLevelPercent, 0);

  return {
    totalDurationMinutes: durations.reduce((sum, minutes) => sum + minutes, 0),
    maxDurationMinutes: Math.max(...durations),
    minDurationMinutes: Math.min(...durations),
    averageLevelPercent: totalLevel / events.length
  };
}

/**
 * Sanitize a whole curtailment log
 */
export function sanitizeEvents(rows: readonly RawRow[], options: SanitizeOptions): SanitizedEvents {
  const events: CurtailmentEvent[] = [];
  const flaggedEvents: CurtailmentEvent[] = [];
  const rejectedSample: RejectedRow[] = [];
  const diagnostics: EventDiagnostics = {
    totalRows: rows.length,
    otherPlantRows: 0,
    outOfPeriodRows: 0,
    rejectedRows: {
      'unparsable-start': 0,
      'unparsable-end': 0,
      'non-positive-duration': 0,
      'level-out-of-range': 0
    },
    zeroLevelRows: 0,
    durationMismatches: 0,
    acceptedEvents: 0
  };

  rows.forEach((row, index) => {
    const outcome = sanitizeEventRow(row, index, options);

    switch (outcome.status) {
      case 'accepted':
        events.push(outcome.event);
        diagnostics.acceptedEvents++;
        if (outcome.event.durationMismatch) {
          diagnostics.durationMismatches++;
          if (flaggedEvents.length < options.diagnosticSampleSize) {
            flaggedEvents.push(outcome.event);
          }
        }
        break;
      case 'rejected':
        diagnostics.rejectedRows[outcome.rejection.reason]++;
        if (rejectedSample.length < options.diagnosticSampleSize) {
          rejectedSample.push(outcome.rejection);
        }
        break;
      case 'zero-level':
        diagnostics.zeroLevelRows++;
        break;
      case 'other-plant':
        diagnostics.otherPlantRows++;
        break;
      case 'out-of-period':
        diagnostics.outOfPeriodRows++;
        break;
    }
  });

  const rejectedTotal = countRejected(diagnostics);
  if (rejectedTotal > 0) {
    logger.warning(`Rejected ${rejectedTotal} malformed curtailment rows`, {
      module: MODULE,
      context: { ...diagnostics.rejectedRows }
    });
  }
  if (diagnostics.durationMismatches > 0) {
    logger.warning(`${diagnostics.durationMismatches} events report a duration that disagrees with their timestamps`, {
      module: MODULE
    });
  }

  const summary = summarizeEvents(events);
  logger.info(`Found ${events.length} curtailment events (${diagnostics.zeroLevelRows} zero-level rows skipped)`, {
    module: MODULE,
    context: summary ? { ...summary } : {}
  });

  return {
    events: Object.freeze(events),
    diagnostics,
    flaggedEvents: Object.freeze(flaggedEvents),
    rejectedSample: Object.freeze(rejectedSample),
    summary
  };
}

export function countRejected(diagnostics: EventDiagnostics): number {
  return Object.values(diagnostics.rejectedRows).reduce((sum, count) => sum + count, 0);
}
