import type { DateTime } from 'luxon';
import { parseDayFirstDateTime, type HourKey } from '../../../utils/dates';
import { CURTAILMENT_COLUMNS, type RawRow } from '../../../types/sources';
import type { CurtailmentEvent, ExternalSeries, HourlySeries, SeriesKind } from '../../../models/curtailment';

export const PLANT = 'PLANT-1';

export function at(text: string): DateTime {
  const parsed = parseDayFirstDateTime(text);
  if (!parsed) {
    throw new Error(`bad fixture timestamp ${text}`);
  }
  return parsed;
}

export function eventRow(
  start: string,
  end: string,
  level: string | number,
  options: { plant?: string; stated?: string | number } = {}
): RawRow {
  return {
    [CURTAILMENT_COLUMNS.start]: start,
    [CURTAILMENT_COLUMNS.end]: end,
    [CURTAILMENT_COLUMNS.level]: level,
    [CURTAILMENT_COLUMNS.statedDuration]: options.stated ?? null,
    [CURTAILMENT_COLUMNS.plantId]: options.plant ?? PLANT
  };
}

export function makeEvent(start: string, end: string, level: number, sourceIndex = 0): CurtailmentEvent {
  const startTime = at(start);
  const endTime = at(end);
  return {
    plantId: PLANT,
    start: startTime,
    end: endTime,
    statedDurationMinutes: null,
    computedDurationMinutes: endTime.diff(startTime, 'minutes').minutes,
    curtailmentLevelPercent: level,
    durationMismatch: false,
    sourceIndex
  };
}

function seriesOf(kind: SeriesKind, entries: Record<HourKey, number>): HourlySeries {
  const values = new Map(Object.entries(entries));
  return {
    kind,
    values,
    diagnostics: {
      totalRows: values.size,
      acceptedRows: values.size,
      unparsableTimestamps: 0,
      unparsableValues: 0,
      duplicateHours: 0,
      valueColumn: kind
    },
    summary: null
  };
}

export function makeSeries(entries: Partial<Record<SeriesKind, Record<HourKey, number>>>): ExternalSeries {
  return {
    marketPrice: seriesOf('marketPrice', entries.marketPrice ?? {}),
    redispatchPrice: seriesOf('redispatchPrice', entries.redispatchPrice ?? {}),
    carbonIntensity: seriesOf('carbonIntensity', entries.carbonIntensity ?? {})
  };
}

export const baseConfig = {
  turbineCapacityMW: 2.3,
  compensationRate: 0.925,
  plantId: PLANT,
  hoursInAnalysisPeriod: 8784
};
