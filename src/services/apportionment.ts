/**
 * Apportionment Engine
 *
 * Spreads the curtailed energy of one event over the hour buckets it overlaps
 * and prices each slice against the market, redispatch and carbon series.
 * Each slice carries `energy x overlap / duration`, so the slices of an event
 * always add back up to the event total.
 */

import { calculateCo2Tonnes, calculateCurtailedEnergy } from '../utils/calculations';
import { minutesBetween, toHourKey } from '../utils/dates';
import { CalculationError } from '../utils/errors';
import { lookupHourlyBucket } from './timeSeriesNormalizer';
import type {
  CurtailmentEvent,
  EventApportionment,
  EventContribution,
  ExternalSeries,
  MissingDataCounts,
  SeriesKind
} from '../models/curtailment';

export interface ApportionmentSettings {
  turbineCapacityMW: number;
  compensationRate: number;
}

export function emptyMissingDataCounts(): MissingDataCounts {
  return { marketPrice: 0, redispatchPrice: 0, carbonIntensity: 0 };
}

/**
 * Curtailed energy (MWh) of a whole event
 */
export function eventEnergy(event: CurtailmentEvent, turbineCapacityMW: number): number {
  return calculateCurtailedEnergy(
    event.computedDurationMinutes,
    turbineCapacityMW,
    event.curtailmentLevelPercent
  );
}

/**
 * Apportion one sanitized event over its hour buckets
 */
export function apportionEvent(
  event: CurtailmentEvent,
  series: ExternalSeries,
  settings: ApportionmentSettings
): EventApportionment {
  const durationMinutes = event.computedDurationMinutes;
  if (!(durationMinutes > 0)) {
    throw new CalculationError(`Event at source row ${event.sourceIndex} has no positive duration`, {
      context: { sourceIndex: event.sourceIndex, durationMinutes }
    });
  }

  const energyMWh = eventEnergy(event, settings.turbineCapacityMW);
  const contributions: EventContribution[] = [];
  const missing = emptyMissingDataCounts();

  let hourStart = event.start.startOf('hour');
  while (hourStart < event.end) {
    const hourEnd = hourStart.plus({ hours: 1 });
    const sliceStart = hourStart > event.start ? hourStart : event.start;
    const sliceEnd = hourEnd < event.end ? hourEnd : event.end;
    const overlapMinutes = Math.max(0, minutesBetween(sliceStart, sliceEnd));

    if (overlapMinutes > 0) {
      const hourKey = toHourKey(hourStart);
      const bucket = lookupHourlyBucket(series, hourKey);
      const sliceMissing: SeriesKind[] = [];

      if (bucket.marketPrice === undefined) sliceMissing.push('marketPrice');
      if (bucket.redispatchPrice === undefined) sliceMissing.push('redispatchPrice');
      if (bucket.carbonIntensity === undefined) sliceMissing.push('carbonIntensity');
      for (const kind of sliceMissing) {
        missing[kind]++;
      }

      const sliceEnergy = energyMWh * (overlapMinutes / durationMinutes);
      const missedRevenue = sliceEnergy * (bucket.marketPrice ?? 0);

      contributions.push({
        hourKey,
        overlapMinutes,
        energyMWh: sliceEnergy,
        missedRevenue,
        compensation: missedRevenue * settings.compensationRate,
        redispatchCost: sliceEnergy * (bucket.redispatchPrice ?? 0),
        co2Tonnes: calculateCo2Tonnes(sliceEnergy, bucket.carbonIntensity ?? 0),
        missing: sliceMissing
      });
    }

    hourStart = hourEnd;
  }

  return { event, energyMWh, contributions, missing };
}

export function apportionEvents(
  events: readonly CurtailmentEvent[],
  series: ExternalSeries,
  settings: ApportionmentSettings
): EventApportionment[] {
  return events.map(event => apportionEvent(event, series, settings));
}
