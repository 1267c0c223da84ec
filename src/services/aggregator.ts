/**
 * Aggregator
 *
 * Folds apportioned events into running totals and derives the headline
 * insights once every event has been added. Partial aggregators can be merged,
 * so events may be split across independent passes.
 */

import { minutesToDays, minutesToHours, safeDivide } from '../utils/calculations';
import { emptyMissingDataCounts } from './apportionment';
import {
  SERIES_KINDS,
  type AggregateResult,
  type EventApportionment,
  type EventContribution,
  type MissingDataCounts
} from '../models/curtailment';

export interface FinalizeParams {
  /** Impactful plus zero-level events */
  eventCount: number;
  turbineCapacityMW: number;
  hoursInAnalysisPeriod: number;
}

interface RunningTotals {
  curtailedEnergyMWh: number;
  missedRevenue: number;
  compensation: number;
  redispatchCost: number;
  co2Tonnes: number;
  processedEventCount: number;
  durationMinutes: number;
}

const RUNNING_TOTAL_KEYS: readonly (keyof RunningTotals)[] = [
  'curtailedEnergyMWh',
  'missedRevenue',
  'compensation',
  'redispatchCost',
  'co2Tonnes',
  'processedEventCount',
  'durationMinutes'
];

export class CurtailmentAggregator {
  private readonly totals: RunningTotals = {
    curtailedEnergyMWh: 0,
    missedRevenue: 0,
    compensation: 0,
    redispatchCost: 0,
    co2Tonnes: 0,
    processedEventCount: 0,
    durationMinutes: 0
  };
  private readonly missing: MissingDataCounts = emptyMissingDataCounts();
  private readonly retained: EventContribution[] = [];

  constructor(private readonly retainContributions = false) {}

  add(apportionment: EventApportionment): this {
    this.totals.processedEventCount++;
    this.totals.durationMinutes += apportionment.event.computedDurationMinutes;

    for (const contribution of apportionment.contributions) {
      this.totals.curtailedEnergyMWh += contribution.energyMWh;
      this.totals.missedRevenue += contribution.missedRevenue;
      this.totals.compensation += contribution.compensation;
      this.totals.redispatchCost += contribution.redispatchCost;
      this.totals.co2Tonnes += contribution.co2Tonnes;
    }

    for (const kind of SERIES_KINDS) {
      this.missing[kind] += apportionment.missing[kind];
    }

    if (this.retainContributions) {
      this.retained.push(...apportionment.contributions);
    }
    return this;
  }

  addAll(apportionments: Iterable<EventApportionment>): this {
    for (const apportionment of apportionments) {
      this.add(apportionment);
    }
    return this;
  }

  /**
   * Fold another partial aggregate into this one
   */
  merge(other: CurtailmentAggregator): this {
    for (const key of RUNNING_TOTAL_KEYS) {
      this.totals[key] += other.totals[key];
    }
    for (const kind of SERIES_KINDS) {
      this.missing[kind] += other.missing[kind];
    }
    if (this.retainContributions) {
      this.retained.push(...other.retained);
    }
    return this;
  }

  get contributions(): readonly EventContribution[] {
    return this.retained;
  }

  finalize(params: FinalizeParams): AggregateResult {
    const { curtailedEnergyMWh, missedRevenue, compensation, redispatchCost, durationMinutes } = this.totals;

    return {
      totals: {
        ...this.totals,
        economicImpact: compensation + redispatchCost,
        eventCount: params.eventCount
      },
      insights: {
        averageEnergyPerEventMWh: safeDivide(curtailedEnergyMWh, this.totals.processedEventCount),
        capacityFactorLossPercent: calculateCapacityFactorLoss(
          curtailedEnergyMWh,
          params.turbineCapacityMW,
          params.hoursInAnalysisPeriod
        ),
        averagePriceDuringCurtailment: safeDivide(missedRevenue, curtailedEnergyMWh),
        duration: {
          minutes: durationMinutes,
          hours: minutesToHours(durationMinutes),
          days: minutesToDays(durationMinutes)
        }
      },
      missingData: { ...this.missing }
    };
  }
}

/**
 * Share (%) of the theoretical output over the period lost to curtailment
 */
export function calculateCapacityFactorLoss(
  curtailedEnergyMWh: number,
  turbineCapacityMW: number,
  hoursInAnalysisPeriod: number
): number {
  return 100 * safeDivide(curtailedEnergyMWh, turbineCapacityMW * hoursInAnalysisPeriod);
}
