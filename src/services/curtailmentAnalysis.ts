/**
 * Curtailment Analysis Service
 *
 * Runs the whole analysis for one plant: validates the configuration,
 * normalizes the external series (unless already normalized), sanitizes the
 * event log, apportions every event and aggregates the result. The outcome
 * field tells an empty-but-valid run apart from one whose input was unusable.
 */

import { logger } from '../utils/logger';
import { parseAnalysisConfig, type AnalysisConfig } from '../utils/config';
import { AppError, errorMessage } from '../utils/errors';
import { parseCalendarDate } from '../utils/dates';
import { hasNoExternalData, normalizeExternalSeries } from './timeSeriesNormalizer';
import { countRejected, matchPlant, sanitizeEvents, type AnalysisWindow, type PlantPredicate, type SanitizedEvents } from './eventSanitizer';
import { apportionEvents } from './apportionment';
import { CurtailmentAggregator } from './aggregator';
import type { ExternalSeriesRows, RawRow } from '../types/sources';
import {
  SERIES_KINDS,
  type AggregateResult,
  type AnalysisOutcome,
  type CurtailmentEvent,
  type EventContribution,
  type EventDiagnostics,
  type EventSummary,
  type ExternalSeries,
  type RejectedRow,
  type SeriesDiagnostics,
  type SeriesKind
} from '../models/curtailment';

const MODULE = 'curtailmentAnalysis';

export interface AnalysisDiagnostics {
  events: EventDiagnostics;
  series: Record<SeriesKind, SeriesDiagnostics>;
  flaggedEvents: readonly CurtailmentEvent[];
  rejectedSample: readonly RejectedRow[];
}

export interface CurtailmentAnalysisResult {
  config: AnalysisConfig;
  outcome: AnalysisOutcome;
  aggregate: AggregateResult;
  diagnostics: AnalysisDiagnostics;
  eventSummary: EventSummary | null;
  /** Only filled when `retainContributions` is set */
  contributions: readonly EventContribution[];
}

export type SeriesInput =
  | { series: ExternalSeries; seriesRows?: never }
  | { seriesRows: ExternalSeriesRows; series?: never };

export type AnalysisInput = SeriesInput & {
  eventRows: readonly RawRow[];
  /** Validated before anything else runs */
  config: unknown;
  /** Replaces the default exact-match filter built from `config.plantId` */
  plantFilter?: PlantPredicate;
};

function toAnalysisWindow(config: AnalysisConfig): AnalysisWindow | undefined {
  if (!config.analysisPeriod) {
    return undefined;
  }
  return {
    start: parseCalendarDate(config.analysisPeriod.start),
    end: parseCalendarDate(config.analysisPeriod.end)
  };
}

function resolveSeries(input: SeriesInput, timezone: string): ExternalSeries {
  if (input.series !== undefined) {
    return input.series;
  }
  return normalizeExternalSeries(input.seriesRows, timezone);
}

/**
 * Decide how the run ended
 */
export function classifyOutcome(sanitized: SanitizedEvents, series: ExternalSeries): AnalysisOutcome {
  const { diagnostics } = sanitized;
  const rejected = countRejected(diagnostics);
  const matched = rejected + diagnostics.zeroLevelRows + diagnostics.acceptedEvents;

  if (matched === 0) {
    return 'no-matching-events';
  }
  if (diagnostics.acceptedEvents === 0) {
    return diagnostics.zeroLevelRows > 0 ? 'no-impactful-events' : 'all-events-rejected';
  }
  if (hasNoExternalData(series)) {
    return 'no-external-data';
  }
  return 'complete';
}

/**
 * Run the analysis for one plant
 */
export function runCurtailmentAnalysis(input: AnalysisInput): CurtailmentAnalysisResult {
  let config: AnalysisConfig;
  try {
    config = parseAnalysisConfig(input.config);
  } catch (error) {
    if (error instanceof AppError) {
      logger.logError(error, { module: MODULE });
    } else {
      logger.error(`Configuration could not be read: ${errorMessage(error)}`, { module: MODULE });
    }
    throw error;
  }

  logger.info(`Analyzing curtailment for plant ${config.plantId}`, {
    module: MODULE,
    context: {
      turbineCapacityMW: config.turbineCapacityMW,
      compensationRate: config.compensationRate,
      hoursInAnalysisPeriod: config.hoursInAnalysisPeriod
    }
  });

  const series = resolveSeries(input, config.timezone);

  const sanitized = sanitizeEvents(input.eventRows, {
    plantFilter: input.plantFilter ?? matchPlant(config.plantId),
    period: toAnalysisWindow(config),
    durationMismatchToleranceMinutes: config.durationMismatchToleranceMinutes,
    diagnosticSampleSize: config.diagnosticSampleSize
  });

  const aggregator = new CurtailmentAggregator(config.retainContributions).addAll(
    apportionEvents(sanitized.events, series, {
      turbineCapacityMW: config.turbineCapacityMW,
      compensationRate: config.compensationRate
    })
  );

  const aggregate = aggregator.finalize({
    eventCount: sanitized.diagnostics.acceptedEvents + sanitized.diagnostics.zeroLevelRows,
    turbineCapacityMW: config.turbineCapacityMW,
    hoursInAnalysisPeriod: config.hoursInAnalysisPeriod
  });

  const outcome = classifyOutcome(sanitized, series);
  if (outcome !== 'complete') {
    logger.warning(`Analysis finished without impact figures: ${outcome}`, { module: MODULE });
  }

  for (const kind of SERIES_KINDS) {
    if (aggregate.missingData[kind] > 0) {
      logger.warning(`${aggregate.missingData[kind]} curtailed hours have no ${kind} data; counted as zero`, {
        module: MODULE
      });
    }
  }

  logger.info(`Curtailed ${aggregate.totals.curtailedEnergyMWh.toFixed(2)} MWh over ${aggregate.totals.processedEventCount} events`, {
    module: MODULE,
    context: {
      missedRevenue: aggregate.totals.missedRevenue,
      economicImpact: aggregate.totals.economicImpact,
      co2Tonnes: aggregate.totals.co2Tonnes
    }
  });

  return {
    config,
    outcome,
    aggregate,
    diagnostics: {
      events: sanitized.diagnostics,
      series: {
        marketPrice: series.marketPrice.diagnostics,
        redispatchPrice: series.redispatchPrice.diagnostics,
        carbonIntensity: series.carbonIntensity.diagnostics
      },
      flaggedEvents: sanitized.flaggedEvents,
      rejectedSample: sanitized.rejectedSample
    },
    eventSummary: sanitized.summary,
    contributions: aggregator.contributions
  };
}

/**
 * Analyze several plants against one shared set of normalized series
 */
export function analyzePlants(
  eventRows: readonly RawRow[],
  series: ExternalSeries,
  configs: readonly unknown[]
): CurtailmentAnalysisResult[] {
  return configs.map(config => runCurtailmentAnalysis({ eventRows, series, config }));
}
