/**
 * Report Assembler
 *
 * Renders an analysis result as plain text: headline totals, key insights and
 * every diagnostic counter, so a non-zero drop count is never hidden behind a
 * clean-looking result.
 */

import { createColors } from 'colorette';
import { formatDayFirst } from '../utils/dates';
import { formatNumber } from '../utils/calculations';
import { countRejected } from './eventSanitizer';
import { REJECTION_REASONS, SERIES_KINDS, type SeriesKind } from '../models/curtailment';
import type { CurtailmentAnalysisResult } from './curtailmentAnalysis';

export interface ReportOptions {
  /** Shown instead of the plant id */
  plantLabel?: string;
  /** ANSI colours for headings and warnings */
  color?: boolean;
}

const SERIES_LABELS: Record<SeriesKind, string> = {
  marketPrice: 'Market price',
  redispatchPrice: 'Redispatch price',
  carbonIntensity: 'Carbon intensity'
};

const RULE = '-'.repeat(50);

export function buildCurtailmentReport(result: CurtailmentAnalysisResult, options: ReportOptions = {}): string[] {
  const { bold, yellow } = createColors({ useColor: options.color ?? false });
  const warn = (line: string, count: number) => (count > 0 ? yellow(line) : line);

  const { config, aggregate, diagnostics } = result;
  const { totals, insights } = aggregate;
  const lines: string[] = [];

  lines.push(bold('=== CURTAILMENT IMPACT ANALYSIS RESULTS ==='));
  lines.push(
    `Analysis Period: ${config.analysisPeriod ? `${config.analysisPeriod.start} to ${config.analysisPeriod.end}` : 'all events'}`
  );
  lines.push(`Wind Turbine: ${options.plantLabel ?? config.plantId} (Capacity: ${config.turbineCapacityMW} MW)`);
  lines.push(`Compensation Rate: ${formatNumber(config.compensationRate * 100, 1)}%`);
  lines.push(RULE);
  lines.push(`Total Curtailed Energy (MWh): ${formatNumber(totals.curtailedEnergyMWh)}`);
  lines.push(`Total Missed Revenue (€): ${formatNumber(totals.missedRevenue)}`);
  lines.push(`Compensation Paid (€): ${formatNumber(totals.compensation)}`);
  lines.push(`Total Redispatch Cost (€): ${formatNumber(totals.redispatchCost)}`);
  lines.push(`Total Economic Impact (€): ${formatNumber(totals.economicImpact)}`);
  lines.push(`Total CO2 Emissions (tonnes): ${formatNumber(totals.co2Tonnes)}`);
  lines.push(`Number of Events: ${formatNumber(totals.eventCount, 0)}`);
  lines.push(`Processed Events (with curtailment): ${formatNumber(totals.processedEventCount, 0)}`);
  lines.push(`Total Duration (minutes): ${formatNumber(totals.durationMinutes)}`);

  lines.push('');
  lines.push(bold('=== KEY INSIGHTS ==='));
  if (totals.curtailedEnergyMWh > 0) {
    lines.push(`Average curtailed energy per event: ${formatNumber(insights.averageEnergyPerEventMWh)} MWh`);
    lines.push(`Capacity factor loss due to curtailment: ${formatNumber(insights.capacityFactorLossPercent, 4)}%`);
    lines.push(`Average electricity price during curtailment: ${formatNumber(insights.averagePriceDuringCurtailment)} €/MWh`);
    lines.push(
      `Curtailment duration: ${formatNumber(insights.duration.hours)} hours (${formatNumber(insights.duration.days)} days)`
    );
  } else {
    lines.push('No curtailed energy');
  }

  const events = diagnostics.events;
  const rejected = countRejected(events);

  lines.push('');
  lines.push(bold('=== DIAGNOSTICS ==='));
  lines.push(warn(`Outcome: ${result.outcome}`, result.outcome === 'complete' ? 0 : 1));
  lines.push(
    `Curtailment rows: ${events.totalRows} total, ${events.otherPlantRows} other plants, ${events.outOfPeriodRows} outside period`
  );
  lines.push(
    warn(
      `Rejected rows: ${rejected} (${REJECTION_REASONS.map(reason => `${reason}: ${events.rejectedRows[reason]}`).join(', ')})`,
      rejected
    )
  );
  lines.push(`Zero-level rows: ${events.zeroLevelRows}`);
  lines.push(warn(`Duration mismatches: ${events.durationMismatches}`, events.durationMismatches));

  for (const kind of SERIES_KINDS) {
    const series = diagnostics.series[kind];
    const dropped = series.unparsableTimestamps + series.unparsableValues;
    const column = series.valueColumn === null && series.totalRows > 0 ? ', value column not found' : '';
    lines.push(
      warn(
        `${SERIES_LABELS[kind]} rows: ${series.acceptedRows} of ${series.totalRows} used ` +
          `(${series.unparsableTimestamps} bad timestamps, ${series.unparsableValues} bad values, ` +
          `${series.duplicateHours} duplicate hours${column})`,
        dropped + (column ? 1 : 0)
      )
    );
  }

  for (const kind of SERIES_KINDS) {
    const missing = aggregate.missingData[kind];
    lines.push(warn(`Curtailed hours without ${SERIES_LABELS[kind].toLowerCase()} data: ${missing}`, missing));
  }

  if (diagnostics.flaggedEvents.length > 0) {
    lines.push('Flagged events:');
    for (const event of diagnostics.flaggedEvents) {
      lines.push(
        `  row ${event.sourceIndex}: ${formatDayFirst(event.start)} - ${formatDayFirst(event.end)}, ` +
          `stated ${formatNumber(event.statedDurationMinutes ?? 0, 0)} min, computed ${formatNumber(event.computedDurationMinutes, 0)} min`
      );
    }
  }

  if (diagnostics.rejectedSample.length > 0) {
    lines.push('Rejected sample:');
    for (const row of diagnostics.rejectedSample) {
      lines.push(`  row ${row.sourceIndex}: ${row.reason} (start "${row.start ?? ''}", end "${row.end ?? ''}")`);
    }
  }

  return lines;
}

export function renderCurtailmentReport(result: CurtailmentAnalysisResult, options: ReportOptions = {}): string {
  return buildCurtailmentReport(result, options).join('\n');
}
