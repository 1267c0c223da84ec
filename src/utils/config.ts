/**
 * Analysis configuration
 *
 * Capacity, compensation rate and plant selection scale every figure of the
 * analysis, so they are validated up front and passed explicitly to each
 * stage. Invalid configuration aborts the run with a ConfigurationError.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { CALENDAR_DATE_REGEX, DEFAULT_LOCAL_TIMEZONE, isValidCalendarDate, isValidTimezone } from './dates';

const calendarDate = z
  .string()
  .regex(CALENDAR_DATE_REGEX, 'Expected format: YYYY-MM-DD')
  .refine(isValidCalendarDate, 'Not a calendar date');

export const analysisConfigSchema = z.object({
  turbineCapacityMW: z.number().finite().positive(),
  compensationRate: z.number().min(0).max(1),
  plantId: z.string().trim().min(1),
  hoursInAnalysisPeriod: z.number().int().positive(),
  timezone: z
    .string()
    .default(DEFAULT_LOCAL_TIMEZONE)
    .refine(isValidTimezone, 'Unknown IANA timezone'),
  durationMismatchToleranceMinutes: z.number().min(0).default(1),
  diagnosticSampleSize: z.number().int().min(0).default(5),
  analysisPeriod: z
    .object({ start: calendarDate, end: calendarDate })
    .refine(period => period.start < period.end, 'Analysis period start must be before its end')
    .optional(),
  retainContributions: z.boolean().default(false)
});

export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;
export type AnalysisConfig = z.output<typeof analysisConfigSchema>;

/**
 * Validate a configuration object. Throws ConfigurationError on any issue.
 */
export function parseAnalysisConfig(input: unknown): AnalysisConfig {
  const result = analysisConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error);
  }
  return result.data;
}

// Environment variable names
export const CONFIG_ENV = {
  turbineCapacityMW: 'TURBINE_CAPACITY_MW',
  compensationRate: 'COMPENSATION_RATE',
  plantId: 'PLANT_ID',
  hoursInAnalysisPeriod: 'HOURS_IN_ANALYSIS_PERIOD',
  timezone: 'LOCAL_TIMEZONE',
  durationMismatchToleranceMinutes: 'DURATION_TOLERANCE_MINUTES',
  diagnosticSampleSize: 'DIAGNOSTIC_SAMPLE_SIZE',
  analysisPeriodStart: 'ANALYSIS_PERIOD_START',
  analysisPeriodEnd: 'ANALYSIS_PERIOD_END',
  retainContributions: 'RETAIN_CONTRIBUTIONS'
} as const;

export interface EnvConfigOptions {
  /** Load a .env file into process.env first */
  loadDotenv?: boolean;
  dotenvPath?: string;
}

function envNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // Left as NaN for garbage so the schema reports it
  return Number(raw.trim());
}

function envString(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Build the analysis configuration from environment variables
 */
export function loadAnalysisConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: EnvConfigOptions = {}
): AnalysisConfig {
  if (options.loadDotenv) {
    loadDotenv({ path: options.dotenvPath });
  }

  const periodStart = envString(env[CONFIG_ENV.analysisPeriodStart]);
  const periodEnd = envString(env[CONFIG_ENV.analysisPeriodEnd]);
  if ((periodStart === undefined) !== (periodEnd === undefined)) {
    throw new ConfigurationError(
      `${CONFIG_ENV.analysisPeriodStart} and ${CONFIG_ENV.analysisPeriodEnd} must be set together`
    );
  }

  const retain = envString(env[CONFIG_ENV.retainContributions]);

  return parseAnalysisConfig({
    turbineCapacityMW: envNumber(env[CONFIG_ENV.turbineCapacityMW]),
    compensationRate: envNumber(env[CONFIG_ENV.compensationRate]),
    plantId: envString(env[CONFIG_ENV.plantId]),
    hoursInAnalysisPeriod: envNumber(env[CONFIG_ENV.hoursInAnalysisPeriod]),
    timezone: envString(env[CONFIG_ENV.timezone]),
    durationMismatchToleranceMinutes: envNumber(env[CONFIG_ENV.durationMismatchToleranceMinutes]),
    diagnosticSampleSize: envNumber(env[CONFIG_ENV.diagnosticSampleSize]),
    analysisPeriod: periodStart !== undefined && periodEnd !== undefined
      ? { start: periodStart, end: periodEnd }
      : undefined,
    retainContributions: retain === undefined ? undefined : retain.toLowerCase() === 'true'
  });
}
