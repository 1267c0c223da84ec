export * from './models/curtailment';
export * from './types/sources';
export {
  normalizeSeries,
  normalizeExternalSeries,
  lookupHourlyBucket,
  hasNoExternalData,
  MARKET_PRICE_SERIES,
  REDISPATCH_PRICE_SERIES,
  CARBON_INTENSITY_SERIES,
  type SeriesDefinition
} from './services/timeSeriesNormalizer';
export {
  sanitizeEvents,
  sanitizeEventRow,
  matchPlant,
  countRejected,
  type PlantPredicate,
  type SanitizeOptions,
  type SanitizedEvents,
  type RowOutcome,
  type AnalysisWindow
} from './services/eventSanitizer';
export { apportionEvent, apportionEvents, eventEnergy, type ApportionmentSettings } from './services/apportionment';
export { CurtailmentAggregator, calculateCapacityFactorLoss, type FinalizeParams } from './services/aggregator';
export {
  runCurtailmentAnalysis,
  analyzePlants,
  classifyOutcome,
  type AnalysisInput,
  type AnalysisDiagnostics,
  type CurtailmentAnalysisResult,
  type SeriesInput
} from './services/curtailmentAnalysis';
export { buildCurtailmentReport, renderCurtailmentReport, type ReportOptions } from './services/reportAssembler';
export {
  analysisConfigSchema,
  parseAnalysisConfig,
  loadAnalysisConfigFromEnv,
  CONFIG_ENV,
  type AnalysisConfig,
  type AnalysisConfigInput
} from './utils/config';
export { AppError, ConfigurationError, CalculationError, ValidationError, ErrorSeverity, ErrorCategory } from './utils/errors';
export { logger, Logger, LogLevel } from './utils/logger';
export { DEFAULT_LOCAL_TIMEZONE, type HourKey } from './utils/dates';
