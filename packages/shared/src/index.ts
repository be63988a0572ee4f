/**
 * Shared Package - Main Export
 */

// Record scope
export { currentScope, getCorrelationId, withRecordScope, type RecordScope } from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export {
  config,
  loadConfig,
  type ExtractionConfig,
  type Bounds,
  type LiveSettings,
} from './config';

// Errors
export { ParseError } from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  strategyAttemptsCounter,
  fieldsExhaustedCounter,
  recordsBuiltCounter,
  recordBuildDurationHistogram,
  liveCallsCounter,
  getMetrics,
  getMetricsContentType,
  type StrategyOutcome,
} from './metrics';

// Schemas
export { validateFundRecord, schemas, type ValidationResult } from './schemas';

// Document model
export {
  Document,
  extractTables,
  extractKeyValuePairs,
  rowCells,
  rowText,
  tableText,
  type Table,
  type TableRow,
} from './document';

// Output
export { fundSlugFromUrl, serializeFundRecord, type SerializedRecord } from './output';

// Field extraction
export * from './extractors';
