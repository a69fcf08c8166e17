/**
 * Caliper - baseline vs candidate analysis of engineering test measurements
 *
 * Cleans raw measurement tables, derives metrics, aggregates by design variant
 * and grouping dimension, and reports signed percentage improvements.
 */

// Error handling
export {
  CaliperError,
  ErrorCode,
  isCaliperError,
  wrapError,
  missingColumnError,
} from './core/errors';
export type { ErrorContext } from './core/errors';

// Logging
export { Logger, defaultLogger, silentLogger } from './core/logging';
export type { LogLevel, LogSink, LoggerOptions } from './core/logging';

// Data model
export { RecordTable } from './core/table';
export type {
  CellValue,
  ColumnKind,
  ColumnSpec,
  Row,
  RowInput,
  FromRecordsOptions,
} from './core/table';

// Statistics and random generation
export { mean, sum, min, max, sampleStd, sigmaBounds } from './core/math/statistics';
export { RNG } from './core/math/random';
export { SampleDataGenerator, JOINT_TYPES, JOINT_IDS } from './core/data-generation';
export type { PerformanceDataOptions, StructuralDataOptions, VariantLabels } from './core/data-generation';

// Pipeline stages
export * from './pipeline';

// Results, configuration, analyses
export * from './domain/results';
export * from './domain/config';
export * from './domain/analyses';

// Reporting
export * from './reporting';

// Version
export const VERSION = '0.1.0';
