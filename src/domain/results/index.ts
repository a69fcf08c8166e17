/**
 * Result objects for Caliper analyses
 */

export { AnalysisResult, flatten } from './AnalysisResult';
export type { CsvValue, ExportFormat } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { ComparisonResult } from './ComparisonResult';
export type { MetricComparison } from './ComparisonResult';
