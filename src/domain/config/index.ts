export { analysisConfigSchema, parseAnalysisConfig, defaultAnalysisConfig } from './AnalysisConfig';
export type { AnalysisConfig, AnalysisConfigInput } from './AnalysisConfig';
