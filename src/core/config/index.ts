export { DEFAULT_ANALYSIS_CONFIG, resolveConfig } from './AnalysisConfig';
export type { AnalysisConfig, ValidationMode } from './AnalysisConfig';
