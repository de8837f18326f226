/**
 * Result objects for experiment analysis
 */

export { AnalysisResult } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { ExperimentReport } from './ExperimentReport';
export type { CtrComparison, TableName } from './ExperimentReport';
export { assembleReport } from './ReportAssembler';
