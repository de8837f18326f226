export { DEFAULT_FUNNEL_STAGES, stageCountOf, createVariantMetrics } from './metrics';
export type { DefaultFunnelStage, EventRecord, StageCount, VariantMetrics } from './metrics';
