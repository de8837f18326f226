/**
 * Data model shared by the analysis pipeline
 *
 * Raw input is a flat list of per-user events. The aggregator reduces it to one
 * VariantMetrics per variant, which is what every analyzer downstream consumes.
 */

export const DEFAULT_FUNNEL_STAGES = ['page_view', 'click', 'add_to_cart', 'purchase'] as const;

export type DefaultFunnelStage = (typeof DEFAULT_FUNNEL_STAGES)[number];

/**
 * A single tracked user action
 */
export interface EventRecord {
  userId: string;
  variantId: string;
  eventType: string;
  /** Only meaningful on purchase events */
  revenue?: number;
}

/**
 * Number of distinct users who reached a stage
 */
export interface StageCount {
  stage: string;
  count: number;
}

/**
 * Aggregated counts for one variant
 *
 * stageCounts is in funnel order and is expected to be non-increasing.
 */
export interface VariantMetrics {
  readonly variantId: string;
  readonly totalUsers: number;
  readonly stageCounts: readonly StageCount[];
  readonly purchasingUsers: number;
  /** Number of purchase events, duplicates included */
  readonly orderCount: number;
  readonly totalRevenue: number;
  /** totalRevenue / purchasingUsers, null without purchasers */
  readonly avgOrderValue: number | null;
}

/**
 * Look up the count recorded for a stage, undefined if the stage is absent
 */
export function stageCountOf(metrics: VariantMetrics, stage: string): number | undefined {
  return metrics.stageCounts.find((s) => s.stage === stage)?.count;
}

/**
 * Build a frozen VariantMetrics, deriving the average order value
 */
export function createVariantMetrics(fields: Omit<VariantMetrics, 'avgOrderValue'>): VariantMetrics {
  const stageCounts = Object.freeze(fields.stageCounts.map((s) => Object.freeze({ ...s })));

  return Object.freeze({
    ...fields,
    stageCounts,
    avgOrderValue: fields.purchasingUsers > 0 ? fields.totalRevenue / fields.purchasingUsers : null,
  });
}
