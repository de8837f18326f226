/**
 * Builds the CTR, funnel and revenue tables from analysis results
 *
 * This is the only place values get rounded.
 */

import { DEFAULT_FUNNEL_STAGES, VariantMetrics, stageCountOf } from '../../core/data/metrics';
import { ValidationError } from '../../core/errors';
import { FunnelTransition, transitionInto } from '../funnel/FunnelAnalyzer';
import { AnalysisTables, CtrTableRow, FunnelTableRow, RevenueTableRow } from './types';

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function requireStage(metrics: VariantMetrics, stage: string): number {
  const count = stageCountOf(metrics, stage);
  if (count === undefined) {
    throw new ValidationError(`Variant ${metrics.variantId} has no ${stage} count`, {
      variantId: metrics.variantId,
      stage,
    });
  }
  return count;
}

export function buildCtrTable(variants: readonly VariantMetrics[], ctrStage = 'click'): CtrTableRow[] {
  return variants.map((v) => {
    const clicked = requireStage(v, ctrStage);
    return {
      variant: v.variantId,
      total_users: v.totalUsers,
      clicked_users: clicked,
      ctr_percent: v.totalUsers > 0 ? round2((100 * clicked) / v.totalUsers) : null,
    };
  });
}

function rates(transition: FunnelTransition | undefined): [number | null, number | null] {
  if (!transition || transition.upstreamEmpty) return [null, null];
  return [round2(transition.conversionRatePct), round2(transition.dropoffPct)];
}

/**
 * Funnel table over the standard page_view → click → add_to_cart → purchase stages
 */
export function buildFunnelTable(
  variants: readonly VariantMetrics[],
  transitionsByVariant: ReadonlyMap<string, readonly FunnelTransition[]>
): FunnelTableRow[] {
  const [pageView, click, addToCart, purchase] = DEFAULT_FUNNEL_STAGES;

  return variants.map((v) => {
    const transitions = transitionsByVariant.get(v.variantId) ?? [];
    const [clickRate, dropPageToClick] = rates(transitionInto(transitions, click));
    const [addToCartRate, dropClickToCart] = rates(transitionInto(transitions, addToCart));
    const [purchaseRate, dropCartToPurchase] = rates(transitionInto(transitions, purchase));

    return {
      variant: v.variantId,
      step1_page_view: requireStage(v, pageView),
      step2_click: requireStage(v, click),
      click_rate: clickRate,
      drop_page_to_click: dropPageToClick,
      step3_add_to_cart: requireStage(v, addToCart),
      add_to_cart_rate: addToCartRate,
      drop_click_to_cart: dropClickToCart,
      step4_purchase: requireStage(v, purchase),
      purchase_rate: purchaseRate,
      drop_cart_to_purchase: dropCartToPurchase,
    };
  });
}

export function buildRevenueTable(variants: readonly VariantMetrics[]): RevenueTableRow[] {
  return variants.map((v) => ({
    variant: v.variantId,
    purchasing_users: v.purchasingUsers,
    total_revenue: round2(v.totalRevenue),
    avg_order_value: v.avgOrderValue === null ? null : round2(v.avgOrderValue),
    revenue_per_user: v.totalUsers > 0 ? round2(v.totalRevenue / v.totalUsers) : null,
  }));
}

export function usesStandardStages(stages: readonly string[]): boolean {
  return (
    stages.length === DEFAULT_FUNNEL_STAGES.length &&
    DEFAULT_FUNNEL_STAGES.every((stage, i) => stages[i] === stage)
  );
}

export function buildTables(
  variants: readonly VariantMetrics[],
  transitionsByVariant: ReadonlyMap<string, readonly FunnelTransition[]>,
  config: { stages: readonly string[]; ctrStage: string }
): AnalysisTables {
  return {
    ctr: buildCtrTable(variants, config.ctrStage),
    funnel: usesStandardStages(config.stages)
      ? buildFunnelTable(variants, transitionsByVariant)
      : null,
    revenue: buildRevenueTable(variants),
  };
}
