/**
 * Report Assembler
 *
 * Runs the analyzers over aggregated metrics and packages everything into an
 * ExperimentReport: CTR test for one control/treatment pair, funnel per variant,
 * leakage across all variants, and the reporting tables.
 */

import { VariantMetrics, stageCountOf } from '../../core/data/metrics';
import { AnalysisConfig, resolveConfig } from '../../core/config';
import { ValidationError } from '../../core/errors';
import { testTwoProportions } from '../../inference/frequentist/ProportionTest';
import { FunnelTransition, analyzeFunnel } from '../funnel/FunnelAnalyzer';
import { estimateLeakage } from '../revenue/RevenueLeakageEstimator';
import { buildTables } from '../tables/TableBuilder';
import { MetricsValidator } from '../validation/MetricsValidator';
import { CtrComparison, ExperimentReport } from './ExperimentReport';

function checkStages(variant: VariantMetrics, stages: readonly string[]): void {
  const actual = variant.stageCounts.map((s) => s.stage);
  const matches = actual.length === stages.length && actual.every((s, i) => s === stages[i]);
  if (!matches) {
    throw new ValidationError(`Variant ${variant.variantId} does not follow the configured funnel`, {
      variantId: variant.variantId,
      expected: [...stages],
      actual,
    });
  }
}

function pickVariant(
  variants: readonly VariantMetrics[],
  requested: string | undefined,
  fallbackIndex: number,
  role: string
): VariantMetrics {
  if (requested === undefined) {
    return variants[fallbackIndex];
  }
  const found = variants.find((v) => v.variantId === requested);
  if (!found) {
    throw new ValidationError(`${role} variant ${requested} not found`, {
      [role]: requested,
      variants: variants.map((v) => v.variantId),
    });
  }
  return found;
}

function compareCtr(variants: readonly VariantMetrics[], config: AnalysisConfig): CtrComparison {
  const control = pickVariant(variants, config.controlVariant, 0, 'control');
  const treatment = pickVariant(
    variants,
    config.treatmentVariant,
    control === variants[0] ? 1 : 0,
    'treatment'
  );
  if (control === treatment) {
    throw new ValidationError('CTR test needs two distinct variants', {
      variant: control.variantId,
    });
  }

  const clicks = (v: VariantMetrics): number => stageCountOf(v, config.ctrStage) ?? 0;

  return {
    controlVariant: control.variantId,
    treatmentVariant: treatment.variantId,
    result: testTwoProportions(
      control.totalUsers,
      clicks(control),
      treatment.totalUsers,
      clicks(treatment),
      config.alpha
    ),
  };
}

/**
 * Assemble a report from per-variant metrics
 *
 * @param priorWarnings - Warnings already raised while ingesting the metrics
 */
export function assembleReport(
  metrics: Iterable<VariantMetrics>,
  config: Partial<AnalysisConfig> = {},
  priorWarnings: readonly string[] = []
): ExperimentReport {
  const resolved = resolveConfig(config);
  const variants = [...metrics];

  if (variants.length < 2) {
    throw new ValidationError('An experiment needs at least two variants', {
      variants: variants.map((v) => v.variantId),
    });
  }
  if (new Set(variants.map((v) => v.variantId)).size !== variants.length) {
    throw new ValidationError('Variant ids must be unique', {
      variants: variants.map((v) => v.variantId),
    });
  }

  const warnings = [...priorWarnings];
  for (const variant of variants) {
    checkStages(variant, resolved.stages);
    warnings.push(
      ...MetricsValidator.validateVariant(variant, resolved.validationMode, resolved.purchaseStage)
    );
  }

  const ctrComparison = compareCtr(variants, resolved);
  if (ctrComparison.result.relativeLift === null) {
    warnings.push(
      `Relative CTR lift is undefined: variant ${ctrComparison.controlVariant} has no ${resolved.ctrStage} events`
    );
  }

  const funnels = new Map<string, readonly FunnelTransition[]>();
  for (const variant of variants) {
    const transitions = analyzeFunnel(variant.stageCounts);
    for (const t of transitions.filter((tr) => tr.upstreamEmpty)) {
      warnings.push(
        `Variant ${variant.variantId}: ${t.fromStage} count is 0, conversion to ${t.toStage} is undefined`
      );
    }
    funnels.set(variant.variantId, transitions);
  }

  const leakage = estimateLeakage(variants, funnels, {
    designatedStage: resolved.leakageStage,
    recoveryFraction: resolved.recoveryFraction,
  });

  return new ExperimentReport(
    variants,
    ctrComparison,
    funnels,
    leakage,
    buildTables(variants, funnels, resolved),
    {
      timestamp: new Date(),
      config: resolved,
      sampleSize: variants.reduce((sum, v) => sum + v.totalUsers, 0),
      warnings: [...new Set(warnings)],
    }
  );
}
