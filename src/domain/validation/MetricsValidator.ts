/**
 * Metrics Validator
 *
 * Checks the funnel invariants of aggregated variant metrics.
 * Violations are never corrected: strict mode throws, permissive mode reports them.
 */

import { VariantMetrics, stageCountOf } from '../../core/data/metrics';
import { ValidationMode } from '../../core/config';
import { ValidationError } from '../../core/errors';

export interface Violation {
  variantId: string;
  message: string;
  context: Record<string, unknown>;
}

export class MetricsValidator {
  /**
   * Validate one variant. Returns warning messages in permissive mode.
   *
   * @throws ValidationError on the first violation in strict mode
   */
  static validateVariant(
    metrics: VariantMetrics,
    mode: ValidationMode,
    purchaseStage?: string
  ): string[] {
    const violations = this.findViolations(metrics, purchaseStage);

    if (mode === 'strict' && violations.length > 0) {
      const [first] = violations;
      throw new ValidationError(first.message, { variantId: first.variantId, ...first.context });
    }

    return violations.map((v) => v.message);
  }

  /**
   * Validate every variant, collecting warnings in input order
   */
  static validateAll(
    variants: Iterable<VariantMetrics>,
    mode: ValidationMode,
    purchaseStage?: string
  ): string[] {
    const warnings: string[] = [];
    for (const metrics of variants) {
      warnings.push(...this.validateVariant(metrics, mode, purchaseStage));
    }
    return warnings;
  }

  static findViolations(metrics: VariantMetrics, purchaseStage?: string): Violation[] {
    const violations: Violation[] = [];
    const { variantId, stageCounts, totalUsers } = metrics;

    if (stageCounts.length > 0 && stageCounts[0].count > totalUsers) {
      violations.push({
        variantId,
        message: `Variant ${variantId}: ${stageCounts[0].stage} count exceeds total users`,
        context: { stage: stageCounts[0].stage, count: stageCounts[0].count, totalUsers },
      });
    }

    for (let i = 1; i < stageCounts.length; i++) {
      const prev = stageCounts[i - 1];
      const curr = stageCounts[i];
      if (curr.count > prev.count) {
        violations.push({
          variantId,
          message: `Variant ${variantId}: funnel is not monotonic at ${prev.stage} -> ${curr.stage}`,
          context: {
            fromStage: prev.stage,
            fromCount: prev.count,
            toStage: curr.stage,
            toCount: curr.count,
          },
        });
      }
    }

    if (purchaseStage !== undefined) {
      const purchases = stageCountOf(metrics, purchaseStage);
      if (purchases !== undefined && metrics.purchasingUsers > purchases) {
        violations.push({
          variantId,
          message: `Variant ${variantId}: purchasing users exceed ${purchaseStage} count`,
          context: { purchasingUsers: metrics.purchasingUsers, [purchaseStage]: purchases },
        });
      }
    }

    return violations;
  }
}
