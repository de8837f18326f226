/**
 * Revenue Leakage Estimator
 *
 * Estimates the revenue lost to drop-off at one funnel stage under a hypothetical
 * scenario where a fraction of the dropped users is recovered.
 *
 * This is an approximation, not a causal estimate. It assumes recovered users bring in
 * the same average revenue per user as the existing population (revenue over all
 * assigned users, not over purchasers).
 */

import jStat from 'jstat';
import { VariantMetrics } from '../../core/data/metrics';
import { InvalidInputError, ValidationError } from '../../core/errors';
import { FunnelTransition, transitionInto } from '../funnel/FunnelAnalyzer';

export interface LeakageOptions {
  designatedStage?: string;
  recoveryFraction?: number;
}

export interface LeakageEstimate {
  readonly designatedStage: string;
  /** Stage feeding the designated stage */
  readonly upstreamStage: string;
  /** Mean drop-off into the designated stage, as a fraction */
  readonly avgDropoffRate: number;
  readonly recoveryFraction: number;
  /** Upstream stage count summed over variants */
  readonly upstreamCount: number;
  readonly recoveredUsersEstimate: number;
  readonly avgRevenuePerUser: number;
  readonly potentialRevenue: number;
  readonly currentTotalRevenue: number;
  /** 100 * potentialRevenue / currentTotalRevenue, 0 without revenue */
  readonly leakagePct: number;
}

export const DEFAULT_LEAKAGE_STAGE = 'add_to_cart';
export const DEFAULT_RECOVERY_FRACTION = 0.5;

function meanOrZero(values: number[]): number {
  return values.length > 0 ? jStat.mean(values) : 0;
}

/**
 * Estimate recoverable revenue across all variants
 *
 * Sums over however many variants are supplied. Transitions whose upstream stage is
 * empty carry no drop-off information and are left out of the average, as are variants
 * without users when averaging revenue per user.
 */
export function estimateLeakage(
  variants: readonly VariantMetrics[],
  transitionsByVariant: ReadonlyMap<string, readonly FunnelTransition[]>,
  options: LeakageOptions = {}
): LeakageEstimate {
  const designatedStage = options.designatedStage ?? DEFAULT_LEAKAGE_STAGE;
  const recoveryFraction = options.recoveryFraction ?? DEFAULT_RECOVERY_FRACTION;

  if (!Number.isFinite(recoveryFraction) || recoveryFraction < 0 || recoveryFraction > 1) {
    throw new InvalidInputError('recoveryFraction must be within [0, 1]', { recoveryFraction });
  }
  if (variants.length === 0) {
    throw new ValidationError('Leakage estimation needs at least one variant');
  }

  const dropoffRates: number[] = [];
  const revenuePerUser: number[] = [];
  let upstreamStage: string | undefined;
  let upstreamCount = 0;
  let currentTotalRevenue = 0;

  for (const variant of variants) {
    const transitions = transitionsByVariant.get(variant.variantId);
    if (!transitions) {
      throw new ValidationError(`No funnel transitions for variant ${variant.variantId}`, {
        variantId: variant.variantId,
      });
    }

    const designated = transitionInto(transitions, designatedStage);
    if (!designated) {
      throw new ValidationError(`Stage ${designatedStage} has no incoming transition`, {
        variantId: variant.variantId,
        designatedStage,
      });
    }

    upstreamStage = designated.fromStage;
    upstreamCount += designated.fromCount;
    if (!designated.upstreamEmpty) {
      dropoffRates.push(designated.dropoffPct / 100);
    }

    if (variant.totalUsers > 0) {
      revenuePerUser.push(variant.totalRevenue / variant.totalUsers);
    }
    currentTotalRevenue += variant.totalRevenue;
  }

  const avgDropoffRate = meanOrZero(dropoffRates);
  const avgRevenuePerUser = meanOrZero(revenuePerUser);
  const recoveredUsersEstimate = upstreamCount * avgDropoffRate * recoveryFraction;
  const potentialRevenue = recoveredUsersEstimate * avgRevenuePerUser;

  return Object.freeze({
    designatedStage,
    upstreamStage: upstreamStage ?? '',
    avgDropoffRate,
    recoveryFraction,
    upstreamCount,
    recoveredUsersEstimate,
    avgRevenuePerUser,
    potentialRevenue,
    currentTotalRevenue,
    leakagePct: currentTotalRevenue > 0 ? (100 * potentialRevenue) / currentTotalRevenue : 0,
  });
}
