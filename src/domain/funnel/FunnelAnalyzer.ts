/**
 * Funnel Analyzer
 *
 * Walks a caller-ordered list of stage counts pairwise and reports conversion and
 * drop-off for every adjacent pair. The analyzer knows nothing about stage names or
 * their order; values are left unrounded so chained computations do not compound
 * rounding error.
 */

import { StageCount } from '../../core/data/metrics';
import { ValidationError } from '../../core/errors';

export interface FunnelTransition {
  readonly fromStage: string;
  readonly toStage: string;
  readonly fromCount: number;
  readonly toCount: number;
  /** 100 * toCount / fromCount; 0 when upstreamEmpty */
  readonly conversionRatePct: number;
  /** 100 - conversionRatePct */
  readonly dropoffPct: number;
  /** fromCount was 0, so the rates are undefined and reported as 0 / 100 */
  readonly upstreamEmpty: boolean;
}

export function analyzeFunnel(stageCounts: readonly StageCount[]): FunnelTransition[] {
  const seen = new Set<string>();
  for (const { stage, count } of stageCounts) {
    if (seen.has(stage)) {
      throw new ValidationError(`Duplicate funnel stage: ${stage}`, { stage });
    }
    seen.add(stage);

    if (!Number.isFinite(count) || count < 0) {
      throw new ValidationError(`Stage ${stage} has an invalid count`, { stage, count });
    }
  }

  const transitions: FunnelTransition[] = [];
  for (let i = 0; i + 1 < stageCounts.length; i++) {
    const from = stageCounts[i];
    const to = stageCounts[i + 1];
    const upstreamEmpty = from.count === 0;
    const conversionRatePct = upstreamEmpty ? 0 : (100 * to.count) / from.count;

    transitions.push(
      Object.freeze({
        fromStage: from.stage,
        toStage: to.stage,
        fromCount: from.count,
        toCount: to.count,
        conversionRatePct,
        dropoffPct: 100 - conversionRatePct,
        upstreamEmpty,
      })
    );
  }

  return transitions;
}

/**
 * Find the transition that ends at a stage
 */
export function transitionInto(
  transitions: readonly FunnelTransition[],
  stage: string
): FunnelTransition | undefined {
  return transitions.find((t) => t.toStage === stage);
}
