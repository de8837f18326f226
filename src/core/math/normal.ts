// src/core/math/normal.ts
import jStat from 'jstat';

/**
 * Standard normal CDF Φ(x)
 */
export function standardNormalCdf(x: number): number {
  return jStat.normal.cdf(x, 0, 1);
}

/**
 * Two-tailed p-value of a z statistic: 2(1 − Φ(|z|)), clamped to [0, 1]
 *
 * z = 0 maps to exactly 1.
 */
export function twoTailedPValue(z: number): number {
  if (z === 0) return 1;
  const p = 2 * (1 - standardNormalCdf(Math.abs(z)));
  return Math.min(1, Math.max(0, p));
}
