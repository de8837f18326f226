/**
 * Analysis configuration
 *
 * Every analysis entry point takes its settings explicitly; nothing is read from
 * process-wide state, so concurrent analyses with different settings never interact.
 */

import { FunnelstatError, ErrorCode } from '../errors';
import { DEFAULT_FUNNEL_STAGES } from '../data/metrics';

/**
 * strict: funnel invariant violations throw a ValidationError
 * permissive: they are logged and reported as warnings
 */
export type ValidationMode = 'strict' | 'permissive';

export interface AnalysisConfig {
  /** Significance threshold for the CTR test */
  alpha: number;

  /** Hypothetical share of dropped users recovered in the leakage scenario */
  recoveryFraction: number;

  /** Stage whose incoming drop-off drives the leakage estimate */
  leakageStage: string;

  /** Funnel stages in order */
  stages: readonly string[];

  /** Stage counted as a click for the CTR test */
  ctrStage: string;

  /** Stage whose events carry revenue */
  purchaseStage: string;

  validationMode: ValidationMode;

  /** Baseline (variant "1") of the CTR test; defaults to the first variant */
  controlVariant?: string;

  /** Compared variant (variant "2") of the CTR test; defaults to the second variant */
  treatmentVariant?: string;
}

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  alpha: 0.05,
  recoveryFraction: 0.5,
  leakageStage: 'add_to_cart',
  stages: DEFAULT_FUNNEL_STAGES,
  ctrStage: 'click',
  purchaseStage: 'purchase',
  validationMode: 'permissive',
});

/**
 * Merge a partial configuration over the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG, ...overrides };

  if (!Number.isFinite(config.alpha) || config.alpha <= 0 || config.alpha >= 1) {
    throw new FunnelstatError(ErrorCode.INVALID_CONFIG, 'alpha must be between 0 and 1', {
      alpha: config.alpha,
    });
  }

  if (
    !Number.isFinite(config.recoveryFraction) ||
    config.recoveryFraction < 0 ||
    config.recoveryFraction > 1
  ) {
    throw new FunnelstatError(
      ErrorCode.INVALID_CONFIG,
      'recoveryFraction must be within [0, 1]',
      { recoveryFraction: config.recoveryFraction }
    );
  }

  if (config.stages.length < 2) {
    throw new FunnelstatError(ErrorCode.INVALID_CONFIG, 'A funnel needs at least two stages', {
      stages: [...config.stages],
    });
  }

  if (new Set(config.stages).size !== config.stages.length) {
    throw new FunnelstatError(ErrorCode.INVALID_CONFIG, 'Funnel stages must be unique', {
      stages: [...config.stages],
    });
  }

  for (const key of ['leakageStage', 'ctrStage', 'purchaseStage'] as const) {
    if (!config.stages.includes(config[key])) {
      throw new FunnelstatError(ErrorCode.INVALID_CONFIG, `${key} is not a funnel stage`, {
        [key]: config[key],
        stages: [...config.stages],
      });
    }
  }

  // The leakage stage needs an upstream stage feeding it
  if (config.stages.indexOf(config.leakageStage) === 0) {
    throw new FunnelstatError(
      ErrorCode.INVALID_CONFIG,
      'leakageStage cannot be the first funnel stage',
      { leakageStage: config.leakageStage }
    );
  }

  if (
    config.controlVariant !== undefined &&
    config.controlVariant === config.treatmentVariant
  ) {
    throw new FunnelstatError(
      ErrorCode.INVALID_CONFIG,
      'controlVariant and treatmentVariant must differ',
      { variant: config.controlVariant }
    );
  }

  return config;
}
