export {
  estimateLeakage,
  DEFAULT_LEAKAGE_STAGE,
  DEFAULT_RECOVERY_FRACTION,
} from './RevenueLeakageEstimator';
export type { LeakageEstimate, LeakageOptions } from './RevenueLeakageEstimator';
