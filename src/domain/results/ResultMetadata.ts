/**
 * Metadata that accompanies every analysis result
 */

import { AnalysisConfig } from '../../core/config';

export interface ResultMetadata {
  /** When the analysis was performed */
  timestamp: Date;

  /** Settings the analysis ran with */
  config: AnalysisConfig;

  /** Total users across all variants */
  sampleSize: number;

  /** Invariant violations and undefined values noticed during analysis */
  warnings: string[];
}
