/**
 * Report over one experiment: CTR test, funnels, leakage and the three tables
 */

import { VariantMetrics } from '../../core/data/metrics';
import { ProportionTestResult } from '../../inference/frequentist/ProportionTest';
import { FunnelTransition } from '../funnel/FunnelAnalyzer';
import { LeakageEstimate } from '../revenue/RevenueLeakageEstimator';
import { AnalysisTables, CTR_COLUMNS, FUNNEL_COLUMNS, REVENUE_COLUMNS } from '../tables/types';
import { formatCsv } from '../tables/csv';
import { AnalysisResult } from './AnalysisResult';
import { ResultMetadata } from './ResultMetadata';

/**
 * CTR test between two named variants
 */
export interface CtrComparison {
  controlVariant: string;
  treatmentVariant: string;
  result: ProportionTestResult;
}

export type TableName = keyof AnalysisTables;

export class ExperimentReport extends AnalysisResult {
  constructor(
    private readonly variants: readonly VariantMetrics[],
    private readonly ctrComparison: CtrComparison,
    private readonly funnels: ReadonlyMap<string, readonly FunnelTransition[]>,
    private readonly leakage: LeakageEstimate,
    private readonly tables: AnalysisTables,
    metadata: ResultMetadata
  ) {
    super(metadata);
  }

  getVariants(): readonly VariantMetrics[] {
    return this.variants;
  }

  getVariant(variantId: string): VariantMetrics | undefined {
    return this.variants.find((v) => v.variantId === variantId);
  }

  getCtrTest(): CtrComparison {
    return this.ctrComparison;
  }

  getFunnel(variantId: string): readonly FunnelTransition[] | undefined {
    return this.funnels.get(variantId);
  }

  getFunnels(): ReadonlyMap<string, readonly FunnelTransition[]> {
    return this.funnels;
  }

  getLeakage(): LeakageEstimate {
    return this.leakage;
  }

  getTables(): AnalysisTables {
    return this.tables;
  }

  /**
   * One table as CSV. The funnel table is empty for non-standard stage lists.
   */
  toCSV(table: TableName): string {
    switch (table) {
      case 'ctr':
        return formatCsv(this.tables.ctr, CTR_COLUMNS);
      case 'funnel':
        return formatCsv(this.tables.funnel ?? [], FUNNEL_COLUMNS);
      case 'revenue':
        return formatCsv(this.tables.revenue, REVENUE_COLUMNS);
    }
  }

  protected exportCSV(): string {
    const sections: TableName[] = ['ctr', 'funnel', 'revenue'];
    return sections.map((table) => this.toCSV(table)).join('\n\n');
  }

  toJSON(): object {
    return {
      variants: this.variants,
      ctrTest: this.ctrComparison,
      funnels: Object.fromEntries(this.funnels),
      leakage: this.leakage,
      tables: this.tables,
      metadata: {
        ...this.metadata,
        timestamp: this.metadata.timestamp.toISOString(),
      },
    };
  }
}
