/**
 * Metric Aggregator
 *
 * Reduces raw per-user events to per-variant counts. Stage counts are distinct users,
 * not events: a user who fires the same event twice is counted once.
 *
 * Partitions of the input can be accumulated independently and merged; user-id sets
 * are unioned on merge so deduplication stays global across partitions.
 */

import { EventRecord, VariantMetrics, createVariantMetrics } from '../../core/data/metrics';
import { AnalysisConfig, resolveConfig } from '../../core/config';
import { ValidationError } from '../../core/errors';
import { MetricsValidator } from '../validation/MetricsValidator';

interface VariantAccumulator {
  stageUsers: Map<string, Set<string>>;
  purchasers: Set<string>;
  orderCount: number;
  revenue: number;
}

export class MetricAccumulator {
  private readonly variants = new Map<string, VariantAccumulator>();
  private readonly stages: readonly string[];
  private readonly purchaseStage: string;

  constructor(config: Pick<AnalysisConfig, 'stages' | 'purchaseStage'>) {
    this.stages = config.stages;
    this.purchaseStage = config.purchaseStage;
  }

  add(record: EventRecord): this {
    if (!record.userId) {
      throw new ValidationError('Event record is missing a user id', {
        variantId: record.variantId,
        eventType: record.eventType,
      });
    }
    if (!this.stages.includes(record.eventType)) {
      throw new ValidationError(`Unknown event type: ${record.eventType}`, {
        eventType: record.eventType,
        stages: [...this.stages],
      });
    }

    const acc = this.variantAccumulator(record.variantId);
    this.stageSet(acc, record.eventType).add(record.userId);

    if (record.eventType === this.purchaseStage) {
      const revenue = record.revenue ?? 0;
      if (!Number.isFinite(revenue) || revenue < 0) {
        throw new ValidationError('Purchase revenue must be a non-negative number', {
          userId: record.userId,
          variantId: record.variantId,
          revenue,
        });
      }
      acc.purchasers.add(record.userId);
      acc.orderCount += 1;
      acc.revenue += revenue;
    }

    return this;
  }

  addAll(records: Iterable<EventRecord>): this {
    for (const record of records) {
      this.add(record);
    }
    return this;
  }

  /**
   * Fold another partition into this one
   */
  merge(other: MetricAccumulator): this {
    for (const [variantId, theirs] of other.variants) {
      const ours = this.variantAccumulator(variantId);
      for (const [stage, users] of theirs.stageUsers) {
        const target = this.stageSet(ours, stage);
        for (const userId of users) target.add(userId);
      }
      for (const userId of theirs.purchasers) ours.purchasers.add(userId);
      ours.orderCount += theirs.orderCount;
      ours.revenue += theirs.revenue;
    }
    return this;
  }

  /**
   * Finalize counts against the assigned population of each variant
   *
   * Output order follows the key order of totalUsers.
   */
  toMetrics(totalUsers: Readonly<Record<string, number>>): Map<string, VariantMetrics> {
    for (const variantId of this.variants.keys()) {
      if (!Object.prototype.hasOwnProperty.call(totalUsers, variantId)) {
        throw new ValidationError(`Variant ${variantId} has no total_users entry`, {
          variantId,
          knownVariants: Object.keys(totalUsers),
        });
      }
    }

    const result = new Map<string, VariantMetrics>();
    for (const [variantId, users] of Object.entries(totalUsers)) {
      if (!Number.isInteger(users) || users < 0) {
        throw new ValidationError(`total_users for variant ${variantId} must be a non-negative integer`, {
          variantId,
          totalUsers: users,
        });
      }

      const acc = this.variants.get(variantId);
      result.set(
        variantId,
        createVariantMetrics({
          variantId,
          totalUsers: users,
          stageCounts: this.stages.map((stage) => ({
            stage,
            count: acc?.stageUsers.get(stage)?.size ?? 0,
          })),
          purchasingUsers: acc?.purchasers.size ?? 0,
          orderCount: acc?.orderCount ?? 0,
          totalRevenue: acc?.revenue ?? 0,
        })
      );
    }
    return result;
  }

  private variantAccumulator(variantId: string): VariantAccumulator {
    let acc = this.variants.get(variantId);
    if (!acc) {
      acc = { stageUsers: new Map(), purchasers: new Set(), orderCount: 0, revenue: 0 };
      this.variants.set(variantId, acc);
    }
    return acc;
  }

  private stageSet(acc: VariantAccumulator, stage: string): Set<string> {
    let users = acc.stageUsers.get(stage);
    if (!users) {
      users = new Set();
      acc.stageUsers.set(stage, users);
    }
    return users;
  }
}

/**
 * Aggregate events into per-variant metrics and validate the funnel invariants
 *
 * In permissive mode invariant violations are logged with console.warn; in strict mode
 * the first one throws.
 */
export function aggregate(
  records: Iterable<EventRecord>,
  totalUsers: Readonly<Record<string, number>>,
  config: Partial<AnalysisConfig> = {}
): Map<string, VariantMetrics> {
  const resolved = resolveConfig(config);
  const metrics = new MetricAccumulator(resolved).addAll(records).toMetrics(totalUsers);

  const warnings = MetricsValidator.validateAll(
    metrics.values(),
    resolved.validationMode,
    resolved.purchaseStage
  );
  for (const warning of warnings) {
    console.warn(`[funnelstat] ${warning}`);
  }

  return metrics;
}
