import { describe, it, expect, vi, afterEach } from 'vitest';
import { MetricAccumulator, aggregate } from '../../domain/aggregation';
import { EventRecord, VariantMetrics, stageCountOf } from '../../core/data';
import { resolveConfig } from '../../core/config';
import { ValidationError } from '../../core/errors';

const event = (
  userId: string,
  variantId: string,
  eventType: string,
  revenue?: number
): EventRecord =>
  revenue === undefined ? { userId, variantId, eventType } : { userId, variantId, eventType, revenue };

const counts = (metrics: Map<string, VariantMetrics>, id: string) =>
  metrics.get(id)?.stageCounts.map((s) => s.count);

describe('aggregate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should count distinct users per variant and stage', () => {
    const records = [
      event('u1', 'A', 'page_view'),
      event('u1', 'A', 'click'),
      event('u2', 'A', 'page_view'),
      event('u3', 'B', 'page_view'),
      event('u3', 'B', 'click'),
      event('u3', 'B', 'add_to_cart'),
      event('u3', 'B', 'purchase', 40),
    ];

    const metrics = aggregate(records, { A: 10, B: 12 });

    expect([...metrics.keys()]).toEqual(['A', 'B']);
    expect(counts(metrics, 'A')).toEqual([2, 1, 0, 0]);
    expect(counts(metrics, 'B')).toEqual([1, 1, 1, 1]);
    expect(metrics.get('A')?.totalUsers).toBe(10);
    expect(metrics.get('B')?.totalUsers).toBe(12);
  });

  it('should count a user with duplicate events exactly once', () => {
    const records = Array.from({ length: 25 }, () => event('u1', 'A', 'click'));
    records.push(...Array.from({ length: 25 }, () => event('u1', 'A', 'page_view')));

    const metrics = aggregate(records, { A: 1 });
    const a = metrics.get('A');

    expect(a && stageCountOf(a, 'page_view')).toBe(1);
    expect(a && stageCountOf(a, 'click')).toBe(1);
  });

  it('should sum revenue over purchases and track distinct purchasers', () => {
    const records = [
      event('u1', 'A', 'page_view'),
      event('u1', 'A', 'click'),
      event('u1', 'A', 'add_to_cart'),
      event('u1', 'A', 'purchase', 30),
      event('u1', 'A', 'purchase', 20),
      event('u2', 'A', 'page_view'),
      event('u2', 'A', 'click'),
      event('u2', 'A', 'add_to_cart'),
      event('u2', 'A', 'purchase', 50),
      // Revenue on a non-purchase event is not revenue
      event('u3', 'A', 'page_view', 999),
    ];

    const a = aggregate(records, { A: 3 }).get('A');

    expect(a?.purchasingUsers).toBe(2);
    expect(a?.orderCount).toBe(3);
    expect(a?.totalRevenue).toBe(100);
    expect(a?.avgOrderValue).toBe(50);
  });

  it('should include assigned variants that produced no events', () => {
    const metrics = aggregate([event('u1', 'A', 'page_view')], { A: 5, B: 5 });
    const b = metrics.get('B');

    expect(counts(metrics, 'B')).toEqual([0, 0, 0, 0]);
    expect(b?.totalRevenue).toBe(0);
    expect(b?.avgOrderValue).toBeNull();
  });

  it('should fail when a variant has no total_users entry', () => {
    expect(() => aggregate([event('u1', 'C', 'page_view')], { A: 5, B: 5 })).toThrow(
      'Variant C has no total_users entry'
    );
  });

  it('should reject unknown event types, missing users and bad revenue', () => {
    expect(() => aggregate([event('u1', 'A', 'checkout')], { A: 1 })).toThrow(
      'Unknown event type: checkout'
    );
    expect(() => aggregate([event('', 'A', 'click')], { A: 1 })).toThrow(ValidationError);
    expect(() => aggregate([event('u1', 'A', 'purchase', -5)], { A: 1 })).toThrow(
      'Purchase revenue must be a non-negative number'
    );
  });

  it('should reject invalid total_users values', () => {
    expect(() => aggregate([], { A: 2.5 })).toThrow(
      'total_users for variant A must be a non-negative integer'
    );
  });

  describe('funnel monotonicity', () => {
    // u1 clicks without a page view, so click (1) > page_view (0)
    const skipped = [event('u1', 'A', 'click')];

    it('should warn in permissive mode', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const metrics = aggregate(skipped, { A: 1 });

      expect(counts(metrics, 'A')).toEqual([0, 1, 0, 0]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        '[funnelstat] Variant A: funnel is not monotonic at page_view -> click'
      );
    });

    it('should throw in strict mode', () => {
      expect(() => aggregate(skipped, { A: 1 }, { validationMode: 'strict' })).toThrow(
        'Variant A: funnel is not monotonic at page_view -> click'
      );
    });
  });

  it('should honour a custom stage list', () => {
    const metrics = aggregate(
      [event('u1', 'A', 'visit'), event('u1', 'A', 'signup'), event('u2', 'A', 'visit')],
      { A: 2 },
      { stages: ['visit', 'signup'], ctrStage: 'signup', leakageStage: 'signup', purchaseStage: 'signup' }
    );

    expect(metrics.get('A')?.stageCounts).toEqual([
      { stage: 'visit', count: 2 },
      { stage: 'signup', count: 1 },
    ]);
  });
});

describe('MetricAccumulator', () => {
  const config = resolveConfig();

  it('should deduplicate users across merged partitions', () => {
    const left = new MetricAccumulator(config).addAll([
      event('u1', 'A', 'page_view'),
      event('u1', 'A', 'click'),
      event('u2', 'A', 'page_view'),
    ]);
    const right = new MetricAccumulator(config).addAll([
      event('u1', 'A', 'page_view'),
      event('u1', 'A', 'click'),
      event('u3', 'A', 'page_view'),
      event('u4', 'B', 'page_view'),
    ]);

    const metrics = left.merge(right).toMetrics({ A: 3, B: 1 });

    expect(counts(metrics, 'A')).toEqual([3, 1, 0, 0]);
    expect(counts(metrics, 'B')).toEqual([1, 0, 0, 0]);
  });

  it('should produce the same metrics whichever way the input is partitioned', () => {
    const records = [
      event('u1', 'A', 'page_view'),
      event('u1', 'A', 'click'),
      event('u1', 'A', 'add_to_cart'),
      event('u1', 'A', 'purchase', 12.5),
      event('u2', 'A', 'page_view'),
      event('u2', 'A', 'page_view'),
      event('u2', 'A', 'click'),
    ];

    const whole = new MetricAccumulator(config).addAll(records).toMetrics({ A: 2 });
    const merged = new MetricAccumulator(config)
      .addAll(records.slice(0, 3))
      .merge(new MetricAccumulator(config).addAll(records.slice(3)))
      .toMetrics({ A: 2 });

    expect(merged.get('A')).toEqual(whole.get('A'));
  });

  it('should produce frozen metrics', () => {
    const metrics = new MetricAccumulator(config).toMetrics({ A: 0 });
    expect(Object.isFrozen(metrics.get('A'))).toBe(true);
  });
});
