import { describe, it, expect } from 'vitest';
import { PopulationSimulator, SimulationScenario } from '../../simulation';
import { aggregate } from '../../domain/aggregation';
import { analyzeEvents } from '../../analysis';
import { InvalidInputError } from '../../core/errors';

const scenario = (overrides: Partial<SimulationScenario> = {}): SimulationScenario => ({
  variants: [
    {
      id: 'A',
      users: 2000,
      clickRate: 0.04,
      addToCartRate: 0.6,
      purchaseRate: 0.5,
      orderValue: { logMean: 4, logStd: 0.3 },
    },
    {
      id: 'B',
      users: 2000,
      clickRate: 0.05,
      addToCartRate: 0.5,
      purchaseRate: 0.5,
      orderValue: { logMean: 4, logStd: 0.3 },
    },
  ],
  ...overrides,
});

describe('PopulationSimulator', () => {
  it('should be reproducible for a given seed', () => {
    const first = new PopulationSimulator(42).simulate(scenario());
    const second = new PopulationSimulator(42).simulate(scenario());

    expect(second.records).toEqual(first.records);
    expect(second.totalUsers).toEqual(first.totalUsers);
  });

  it('should report the assigned population per variant', () => {
    const { totalUsers } = new PopulationSimulator(7).simulate(scenario());
    expect(totalUsers).toEqual({ A: 2000, B: 2000 });
  });

  it('should give every user a page view and produce a monotonic funnel', () => {
    const { records, totalUsers } = new PopulationSimulator(7).simulate(scenario());
    const metrics = aggregate(records, totalUsers, { validationMode: 'strict' });

    for (const variant of metrics.values()) {
      const [pageView, click, addToCart, purchase] = variant.stageCounts.map((s) => s.count);
      expect(pageView).toBe(2000);
      expect(click).toBeLessThanOrEqual(pageView);
      expect(addToCart).toBeLessThanOrEqual(click);
      expect(purchase).toBeLessThanOrEqual(addToCart);
      expect(variant.purchasingUsers).toBe(purchase);
    }
  });

  it('should attach positive revenue to purchases only', () => {
    const { records } = new PopulationSimulator(11).simulate(scenario());

    for (const record of records) {
      if (record.eventType === 'purchase') {
        expect(record.revenue).toBeGreaterThan(0);
      } else {
        expect(record.revenue).toBeUndefined();
      }
    }
  });

  it('should emit duplicates that aggregation collapses', () => {
    const clean = new PopulationSimulator(3).simulate(scenario());
    const noisy = new PopulationSimulator(3).simulate(scenario({ duplicateEventRate: 1 }));

    expect(noisy.records.length).toBeGreaterThan(clean.records.length);

    const metrics = aggregate(noisy.records, noisy.totalUsers);
    const a = metrics.get('A');
    expect(a?.stageCounts[0].count).toBe(2000);
    expect(a?.orderCount).toBe(a?.purchasingUsers);
  });

  it('should follow the configured rates at the extremes', () => {
    const { records } = new PopulationSimulator(5).simulate({
      variants: [
        { id: 'all', users: 10, clickRate: 1, addToCartRate: 1, purchaseRate: 1, orderValue: { logMean: 0, logStd: 0 } },
        { id: 'none', users: 10, clickRate: 0, addToCartRate: 1, purchaseRate: 1, orderValue: { logMean: 0, logStd: 0 } },
      ],
    });

    expect(records.filter((r) => r.variantId === 'all')).toHaveLength(40);
    expect(records.filter((r) => r.variantId === 'none')).toHaveLength(10);
    // exp(0) rounded to cents
    expect(records.find((r) => r.eventType === 'purchase')?.revenue).toBe(1);
  });

  it('should feed the full analysis', () => {
    const { records, totalUsers } = new PopulationSimulator(2024).simulate(scenario());
    const report = analyzeEvents(records, totalUsers);

    expect(report.getVariants()).toHaveLength(2);
    expect(report.getCtrTest().result.pValue).toBeGreaterThanOrEqual(0);
    expect(report.getCtrTest().result.pValue).toBeLessThanOrEqual(1);
    expect(report.getLeakage().leakagePct).toBeGreaterThanOrEqual(0);
  });

  it('should reject invalid scenarios', () => {
    const simulator = new PopulationSimulator(1);

    expect(() => simulator.simulate(scenario({ duplicateEventRate: 2 }))).toThrow(InvalidInputError);
    expect(() =>
      simulator.simulate({
        variants: [
          { id: 'A', users: 10, clickRate: -0.1, addToCartRate: 0.5, purchaseRate: 0.5, orderValue: { logMean: 1, logStd: 1 } },
        ],
      })
    ).toThrow('clickRate must be within [0, 1]');
    expect(() =>
      simulator.simulate({
        variants: [
          { id: 'A', users: 1.5, clickRate: 0.1, addToCartRate: 0.5, purchaseRate: 0.5, orderValue: { logMean: 1, logStd: 1 } },
        ],
      })
    ).toThrow('Variant A: users must be a non-negative integer');
  });
});
