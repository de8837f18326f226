import { describe, it, expect } from 'vitest';
import { analyzeFunnel, transitionInto } from '../../domain/funnel';
import { StageCount } from '../../core/data';
import { ValidationError } from '../../core/errors';

const stages = (counts: number[]): StageCount[] =>
  ['page_view', 'click', 'add_to_cart', 'purchase'].map((stage, i) => ({
    stage,
    count: counts[i],
  }));

describe('analyzeFunnel', () => {
  it('should emit one transition per adjacent pair, in order', () => {
    const transitions = analyzeFunnel(stages([5000, 160, 120, 70]));

    expect(transitions.map((t) => [t.fromStage, t.toStage])).toEqual([
      ['page_view', 'click'],
      ['click', 'add_to_cart'],
      ['add_to_cart', 'purchase'],
    ]);
    expect(transitions[0].fromCount).toBe(5000);
    expect(transitions[0].toCount).toBe(160);
  });

  it('should compute click-to-cart drop-off for both variants', () => {
    const a = analyzeFunnel(stages([5000, 160, 120, 70]));
    const b = analyzeFunnel(stages([5000, 160, 110, 60]));

    expect(transitionInto(a, 'add_to_cart')?.conversionRatePct).toBe(75);
    expect(transitionInto(a, 'add_to_cart')?.dropoffPct).toBe(25);
    expect(transitionInto(b, 'add_to_cart')?.conversionRatePct).toBe(68.75);
    expect(transitionInto(b, 'add_to_cart')?.dropoffPct).toBe(31.25);
  });

  it('should keep unrounded rates', () => {
    const [toClick, , toPurchase] = analyzeFunnel(stages([5000, 160, 120, 70]));

    expect(toClick.conversionRatePct).toBe(3.2);
    expect(toPurchase.conversionRatePct).toBe((100 * 70) / 120);
    expect(toPurchase.conversionRatePct).not.toBe(58.33);
  });

  it('should make conversion and drop-off add up to 100', () => {
    const transitions = analyzeFunnel(stages([9973, 3331, 1201, 7]));

    for (const t of transitions) {
      expect(t.conversionRatePct + t.dropoffPct).toBe(100);
    }
  });

  it('should flag an empty upstream stage instead of dividing by zero', () => {
    const transitions = analyzeFunnel(stages([400, 0, 0, 0]));

    expect(transitions[0]).toMatchObject({ conversionRatePct: 0, dropoffPct: 100, upstreamEmpty: false });
    expect(transitions[1]).toMatchObject({
      fromStage: 'click',
      conversionRatePct: 0,
      dropoffPct: 100,
      upstreamEmpty: true,
    });
    expect(transitions[2].upstreamEmpty).toBe(true);
  });

  it('should walk whatever stage order the caller supplies', () => {
    const transitions = analyzeFunnel([
      { stage: 'visit', count: 200 },
      { stage: 'signup', count: 50 },
    ]);

    expect(transitions).toHaveLength(1);
    expect(transitions[0]).toMatchObject({
      fromStage: 'visit',
      toStage: 'signup',
      conversionRatePct: 25,
      dropoffPct: 75,
    });
  });

  it('should return no transitions for fewer than two stages', () => {
    expect(analyzeFunnel([])).toEqual([]);
    expect(analyzeFunnel([{ stage: 'page_view', count: 10 }])).toEqual([]);
  });

  it('should reject duplicate stages and invalid counts', () => {
    expect(() =>
      analyzeFunnel([
        { stage: 'click', count: 10 },
        { stage: 'click', count: 5 },
      ])
    ).toThrow(ValidationError);
    expect(() => analyzeFunnel(stages([100, -1, 0, 0]))).toThrow('Stage click has an invalid count');
  });
});
