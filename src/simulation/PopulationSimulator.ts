// src/simulation/PopulationSimulator.ts
import { DEFAULT_FUNNEL_STAGES, EventRecord } from '../core/data/metrics';
import { InvalidInputError } from '../core/errors';
import { RNG } from '../core/math/random';

/**
 * Behaviour of one simulated variant
 *
 * Rates are conditional on reaching the previous stage: addToCartRate is the share of
 * clickers who add to cart, purchaseRate the share of cart-adders who buy.
 */
export interface VariantScenario {
  id: string;
  users: number;
  clickRate: number;
  addToCartRate: number;
  purchaseRate: number;
  /** Log-normal order value, parameters on the log scale */
  orderValue: { logMean: number; logStd: number };
}

export interface SimulationScenario {
  variants: VariantScenario[];
  /** Probability that a non-purchase event is emitted twice */
  duplicateEventRate?: number;
}

export interface SimulatedPopulation {
  records: EventRecord[];
  totalUsers: Record<string, number>;
}

/**
 * Generates per-user funnel events for an A/B experiment.
 * Every user views the page; later stages are reached with the scenario's rates.
 */
export class PopulationSimulator {
  private rng: RNG;

  constructor(seed?: number) {
    this.rng = new RNG(seed);
  }

  simulate(scenario: SimulationScenario): SimulatedPopulation {
    const duplicateRate = scenario.duplicateEventRate ?? 0;
    this.checkProbability('duplicateEventRate', duplicateRate);

    const [pageView, click, addToCart, purchase] = DEFAULT_FUNNEL_STAGES;
    const records: EventRecord[] = [];
    const totalUsers: Record<string, number> = {};

    for (const variant of scenario.variants) {
      this.checkVariant(variant);
      totalUsers[variant.id] = variant.users;

      const emit = (userId: string, eventType: string): void => {
        records.push({ userId, variantId: variant.id, eventType });
        if (this.rng.bernoulli(duplicateRate)) {
          records.push({ userId, variantId: variant.id, eventType });
        }
      };

      for (let i = 0; i < variant.users; i++) {
        const userId = `${variant.id}-${i}`;

        emit(userId, pageView);
        if (!this.rng.bernoulli(variant.clickRate)) continue;
        emit(userId, click);
        if (!this.rng.bernoulli(variant.addToCartRate)) continue;
        emit(userId, addToCart);
        if (!this.rng.bernoulli(variant.purchaseRate)) continue;

        const { logMean, logStd } = variant.orderValue;
        const revenue = Math.round(this.rng.logNormal(logMean, logStd) * 100) / 100;
        records.push({ userId, variantId: variant.id, eventType: purchase, revenue });
      }
    }

    return { records, totalUsers };
  }

  private checkVariant(variant: VariantScenario): void {
    if (!Number.isInteger(variant.users) || variant.users < 0) {
      throw new InvalidInputError(`Variant ${variant.id}: users must be a non-negative integer`, {
        users: variant.users,
      });
    }
    this.checkProbability('clickRate', variant.clickRate);
    this.checkProbability('addToCartRate', variant.addToCartRate);
    this.checkProbability('purchaseRate', variant.purchaseRate);
    if (!(variant.orderValue.logStd >= 0)) {
      throw new InvalidInputError(`Variant ${variant.id}: orderValue.logStd must be non-negative`, {
        logStd: variant.orderValue.logStd,
      });
    }
  }

  private checkProbability(name: string, value: number): void {
    if (!(value >= 0 && value <= 1)) {
      throw new InvalidInputError(`${name} must be within [0, 1]`, { [name]: value });
    }
  }
}
