/**
 * Funnelstat - A/B experiment funnel and CTR analysis
 *
 * Two-proportion significance testing on click-through, funnel drop-off per variant
 * and a revenue-leakage estimate, assembled into a report with tabular exports.
 */

// Errors, configuration, data model, normal CDF, RNG
export * from './core';
export type { ErrorContext } from './core/errors';

// Statistics
export { testTwoProportions, testTwoRates, DEFAULT_ALPHA } from './inference/frequentist';
export type { ProportionTestResult } from './inference/frequentist';

// Analyzers
export { MetricAccumulator, aggregate } from './domain/aggregation';
export { MetricsValidator } from './domain/validation';
export type { Violation } from './domain/validation';
export { analyzeFunnel, transitionInto } from './domain/funnel';
export type { FunnelTransition } from './domain/funnel';
export * from './domain/revenue';
export * from './domain/tables';
export * from './domain/results';

// Pipelines
export { analyzeEvents, analyzeTables } from './analysis';

// Simulation
export * from './simulation';

export const VERSION = '0.1.0';
