export { MetricsValidator } from './MetricsValidator';
export type { Violation } from './MetricsValidator';
