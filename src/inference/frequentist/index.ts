export { testTwoProportions, testTwoRates, DEFAULT_ALPHA } from './ProportionTest';
export type { ProportionTestResult } from './ProportionTest';
