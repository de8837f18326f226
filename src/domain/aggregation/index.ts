export { MetricAccumulator, aggregate } from './MetricAggregator';
