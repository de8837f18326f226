/**
 * Entry points running the whole analysis from raw events or from tables
 */

import { EventRecord } from '../core/data/metrics';
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG, resolveConfig } from '../core/config';
import { aggregate } from '../domain/aggregation/MetricAggregator';
import { metricsFromTables } from '../domain/tables/TableIngestion';
import { RawTables } from '../domain/tables/types';
import { ExperimentReport } from '../domain/results/ExperimentReport';
import { assembleReport } from '../domain/results/ReportAssembler';

/**
 * Aggregate per-user events and analyze them
 *
 * @param totalUsers - Users assigned to each variant, whether or not they produced events
 */
export function analyzeEvents(
  records: Iterable<EventRecord>,
  totalUsers: Readonly<Record<string, number>>,
  config: Partial<AnalysisConfig> = {}
): ExperimentReport {
  const resolved = resolveConfig(config);
  const metrics = aggregate(records, totalUsers, resolved);
  return assembleReport(metrics.values(), resolved);
}

/**
 * Analyze the CTR, funnel and revenue tables
 *
 * Tables always describe the standard four-stage funnel, so any configured stage list
 * is replaced by it.
 */
export function analyzeTables(
  tables: RawTables,
  config: Partial<AnalysisConfig> = {}
): ExperimentReport {
  const resolved = resolveConfig({ ...config, stages: DEFAULT_ANALYSIS_CONFIG.stages });
  const { metrics, warnings } = metricsFromTables(tables, resolved.validationMode);
  return assembleReport(metrics, resolved, warnings);
}
