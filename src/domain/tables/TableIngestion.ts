/**
 * Reads the CTR, funnel and revenue tables into VariantMetrics
 *
 * Rows arrive untyped (parsed CSV or JSON), so every required cell is checked.
 * Derived columns (rates, drop-offs, averages) are optional and ignored: they are
 * recomputed from the counts.
 */

import {
  DEFAULT_FUNNEL_STAGES,
  VariantMetrics,
  createVariantMetrics,
} from '../../core/data/metrics';
import { ValidationMode } from '../../core/config';
import { ValidationError } from '../../core/errors';
import { MetricsValidator } from '../validation/MetricsValidator';
import { FUNNEL_STEP_COLUMNS, RawRow, RawTables } from './types';

type TableName = keyof RawTables;

function readVariant(row: RawRow, table: TableName, index: number): string {
  const value = row['variant'];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Row ${index} of the ${table} table has no variant`, {
      table,
      row: index,
    });
  }
  return value.trim();
}

function readNumber(row: RawRow, column: string, table: TableName, index: number): number {
  if (!(column in row)) {
    throw new ValidationError(`Column ${column} is missing from the ${table} table`, {
      table,
      column,
      row: index,
    });
  }

  const raw = row[column];
  const value =
    typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;

  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`Column ${column} of the ${table} table must be a non-negative number`, {
      table,
      column,
      row: index,
      value: raw,
    });
  }
  return value;
}

function readCount(row: RawRow, column: string, table: TableName, index: number): number {
  const value = readNumber(row, column, table, index);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`Column ${column} of the ${table} table must be an integer`, {
      table,
      column,
      row: index,
      value,
    });
  }
  return value;
}

function indexByVariant(rows: readonly RawRow[], table: TableName): Map<string, [RawRow, number]> {
  const byVariant = new Map<string, [RawRow, number]>();
  rows.forEach((row, index) => {
    const variant = readVariant(row, table, index);
    if (byVariant.has(variant)) {
      throw new ValidationError(`Variant ${variant} appears twice in the ${table} table`, {
        table,
        variant,
      });
    }
    byVariant.set(variant, [row, index]);
  });
  return byVariant;
}

function lookup(
  byVariant: Map<string, [RawRow, number]>,
  variant: string,
  table: TableName
): [RawRow, number] {
  const entry = byVariant.get(variant);
  if (!entry) {
    throw new ValidationError(`Variant ${variant} is missing from the ${table} table`, {
      table,
      variant,
    });
  }
  return entry;
}

export interface IngestionResult {
  metrics: VariantMetrics[];
  warnings: string[];
}

/**
 * Convert the three tables into per-variant metrics on the standard four-stage funnel
 *
 * Variant order follows the CTR table. Cross-table inconsistencies and funnel
 * invariant violations throw in strict mode and come back as warnings in permissive mode.
 */
export function metricsFromTables(
  tables: RawTables,
  mode: ValidationMode = 'permissive'
): IngestionResult {
  const ctr = indexByVariant(tables.ctr, 'ctr');
  const funnel = indexByVariant(tables.funnel, 'funnel');
  const revenue = indexByVariant(tables.revenue, 'revenue');

  for (const [table, rows] of [
    ['funnel', funnel],
    ['revenue', revenue],
  ] as const) {
    for (const variant of rows.keys()) {
      if (!ctr.has(variant)) {
        throw new ValidationError(`Variant ${variant} is missing from the ctr table`, {
          table,
          variant,
        });
      }
    }
  }

  const warnings: string[] = [];
  const metrics: VariantMetrics[] = [];

  for (const [variant, [ctrRow, ctrIndex]] of ctr) {
    const [funnelRow, funnelIndex] = lookup(funnel, variant, 'funnel');
    const [revenueRow, revenueIndex] = lookup(revenue, variant, 'revenue');

    const totalUsers = readCount(ctrRow, 'total_users', 'ctr', ctrIndex);
    const clickedUsers = readCount(ctrRow, 'clicked_users', 'ctr', ctrIndex);
    const stageCounts = DEFAULT_FUNNEL_STAGES.map((stage, i) => ({
      stage,
      count: readCount(funnelRow, FUNNEL_STEP_COLUMNS[i], 'funnel', funnelIndex),
    }));
    const purchasingUsers = readCount(revenueRow, 'purchasing_users', 'revenue', revenueIndex);
    const totalRevenue = readNumber(revenueRow, 'total_revenue', 'revenue', revenueIndex);

    if (clickedUsers !== stageCounts[1].count) {
      const message = `Variant ${variant}: clicked_users (${clickedUsers}) does not match step2_click (${stageCounts[1].count})`;
      if (mode === 'strict') {
        throw new ValidationError(message, {
          variant,
          clickedUsers,
          step2Click: stageCounts[1].count,
        });
      }
      warnings.push(message);
    }

    const variantMetrics = createVariantMetrics({
      variantId: variant,
      totalUsers,
      stageCounts,
      purchasingUsers,
      // Tables carry no order count; one order per purchasing user
      orderCount: purchasingUsers,
      totalRevenue,
    });
    warnings.push(
      ...MetricsValidator.validateVariant(variantMetrics, mode, DEFAULT_FUNNEL_STAGES[3])
    );
    metrics.push(variantMetrics);
  }

  for (const warning of warnings) {
    console.warn(`[funnelstat] ${warning}`);
  }

  return { metrics, warnings };
}
