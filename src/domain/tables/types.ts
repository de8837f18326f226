/**
 * Tabular contracts exchanged with the data layer
 *
 * Column names are snake_case because the same rows travel through CSV and SQL.
 * Rates and money are rounded to 2 decimal places; null marks an undefined value.
 */

export interface CtrTableRow {
  variant: string;
  total_users: number;
  clicked_users: number;
  ctr_percent: number | null;
}

export interface FunnelTableRow {
  variant: string;
  step1_page_view: number;
  step2_click: number;
  click_rate: number | null;
  drop_page_to_click: number | null;
  step3_add_to_cart: number;
  add_to_cart_rate: number | null;
  drop_click_to_cart: number | null;
  step4_purchase: number;
  purchase_rate: number | null;
  drop_cart_to_purchase: number | null;
}

export interface RevenueTableRow {
  variant: string;
  purchasing_users: number;
  total_revenue: number;
  avg_order_value: number | null;
  revenue_per_user: number | null;
}

export interface AnalysisTables {
  ctr: CtrTableRow[];
  /** Only available for the standard four-stage funnel */
  funnel: FunnelTableRow[] | null;
  revenue: RevenueTableRow[];
}

/**
 * Untyped rows as they arrive from CSV or JSON
 */
export type RawRow = Readonly<Record<string, unknown>>;

export interface RawTables {
  ctr: readonly RawRow[];
  funnel: readonly RawRow[];
  revenue: readonly RawRow[];
}

export type TableRow = CtrTableRow | FunnelTableRow | RevenueTableRow;

export const CTR_COLUMNS = ['variant', 'total_users', 'clicked_users', 'ctr_percent'] as const;

export const FUNNEL_COLUMNS = [
  'variant',
  'step1_page_view',
  'step2_click',
  'click_rate',
  'drop_page_to_click',
  'step3_add_to_cart',
  'add_to_cart_rate',
  'drop_click_to_cart',
  'step4_purchase',
  'purchase_rate',
  'drop_cart_to_purchase',
] as const;

/** Funnel table count columns, in stage order */
export const FUNNEL_STEP_COLUMNS = [
  'step1_page_view',
  'step2_click',
  'step3_add_to_cart',
  'step4_purchase',
] as const;

export const REVENUE_COLUMNS = [
  'variant',
  'purchasing_users',
  'total_revenue',
  'avg_order_value',
  'revenue_per_user',
] as const;
