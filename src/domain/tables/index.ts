export {
  buildCtrTable,
  buildFunnelTable,
  buildRevenueTable,
  buildTables,
  usesStandardStages,
  round2,
} from './TableBuilder';
export { metricsFromTables } from './TableIngestion';
export type { IngestionResult } from './TableIngestion';
export { formatCsv } from './csv';
export { CTR_COLUMNS, FUNNEL_COLUMNS, FUNNEL_STEP_COLUMNS, REVENUE_COLUMNS } from './types';
export type {
  AnalysisTables,
  CtrTableRow,
  FunnelTableRow,
  RevenueTableRow,
  RawRow,
  RawTables,
  TableRow,
} from './types';
