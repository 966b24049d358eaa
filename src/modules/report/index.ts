export type { CostReportRecord } from './cost-report.js'
export {
  COST_REPORT_COLUMNS,
  REPORT_FRACTION_DIGITS,
  csvField,
  defaultReportPath,
  formatCostCsv,
  formatFailuresTable,
  toReportRecord,
  writeCostReport,
} from './cost-report.js'
