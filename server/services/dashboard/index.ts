/**
 * Dashboard Module - filter and aggregation pipeline
 *
 * Record Set -> Filter Engine -> Filtered View -> Aggregator -> KPIs + chart series
 *
 * Everything here is a pure function of (records, selection). Session state
 * lives in server/session, HTTP in server/controllers.
 */

// Types
export type {
  FilterSelection,
  FilterSelectionPatch,
  FilterOptionValues,
  FilteredView,
  KpiSummary,
  DepartmentCount,
  MonthCount,
  SalaryBoxSummary,
  DashboardAggregates,
  DashboardPassResult,
  DashboardPassOk,
  DashboardPassEmpty,
} from "./dashboardTypes";

// Filter Engine
export {
  applyFilters,
  matchesSelection,
  isEmptyView,
  deriveFilterOptions,
  createDefaultSelection,
  findUnknownSelectionValues,
} from "./filterEngine";

// Aggregator
export {
  computeAggregates,
  computeKpis,
  computeDepartmentDistribution,
  computeHiringTrend,
  countMissingHiringDates,
  computeAttritionByDepartment,
  computeSalaryByDepartment,
  summarizeSalaries,
  quantile,
  EmptyViewError,
} from "./aggregator";

// Pass
export { runDashboardPass } from "./dashboardPass";

// Display
export {
  formatKpis,
  formatCount,
  formatPercent,
  formatCurrency,
  formatDecimal,
  KPI_LABELS,
} from "./kpiFormat";
