/**
 * Aggregator - KPIs and grouped summaries of a filtered view
 *
 * IMPORTANT: only call with a non-empty view. Every KPI divides by the record
 * count; an empty view throws EmptyViewError instead of producing NaN.
 */

import { format } from "date-fns";
import { isAttrited } from "@shared/employee";
import type {
  DashboardAggregates,
  DepartmentCount,
  EmployeeRecord,
  FilteredView,
  KpiSummary,
  MonthCount,
  SalaryBoxSummary,
} from "./dashboardTypes";

const MONTH_KEY_FORMAT = "yyyy-MM";

// ============================================================================
// Errors
// ============================================================================

export class EmptyViewError extends Error {
  constructor(message = "Aggregates require at least one record") {
    super(message);
    this.name = "EmptyViewError";
    Object.setPrototypeOf(this, EmptyViewError.prototype);
  }
}

function assertNotEmpty(view: FilteredView): void {
  if (view.length === 0) {
    throw new EmptyViewError();
  }
}

// ============================================================================
// KPIs
// ============================================================================

export function computeKpis(view: FilteredView): KpiSummary {
  assertNotEmpty(view);

  const totalCount = view.length;
  let attritedCount = 0;
  let salarySum = 0;
  let tenureSum = 0;

  for (const record of view) {
    if (isAttrited(record)) attritedCount++;
    salarySum += record.salary;
    tenureSum += record.yearsAtCompany;
  }

  const attritionRatio = attritedCount / totalCount;

  return {
    totalCount,
    attritedCount,
    attritionRatio,
    attritionRatePercent: attritionRatio * 100,
    averageSalary: salarySum / totalCount,
    averageTenure: tenureSum / totalCount,
  };
}

// ============================================================================
// Grouped Summaries
// ============================================================================

/**
 * Counts per key in first-seen order.
 */
function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Descending by count; Array.prototype.sort is stable, so ties keep
 * first-seen order.
 */
function toRankedDepartmentCounts(counts: Map<string, number>): DepartmentCount[] {
  return [...counts.entries()]
    .map(([department, count]) => ({ department, count }))
    .sort((a, b) => b.count - a.count);
}

export function computeDepartmentDistribution(view: FilteredView): DepartmentCount[] {
  return toRankedDepartmentCounts(countBy(view, (record) => record.department));
}

/**
 * Hires per calendar month, ascending. Records without a hiring date are
 * skipped here and only here.
 */
export function computeHiringTrend(view: FilteredView): MonthCount[] {
  const dated = view.filter(
    (record): record is EmployeeRecord & { hiringDate: Date } => record.hiringDate !== null
  );
  const counts = countBy(dated, (record) => format(record.hiringDate, MONTH_KEY_FORMAT));

  return [...counts.entries()]
    .map(([month, count]) => ({ month, count }))
    .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));
}

export function countMissingHiringDates(view: FilteredView): number {
  return view.reduce((sum, record) => (record.hiringDate === null ? sum + 1 : sum), 0);
}

/**
 * Attrited records per department. Departments without attrition are absent.
 */
export function computeAttritionByDepartment(view: FilteredView): DepartmentCount[] {
  return toRankedDepartmentCounts(
    countBy(view.filter(isAttrited), (record) => record.department)
  );
}

/**
 * Quantile with linear interpolation between order statistics.
 * Expects ascending, non-empty input.
 */
export function quantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new EmptyViewError("Quantile of an empty sample");
  }
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower];
  const upperValue = sorted[upper];
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function summarizeSalaries(department: string, values: number[]): SalaryBoxSummary {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    department,
    values,
    min: sorted[0],
    q1: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q3: quantile(sorted, 0.75),
    max: sorted[sorted.length - 1],
  };
}

/**
 * Five-number summary per department, first-seen department order.
 */
export function computeSalaryByDepartment(view: FilteredView): SalaryBoxSummary[] {
  const salaries = new Map<string, number[]>();
  for (const record of view) {
    const bucket = salaries.get(record.department);
    if (bucket) {
      bucket.push(record.salary);
    } else {
      salaries.set(record.department, [record.salary]);
    }
  }

  return [...salaries.entries()].map(([department, values]) =>
    summarizeSalaries(department, values)
  );
}

// ============================================================================
// Main Entry
// ============================================================================

/**
 * Computes every aggregate of the view from scratch.
 *
 * @throws EmptyViewError when the view is empty
 */
export function computeAggregates(view: FilteredView): DashboardAggregates {
  assertNotEmpty(view);

  return {
    kpis: computeKpis(view),
    departmentDistribution: computeDepartmentDistribution(view),
    hiringTrend: computeHiringTrend(view),
    missingHiringDates: countMissingHiringDates(view),
    attritionByDepartment: computeAttritionByDepartment(view),
    salaryByDepartment: computeSalaryByDepartment(view),
  };
}
