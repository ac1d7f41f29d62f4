/**
 * Dashboard Types - filter selection, filtered view and aggregate shapes
 *
 * Every type here is derived from one loaded record set. Nothing is cached
 * between passes: a new selection means a new view and new aggregates.
 */

import type { EmployeeRecord, RecordSet } from "@shared/employee";

// ============================================================================
// Filter Selection
// ============================================================================

/**
 * Session-scoped filter state.
 * gender/attrition: null = "All" (no constraint).
 */
export interface FilterSelection {
  /** Selected departments; empty = nothing passes */
  departments: readonly string[];
  gender: string | null;
  attrition: string | null;
}

export type FilterSelectionPatch = Partial<FilterSelection>;

/**
 * Distinct values present in a record set, first-seen order.
 */
export interface FilterOptionValues {
  departments: string[];
  genders: string[];
  attritionStatuses: string[];
}

/**
 * Subset of the record set in original order.
 */
export type FilteredView = readonly EmployeeRecord[];

// ============================================================================
// Aggregates
// ============================================================================

export interface KpiSummary {
  totalCount: number;
  attritedCount: number;
  /** attritedCount / totalCount, unrounded */
  attritionRatio: number;
  /** attritionRatio * 100, unrounded */
  attritionRatePercent: number;
  averageSalary: number;
  averageTenure: number;
}

export interface DepartmentCount {
  department: string;
  count: number;
}

export interface MonthCount {
  /** YYYY-MM */
  month: string;
  count: number;
}

/**
 * Salary distribution of one department (box plot input).
 */
export interface SalaryBoxSummary {
  department: string;
  /** Salaries in view order */
  values: number[];
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export interface DashboardAggregates {
  kpis: KpiSummary;
  departmentDistribution: DepartmentCount[];
  hiringTrend: MonthCount[];
  /** Records left out of hiringTrend */
  missingHiringDates: number;
  attritionByDepartment: DepartmentCount[];
  salaryByDepartment: SalaryBoxSummary[];
}

// ============================================================================
// Pass Result
// ============================================================================

export interface DashboardPassEmpty {
  status: "empty";
  totalRecords: number;
}

export interface DashboardPassOk {
  status: "ok";
  totalRecords: number;
  view: FilteredView;
  aggregates: DashboardAggregates;
}

export type DashboardPassResult = DashboardPassEmpty | DashboardPassOk;

export type { EmployeeRecord, RecordSet };
