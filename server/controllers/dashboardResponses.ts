/**
 * Builders for the JSON bodies of the dataset and dashboard endpoints.
 * Date objects become strings here; nothing else in the server serializes.
 */

import type { EmployeeRecord } from "@shared/employee";
import {
  NO_DATA_MESSAGE,
  type DashboardCharts,
  type DashboardResponse,
  type DatasetSummary,
  type EmployeeRow,
  type FilterSelectionBody,
  type FiltersResponse,
} from "@shared/contracts/dashboard.contract";
import {
  formatKpis,
  type DashboardAggregates,
  type DashboardPassResult,
  type FilterSelection,
} from "../services/dashboard";
import { formatHiringDate } from "../services/dataset";
import type { DashboardSession } from "../session/dashboardSession";

export const CHART_TITLES = {
  departmentDistribution: "Employee Distribution by Department",
  hiringTrend: "Hiring Trend Over Time",
  attritionByDepartment: "Attrition by Department",
  salaryByDepartment: "Salary Distribution by Department",
} as const;

export function toSelectionBody(selection: FilterSelection): FilterSelectionBody {
  return {
    departments: [...selection.departments],
    gender: selection.gender,
    attrition: selection.attrition,
  };
}

export function toFiltersResponse(session: DashboardSession): FiltersResponse {
  return {
    options: session.filterOptions(),
    selection: toSelectionBody(session.getSelection()),
  };
}

export function toDatasetSummary(session: DashboardSession): DatasetSummary {
  const dataset = session.getDataset();
  return {
    source: dataset.source,
    fileName: dataset.fileName,
    loadedAt: dataset.loadedAt.toISOString(),
    rowCount: dataset.records.length,
    missingHiringDates: dataset.missingHiringDates,
    ...toFiltersResponse(session),
  };
}

export function toEmployeeRow(record: EmployeeRecord): EmployeeRow {
  return {
    employeeId: record.employeeId,
    department: record.department,
    age: record.age,
    gender: record.gender,
    attrition: record.attrition,
    salary: record.salary,
    yearsAtCompany: record.yearsAtCompany,
    performanceRating: record.performanceRating,
    hiringDate: formatHiringDate(record.hiringDate),
  };
}

export function toCharts(aggregates: DashboardAggregates): DashboardCharts {
  return {
    departmentDistribution: {
      chartType: "pie",
      title: CHART_TITLES.departmentDistribution,
      data: aggregates.departmentDistribution,
    },
    hiringTrend: {
      chartType: "line",
      title: CHART_TITLES.hiringTrend,
      xLabel: "Month",
      yLabel: "Number of Hires",
      data: aggregates.hiringTrend,
      missingHiringDates: aggregates.missingHiringDates,
    },
    attritionByDepartment: {
      chartType: "bar",
      title: CHART_TITLES.attritionByDepartment,
      data: aggregates.attritionByDepartment,
    },
    salaryByDepartment: {
      chartType: "box",
      title: CHART_TITLES.salaryByDepartment,
      data: aggregates.salaryByDepartment,
    },
  };
}

export function toDashboardResponse(
  selection: FilterSelection,
  pass: DashboardPassResult,
  showRawData: boolean
): DashboardResponse {
  if (pass.status === "empty") {
    return {
      status: "empty",
      selection: toSelectionBody(selection),
      totalRecords: pass.totalRecords,
      message: NO_DATA_MESSAGE,
    };
  }

  return {
    status: "ok",
    selection: toSelectionBody(selection),
    totalRecords: pass.totalRecords,
    kpis: formatKpis(pass.aggregates.kpis),
    charts: toCharts(pass.aggregates),
    ...(showRawData ? { table: pass.view.map(toEmployeeRow) } : {}),
  };
}
