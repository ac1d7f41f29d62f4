/**
 * Display strings for the four KPI cards.
 */

import type { DashboardKpis } from "@shared/contracts/dashboard.contract";
import type { KpiSummary } from "./dashboardTypes";

export const KPI_LABELS = {
  totalEmployees: "Total Employees",
  attritionRate: "Attrition Rate",
  averageSalary: "Average Salary",
  averageYearsAtCompany: "Avg. Years at Company",
} as const;

const integerFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

const twoDecimalFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 1234 -> "1,234" */
export function formatCount(value: number): string {
  return integerFormat.format(value);
}

/** 66.6666 -> "66.67%" */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/** 85000.5 -> "$85,000.50" */
export function formatCurrency(value: number): string {
  return `$${twoDecimalFormat.format(value)}`;
}

/** 7.254 -> "7.25" */
export function formatDecimal(value: number): string {
  return value.toFixed(2);
}

export function formatKpis(kpis: KpiSummary): DashboardKpis {
  return {
    totalEmployees: {
      label: KPI_LABELS.totalEmployees,
      value: kpis.totalCount,
      display: formatCount(kpis.totalCount),
    },
    attritionRate: {
      label: KPI_LABELS.attritionRate,
      value: kpis.attritionRatePercent,
      display: formatPercent(kpis.attritionRatePercent),
    },
    averageSalary: {
      label: KPI_LABELS.averageSalary,
      value: kpis.averageSalary,
      display: formatCurrency(kpis.averageSalary),
    },
    averageYearsAtCompany: {
      label: KPI_LABELS.averageYearsAtCompany,
      value: kpis.averageTenure,
      display: formatDecimal(kpis.averageTenure),
    },
    attritionRatio: kpis.attritionRatio,
    attritedCount: kpis.attritedCount,
  };
}
