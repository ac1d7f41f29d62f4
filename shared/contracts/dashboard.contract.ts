/**
 * HR Dashboard API Contract (v1.0)
 *
 * Single source of truth for:
 * - Backend: request parsing and response validation (DEV mode)
 * - Presentation layer: type safety + runtime parsing
 * - Tests: contract verification
 *
 * Endpoints:
 * - POST /api/dataset/upload, POST /api/dataset/sample, GET/DELETE /api/dataset
 * - GET/PUT/PATCH /api/dashboard/filters, POST /api/dashboard/filters/reset
 * - GET /api/dashboard
 */

import { z } from "zod";
import { DATASET_SOURCES } from "../employee";

export const NO_DATA_MESSAGE = "No data matches the selected filters.";
export const NO_DATASET_MESSAGE = "Upload a CSV file or use sample data to begin.";

// ============================================================================
// Enums
// ============================================================================

export const DatasetSourceEnum = z.enum(DATASET_SOURCES);

export const DashboardStatusEnum = z.enum(["ok", "empty"]);
export type DashboardStatus = z.infer<typeof DashboardStatusEnum>;

// ============================================================================
// Filters
// ============================================================================

/**
 * Filter selection on the wire.
 * gender/attrition: null means "All" (no constraint).
 */
export const FilterSelectionSchema = z.object({
  departments: z.array(z.string()),
  gender: z.string().nullable(),
  attrition: z.string().nullable(),
});
export type FilterSelectionBody = z.infer<typeof FilterSelectionSchema>;

/**
 * PATCH body - only the given dimensions change
 */
export const FilterSelectionPatchSchema = FilterSelectionSchema.partial();
export type FilterSelectionPatchBody = z.infer<typeof FilterSelectionPatchSchema>;

/**
 * Values present in the loaded dataset, first-seen order
 */
export const FilterOptionsSchema = z.object({
  departments: z.array(z.string()),
  genders: z.array(z.string()),
  attritionStatuses: z.array(z.string()),
});
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;

export const FiltersResponseSchema = z.object({
  options: FilterOptionsSchema,
  selection: FilterSelectionSchema,
});
export type FiltersResponse = z.infer<typeof FiltersResponseSchema>;

// ============================================================================
// Dataset
// ============================================================================

export const SampleDatasetRequestSchema = z.object({
  /** Number of generated records (default 200) */
  rows: z.number().int().positive().optional(),
  /** PRNG seed (default 42) */
  seed: z.number().int().optional(),
});
export type SampleDatasetRequest = z.infer<typeof SampleDatasetRequestSchema>;

export const UploadQueryParamsSchema = z.object({
  fileName: z.string().min(1).max(255).optional(),
});

export const DatasetSummarySchema = z.object({
  source: DatasetSourceEnum,
  fileName: z.string().nullable(),
  /** ISO string */
  loadedAt: z.string(),
  rowCount: z.number().int().nonnegative(),
  /** Records whose hiring date could not be parsed */
  missingHiringDates: z.number().int().nonnegative(),
  options: FilterOptionsSchema,
  selection: FilterSelectionSchema,
});
export type DatasetSummary = z.infer<typeof DatasetSummarySchema>;

// ============================================================================
// Dashboard
// ============================================================================

export const DashboardQueryParamsSchema = z.object({
  /** "Show Raw Data" toggle */
  showRawData: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});
export type DashboardQueryParams = z.infer<typeof DashboardQueryParamsSchema>;

export const KpiValueSchema = z.object({
  label: z.string(),
  value: z.number(),
  display: z.string(),
});
export type KpiValue = z.infer<typeof KpiValueSchema>;

export const DashboardKpisSchema = z.object({
  totalEmployees: KpiValueSchema,
  /** value in percent; exact ratio in attritionRatio */
  attritionRate: KpiValueSchema,
  averageSalary: KpiValueSchema,
  averageYearsAtCompany: KpiValueSchema,
  attritionRatio: z.number(),
  attritedCount: z.number().int().nonnegative(),
});
export type DashboardKpis = z.infer<typeof DashboardKpisSchema>;

export const DepartmentCountSchema = z.object({
  department: z.string(),
  count: z.number().int().positive(),
});

export const MonthCountSchema = z.object({
  /** YYYY-MM */
  month: z.string().regex(/^\d{4}-\d{2}$/),
  count: z.number().int().positive(),
});

export const SalaryBoxSchema = z.object({
  department: z.string(),
  values: z.array(z.number()),
  min: z.number(),
  q1: z.number(),
  median: z.number(),
  q3: z.number(),
  max: z.number(),
});

export const DashboardChartsSchema = z.object({
  departmentDistribution: z.object({
    chartType: z.literal("pie"),
    title: z.string(),
    data: z.array(DepartmentCountSchema),
  }),
  hiringTrend: z.object({
    chartType: z.literal("line"),
    title: z.string(),
    xLabel: z.string(),
    yLabel: z.string(),
    data: z.array(MonthCountSchema),
    /** Records left out of the trend for lack of a hiring date */
    missingHiringDates: z.number().int().nonnegative(),
  }),
  attritionByDepartment: z.object({
    chartType: z.literal("bar"),
    title: z.string(),
    data: z.array(DepartmentCountSchema),
  }),
  salaryByDepartment: z.object({
    chartType: z.literal("box"),
    title: z.string(),
    data: z.array(SalaryBoxSchema),
  }),
});
export type DashboardCharts = z.infer<typeof DashboardChartsSchema>;

/**
 * Filtered row as shown in the raw data table.
 * hiringDate: yyyy-MM-dd or null
 */
export const EmployeeRowSchema = z.object({
  employeeId: z.number(),
  department: z.string(),
  age: z.number(),
  gender: z.string(),
  attrition: z.string(),
  salary: z.number(),
  yearsAtCompany: z.number(),
  performanceRating: z.number(),
  hiringDate: z.string().nullable(),
});
export type EmployeeRow = z.infer<typeof EmployeeRowSchema>;

export const DashboardEmptyResponseSchema = z.object({
  status: z.literal("empty"),
  selection: FilterSelectionSchema,
  totalRecords: z.number().int().nonnegative(),
  message: z.string(),
});

export const DashboardOkResponseSchema = z.object({
  status: z.literal("ok"),
  selection: FilterSelectionSchema,
  totalRecords: z.number().int().nonnegative(),
  kpis: DashboardKpisSchema,
  charts: DashboardChartsSchema,
  /** Only when showRawData=true */
  table: z.array(EmployeeRowSchema).optional(),
});

export const DashboardResponseSchema = z.discriminatedUnion("status", [
  DashboardOkResponseSchema,
  DashboardEmptyResponseSchema,
]);
export type DashboardResponse = z.infer<typeof DashboardResponseSchema>;

// ============================================================================
// Error Response Schema
// ============================================================================

export const ApiErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  code: z.string().optional(),
});
export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
