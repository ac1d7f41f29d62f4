/**
 * Employee model shared by the dataset loader, the dashboard pipeline and
 * the API contract.
 */

// ============================================================================
// Columns
// ============================================================================

/**
 * Header names of the tabular input, keyed by record field.
 * Uploaded files must carry every one of these columns.
 */
export const EMPLOYEE_COLUMNS = {
  employeeId: "Employee ID",
  department: "Department",
  age: "Age",
  gender: "Gender",
  attrition: "Attrition",
  salary: "Salary",
  yearsAtCompany: "Years at Company",
  performanceRating: "Performance Rating",
  hiringDate: "Hiring Date",
} as const;

export type EmployeeField = keyof typeof EMPLOYEE_COLUMNS;
export type EmployeeColumn = (typeof EMPLOYEE_COLUMNS)[EmployeeField];

export const ATTRITION_YES = "Yes";
export const ATTRITION_NO = "No";

// ============================================================================
// Record
// ============================================================================

export interface EmployeeRecord {
  employeeId: number;
  department: string;
  age: number;
  gender: string;
  /** "Yes" counts as attrited, anything else does not */
  attrition: string;
  salary: number;
  yearsAtCompany: number;
  performanceRating: number;
  /** null = unparseable or empty in the source */
  hiringDate: Date | null;
}

/**
 * Ordered record set; insertion order is upload/generation order.
 */
export type RecordSet = readonly EmployeeRecord[];

export const DATASET_SOURCES = ["upload", "sample"] as const;
export type DatasetSource = (typeof DATASET_SOURCES)[number];

export interface LoadedDataset {
  source: DatasetSource;
  fileName: string | null;
  loadedAt: Date;
  records: RecordSet;
  missingHiringDates: number;
}

export function isAttrited(record: EmployeeRecord): boolean {
  return record.attrition === ATTRITION_YES;
}
