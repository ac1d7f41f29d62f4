/**
 * Dataset Loader - delimited text to a record set
 *
 * A load either installs a complete dataset or fails with DatasetLoadError.
 * Callers install the result only on success, so a failed upload leaves the
 * previously loaded dataset in place.
 *
 * Coercion:
 * - numeric columns must hold numbers (integers where the model says so)
 * - Hiring Date falls back to null when unparseable; that is not a failure
 * - extra columns are ignored
 */

import { parse } from "csv-parse/sync";
import {
  EMPLOYEE_COLUMNS,
  type EmployeeColumn,
  type EmployeeField,
  type EmployeeRecord,
  type LoadedDataset,
} from "@shared/employee";
import { parseHiringDate } from "./hiringDate";

// ============================================================================
// Errors
// ============================================================================

export class DatasetLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetLoadError";
    Object.setPrototypeOf(this, DatasetLoadError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Tab if the header has one, ";" for semicolon-only headers, "," otherwise.
 */
export function detectDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/, 1)[0] || "";
  if (firstLine.includes("\t")) return "\t";
  return firstLine.includes(";") && !firstLine.includes(",") ? ";" : ",";
}

function readRows(text: string, delimiter: string): string[][] {
  try {
    const rows: string[][] = parse(text, {
      bom: true,
      delimiter,
      skip_empty_lines: true,
      trim: true,
    });
    return rows;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetLoadError(`Error loading file: ${reason}`);
  }
}

type ColumnIndex = Record<EmployeeField, number>;

function resolveColumns(header: string[]): ColumnIndex {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    if (!positions.has(name)) positions.set(name, index);
  });

  const missing = Object.values(EMPLOYEE_COLUMNS).filter((column) => !positions.has(column));
  if (missing.length > 0) {
    throw new DatasetLoadError(`Missing required columns: ${missing.join(", ")}`);
  }

  const position = (field: EmployeeField): number => {
    const column = EMPLOYEE_COLUMNS[field];
    const found = positions.get(column);
    if (found === undefined) {
      throw new DatasetLoadError(`Missing required columns: ${column}`);
    }
    return found;
  };

  return {
    employeeId: position("employeeId"),
    department: position("department"),
    age: position("age"),
    gender: position("gender"),
    attrition: position("attrition"),
    salary: position("salary"),
    yearsAtCompany: position("yearsAtCompany"),
    performanceRating: position("performanceRating"),
    hiringDate: position("hiringDate"),
  };
}

function coerceNumber(
  raw: string,
  column: EmployeeColumn,
  rowNumber: number,
  integer: boolean
): number {
  const value = raw === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new DatasetLoadError(`Row ${rowNumber}: "${column}" is not a number ("${raw}")`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new DatasetLoadError(`Row ${rowNumber}: "${column}" must be a whole number ("${raw}")`);
  }
  return value;
}

function toRecord(row: string[], columns: ColumnIndex, rowNumber: number): EmployeeRecord {
  const cell = (field: EmployeeField): string => row[columns[field]] ?? "";
  const integer = (field: EmployeeField) =>
    coerceNumber(cell(field), EMPLOYEE_COLUMNS[field], rowNumber, true);

  return {
    employeeId: integer("employeeId"),
    department: cell("department"),
    age: integer("age"),
    gender: cell("gender"),
    attrition: cell("attrition"),
    salary: coerceNumber(cell("salary"), EMPLOYEE_COLUMNS.salary, rowNumber, false),
    yearsAtCompany: integer("yearsAtCompany"),
    performanceRating: integer("performanceRating"),
    hiringDate: parseHiringDate(cell("hiringDate")),
  };
}

// ============================================================================
// Main Entry
// ============================================================================

export interface ParseEmployeeCsvOptions {
  fileName?: string | null;
  /** Load timestamp (defaults to now) */
  loadedAt?: Date;
}

/**
 * Parses an uploaded employee file.
 *
 * A header-only file loads as an empty dataset; every filter then yields
 * the "no data" state.
 *
 * @throws DatasetLoadError on empty input, malformed rows, missing columns
 *         or values that cannot be coerced
 */
export function parseEmployeeCsv(
  text: string,
  options: ParseEmployeeCsvOptions = {}
): LoadedDataset {
  if (text.trim() === "") {
    throw new DatasetLoadError("Error loading file: the file is empty");
  }

  const rows = readRows(text, detectDelimiter(text));
  const [header, ...body] = rows;
  if (!header) {
    throw new DatasetLoadError("Error loading file: no header row found");
  }

  const columns = resolveColumns(header);
  const records = body.map((row, index) => toRecord(row, columns, index + 1));

  return {
    source: "upload",
    fileName: options.fileName ?? null,
    loadedAt: options.loadedAt ?? new Date(),
    records,
    missingHiringDates: records.filter((record) => record.hiringDate === null).length,
  };
}
