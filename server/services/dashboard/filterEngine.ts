/**
 * Filter Engine
 *
 * A record passes iff ALL of:
 * - department is in the selected subset
 * - gender matches (or gender is unconstrained)
 * - attrition matches (or attrition is unconstrained)
 *
 * An empty department subset yields an empty view; there is no fallback to
 * "all departments".
 */

import type {
  EmployeeRecord,
  FilteredView,
  FilterOptionValues,
  FilterSelection,
  RecordSet,
} from "./dashboardTypes";

export function matchesSelection(
  record: EmployeeRecord,
  selection: FilterSelection,
  departments: ReadonlySet<string> = new Set(selection.departments)
): boolean {
  if (!departments.has(record.department)) return false;
  if (selection.gender !== null && record.gender !== selection.gender) return false;
  if (selection.attrition !== null && record.attrition !== selection.attrition) return false;
  return true;
}

/**
 * Restricts the record set to the current selection. Pure; keeps order.
 */
export function applyFilters(records: RecordSet, selection: FilterSelection): FilteredView {
  if (selection.departments.length === 0) return [];

  const departments = new Set(selection.departments);
  return records.filter((record) => matchesSelection(record, selection, departments));
}

export function isEmptyView(view: FilteredView): boolean {
  return view.length === 0;
}

/**
 * Distinct values per filter dimension, in first-seen order.
 */
export function deriveFilterOptions(records: RecordSet): FilterOptionValues {
  const departments = new Set<string>();
  const genders = new Set<string>();
  const attritionStatuses = new Set<string>();

  for (const record of records) {
    departments.add(record.department);
    genders.add(record.gender);
    attritionStatuses.add(record.attrition);
  }

  return {
    departments: [...departments],
    genders: [...genders],
    attritionStatuses: [...attritionStatuses],
  };
}

/**
 * Selection on first load: every department, nothing else constrained.
 */
export function createDefaultSelection(records: RecordSet): FilterSelection {
  return {
    departments: deriveFilterOptions(records).departments,
    gender: null,
    attrition: null,
  };
}

/**
 * Lists selected values that the options do not offer.
 */
export function findUnknownSelectionValues(
  selection: FilterSelection,
  options: FilterOptionValues
): string[] {
  const problems: string[] = [];

  const knownDepartments = new Set(options.departments);
  for (const department of selection.departments) {
    if (!knownDepartments.has(department)) {
      problems.push(`Unknown department "${department}"`);
    }
  }
  if (selection.gender !== null && !options.genders.includes(selection.gender)) {
    problems.push(`Unknown gender "${selection.gender}"`);
  }
  if (selection.attrition !== null && !options.attritionStatuses.includes(selection.attrition)) {
    problems.push(`Unknown attrition status "${selection.attrition}"`);
  }

  return problems;
}
