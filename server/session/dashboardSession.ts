/**
 * Dashboard Session - the one piece of mutable state per user session
 *
 * Holds at most one loaded dataset plus its filter selection. Both are
 * replaced wholesale:
 * - load() swaps the dataset and resets the selection to defaults
 * - replaceSelection()/updateSelection() swap the selection
 *
 * Everything derived (options, view, aggregates) is recomputed on demand.
 */

import type { LoadedDataset } from "@shared/employee";
import {
  applyFilters,
  createDefaultSelection,
  deriveFilterOptions,
  findUnknownSelectionValues,
  runDashboardPass,
  type DashboardPassResult,
  type FilteredView,
  type FilterOptionValues,
  type FilterSelection,
  type FilterSelectionPatch,
} from "../services/dashboard";

// ============================================================================
// Errors
// ============================================================================

export class NoDatasetError extends Error {
  constructor(message = "No dataset loaded") {
    super(message);
    this.name = "NoDatasetError";
    Object.setPrototypeOf(this, NoDatasetError.prototype);
  }
}

export class FilterSelectionError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid filter selection: ${problems.join("; ")}`);
    this.name = "FilterSelectionError";
    Object.setPrototypeOf(this, FilterSelectionError.prototype);
  }
}

// ============================================================================
// Session
// ============================================================================

function copySelection(selection: FilterSelection): FilterSelection {
  return {
    departments: [...selection.departments],
    gender: selection.gender,
    attrition: selection.attrition,
  };
}

interface SessionState {
  dataset: LoadedDataset;
  options: FilterOptionValues;
  selection: FilterSelection;
}

export class DashboardSession {
  private state: SessionState | null = null;

  hasDataset(): boolean {
    return this.state !== null;
  }

  /**
   * Installs a new dataset. The previous one (and its selection) is dropped.
   */
  load(dataset: LoadedDataset): void {
    this.state = {
      dataset,
      options: deriveFilterOptions(dataset.records),
      selection: createDefaultSelection(dataset.records),
    };
  }

  clear(): void {
    this.state = null;
  }

  getDataset(): LoadedDataset {
    return this.requireState().dataset;
  }

  /**
   * Returns a copy; the session's selection changes only through its methods.
   */
  getSelection(): FilterSelection {
    return copySelection(this.requireState().selection);
  }

  filterOptions(): FilterOptionValues {
    const { options } = this.requireState();
    return {
      departments: [...options.departments],
      genders: [...options.genders],
      attritionStatuses: [...options.attritionStatuses],
    };
  }

  /**
   * @throws FilterSelectionError when a value is not present in the dataset
   */
  replaceSelection(selection: FilterSelection): FilterSelection {
    const state = this.requireState();
    const problems = findUnknownSelectionValues(selection, state.options);
    if (problems.length > 0) {
      throw new FilterSelectionError(problems);
    }

    state.selection = copySelection(selection);
    return copySelection(state.selection);
  }

  /**
   * Changes only the given dimensions.
   */
  updateSelection(patch: FilterSelectionPatch): FilterSelection {
    const current = this.getSelection();
    return this.replaceSelection({
      departments: patch.departments ?? current.departments,
      gender: patch.gender !== undefined ? patch.gender : current.gender,
      attrition: patch.attrition !== undefined ? patch.attrition : current.attrition,
    });
  }

  resetFilters(): FilterSelection {
    const state = this.requireState();
    state.selection = createDefaultSelection(state.dataset.records);
    return copySelection(state.selection);
  }

  currentView(): FilteredView {
    const state = this.requireState();
    return applyFilters(state.dataset.records, state.selection);
  }

  runPass(): DashboardPassResult {
    const state = this.requireState();
    return runDashboardPass(state.dataset.records, state.selection);
  }

  private requireState(): SessionState {
    if (!this.state) {
      throw new NoDatasetError();
    }
    return this.state;
  }
}
