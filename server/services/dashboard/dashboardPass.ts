/**
 * One synchronous recomputation: filter, then aggregate.
 * An empty view short-circuits before the Aggregator runs.
 */

import { computeAggregates } from "./aggregator";
import { applyFilters, isEmptyView } from "./filterEngine";
import type { DashboardPassResult, FilterSelection, RecordSet } from "./dashboardTypes";

export function runDashboardPass(
  records: RecordSet,
  selection: FilterSelection
): DashboardPassResult {
  const view = applyFilters(records, selection);

  if (isEmptyView(view)) {
    return { status: "empty", totalRecords: records.length };
  }

  return {
    status: "ok",
    totalRecords: records.length,
    view,
    aggregates: computeAggregates(view),
  };
}
