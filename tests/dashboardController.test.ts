/**
 * Handler tests for the dataset and dashboard endpoints
 * Using Node.js built-in test runner with in-memory request/response fakes
 */
import { beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ApiErrorResponseSchema,
  DashboardResponseSchema,
  DatasetSummarySchema,
  FiltersResponseSchema,
  NO_DATA_MESSAGE,
  NO_DATASET_MESSAGE,
} from "../shared/contracts/dashboard.contract";
import {
  createDashboardController,
  type DashboardController,
  type DashboardRequest,
  type JsonResponse,
} from "../server/controllers/dashboardController";
import { MemDashboardSessionStore } from "../server/session/sessionStore";

// ============================================================================
// Fakes
// ============================================================================

class FakeResponse implements JsonResponse {
  statusCode = 200;
  body: unknown = undefined;
  ended = false;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  end(): this {
    this.ended = true;
    return this;
  }
}

function request(sessionID: string, init: { body?: unknown; query?: Record<string, unknown> } = {}): DashboardRequest {
  return { sessionID, body: init.body, query: init.query ?? {} };
}

const LOADED_AT = new Date("2024-05-01T09:00:00.000Z");

const STAFF_CSV = [
  "Employee ID,Department,Age,Gender,Attrition,Salary,Years at Company,Performance Rating,Hiring Date",
  "1,Sales,34,Female,Yes,52000,3,4,2021-03-15",
  "2,Engineering,41,Male,No,98000,8,3,2019-07-01",
  "3,Sales,29,Male,No,61000,2,2,not a date",
].join("\n");

let sessions: MemDashboardSessionStore;
let controller: DashboardController;

beforeEach(() => {
  sessions = new MemDashboardSessionStore();
  controller = createDashboardController({
    sessions,
    config: { sampleRowsMax: 500, validateApiContract: true },
    now: () => LOADED_AT,
  });
});

function call(
  handler: (req: DashboardRequest, res: JsonResponse) => unknown,
  req: DashboardRequest
): FakeResponse {
  const res = new FakeResponse();
  handler(req, res);
  return res;
}

function upload(sessionID = "s1", csv = STAFF_CSV): FakeResponse {
  return call(controller.uploadDataset, request(sessionID, { body: csv, query: { fileName: "staff.csv" } }));
}

function dashboard(sessionID = "s1", query: Record<string, unknown> = {}) {
  const res = call(controller.getDashboard, request(sessionID, { query }));
  assert.equal(res.statusCode, 200);
  return DashboardResponseSchema.parse(res.body);
}

function errorCode(res: FakeResponse): string | undefined {
  return ApiErrorResponseSchema.parse(res.body).code;
}

// ============================================================================
// Dataset
// ============================================================================

describe("dataset endpoints", () => {
  it("answers 404 before anything is loaded", () => {
    for (const handler of [controller.getDataset, controller.getFilters, controller.getDashboard]) {
      const res = call(handler, request("s1"));
      assert.equal(res.statusCode, 404);
      assert.deepEqual(res.body, {
        error: "No dataset loaded",
        message: NO_DATASET_MESSAGE,
        code: "NO_DATASET",
      });
    }
    assert.equal(sessions.size(), 0);
  });

  it("loads an upload and summarizes it", () => {
    const res = upload();
    assert.equal(res.statusCode, 201);
    assert.deepEqual(DatasetSummarySchema.parse(res.body), {
      source: "upload",
      fileName: "staff.csv",
      loadedAt: "2024-05-01T09:00:00.000Z",
      rowCount: 3,
      missingHiringDates: 1,
      options: {
        departments: ["Sales", "Engineering"],
        genders: ["Female", "Male"],
        attritionStatuses: ["Yes", "No"],
      },
      selection: { departments: ["Sales", "Engineering"], gender: null, attrition: null },
    });
  });

  it("rejects a body that is not text", () => {
    const res = call(controller.uploadDataset, request("s1", { body: { rows: [] } }));
    assert.equal(res.statusCode, 415);
    assert.equal(errorCode(res), "UNSUPPORTED_MEDIA_TYPE");
    assert.equal(sessions.size(), 0);
  });

  it("keeps the previous dataset and filters when an upload fails", () => {
    upload();
    call(controller.patchFilters, request("s1", { body: { gender: "Male" } }));

    const res = upload("s1", "Employee ID,Department\n1,Sales");
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.body, {
      error: "Dataset load failed",
      message:
        "Missing required columns: Age, Gender, Attrition, Salary, Years at Company, Performance Rating, Hiring Date",
      code: "DATASET_LOAD_ERROR",
    });

    const summary = DatasetSummarySchema.parse(call(controller.getDataset, request("s1")).body);
    assert.equal(summary.rowCount, 3);
    assert.equal(summary.selection.gender, "Male");
  });

  it("generates sample data and resets the selection", () => {
    upload();
    call(controller.patchFilters, request("s1", { body: { departments: ["Sales"] } }));

    const res = call(controller.loadSampleDataset, request("s1", { body: { rows: 50, seed: 5 } }));
    assert.equal(res.statusCode, 201);
    const summary = DatasetSummarySchema.parse(res.body);
    assert.equal(summary.source, "sample");
    assert.equal(summary.fileName, null);
    assert.equal(summary.rowCount, 50);
    assert.deepEqual(summary.selection.departments, summary.options.departments);
  });

  it("caps the sample size", () => {
    const res = call(controller.loadSampleDataset, request("s1", { body: { rows: 501 } }));
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.body, {
      error: "Invalid request",
      message: "rows must not exceed 500",
      code: "INVALID_REQUEST",
    });
  });

  it("validates the sample request body", () => {
    const res = call(controller.loadSampleDataset, request("s1", { body: { rows: "many" } }));
    assert.equal(res.statusCode, 400);
    assert.equal(errorCode(res), "INVALID_REQUEST");
  });

  it("marks the HTTP session once a dataset loads", () => {
    const failed: DashboardRequest = { ...request("s1", { body: "" }), session: {} };
    call(controller.uploadDataset, failed);
    assert.deepEqual(failed.session, {});

    const loaded: DashboardRequest = { ...request("s1", { body: STAFF_CSV }), session: {} };
    call(controller.uploadDataset, loaded);
    assert.deepEqual(loaded.session, { datasetLoadedAt: "2024-05-01T09:00:00.000Z" });

    const cleared: DashboardRequest = { ...request("s1"), session: { datasetLoadedAt: "2024-05-01T09:00:00.000Z" } };
    call(controller.clearDataset, cleared);
    assert.equal(cleared.session?.datasetLoadedAt, undefined);
  });

  it("clears the dataset", () => {
    upload();
    const res = call(controller.clearDataset, request("s1"));
    assert.equal(res.statusCode, 204);
    assert.equal(res.ended, true);
    assert.equal(call(controller.getDataset, request("s1")).statusCode, 404);
  });

  it("keeps sessions apart", () => {
    upload("s1");
    call(controller.loadSampleDataset, request("s2", { body: { rows: 10 } }));
    call(controller.patchFilters, request("s2", { body: { departments: [] } }));

    assert.equal(dashboard("s1").status, "ok");
    assert.equal(dashboard("s2").status, "empty");
  });
});

// ============================================================================
// Filters
// ============================================================================

describe("filter endpoints", () => {
  it("replaces, patches and resets the selection", () => {
    upload();

    let res = call(
      controller.replaceFilters,
      request("s1", { body: { departments: ["Sales"], gender: "Female", attrition: null } })
    );
    assert.equal(res.statusCode, 200);
    assert.deepEqual(FiltersResponseSchema.parse(res.body).selection, {
      departments: ["Sales"],
      gender: "Female",
      attrition: null,
    });

    res = call(controller.patchFilters, request("s1", { body: { attrition: "Yes" } }));
    assert.deepEqual(FiltersResponseSchema.parse(res.body).selection, {
      departments: ["Sales"],
      gender: "Female",
      attrition: "Yes",
    });

    res = call(controller.resetFilters, request("s1"));
    assert.deepEqual(FiltersResponseSchema.parse(res.body).selection, {
      departments: ["Sales", "Engineering"],
      gender: null,
      attrition: null,
    });
  });

  it("rejects values missing from the dataset", () => {
    upload();
    const res = call(controller.patchFilters, request("s1", { body: { departments: ["Legal"], gender: "Other" } }));
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.body, {
      error: "Invalid filter selection",
      message: 'Unknown department "Legal"; Unknown gender "Other"',
      code: "INVALID_FILTER_SELECTION",
    });
  });

  it("rejects a malformed selection", () => {
    upload();
    const res = call(controller.replaceFilters, request("s1", { body: { departments: "Sales" } }));
    assert.equal(res.statusCode, 400);
    assert.equal(errorCode(res), "INVALID_REQUEST");
  });
});

// ============================================================================
// Dashboard
// ============================================================================

describe("GET /api/dashboard", () => {
  it("returns formatted KPIs and chart series", () => {
    upload();
    const response = dashboard();
    assert.equal(response.status, "ok");
    if (response.status !== "ok") return;

    assert.equal(response.totalRecords, 3);
    assert.equal(response.kpis.totalEmployees.display, "3");
    assert.equal(response.kpis.attritionRate.display, "33.33%");
    assert.equal(response.kpis.averageSalary.display, "$70,333.33");
    assert.equal(response.kpis.averageYearsAtCompany.display, "4.33");
    assert.equal(response.kpis.attritedCount, 1);

    assert.deepEqual(response.charts.departmentDistribution.data, [
      { department: "Sales", count: 2 },
      { department: "Engineering", count: 1 },
    ]);
    assert.deepEqual(response.charts.hiringTrend.data, [
      { month: "2019-07", count: 1 },
      { month: "2021-03", count: 1 },
    ]);
    assert.equal(response.charts.hiringTrend.missingHiringDates, 1);
    assert.deepEqual(response.charts.attritionByDepartment.data, [{ department: "Sales", count: 1 }]);
    assert.deepEqual(response.charts.salaryByDepartment.data[0], {
      department: "Sales",
      values: [52000, 61000],
      min: 52000,
      q1: 54250,
      median: 56500,
      q3: 58750,
      max: 61000,
    });
    assert.equal(response.table, undefined);
  });

  it("adds the filtered table on request", () => {
    upload();
    call(controller.patchFilters, request("s1", { body: { departments: ["Sales"] } }));

    const response = dashboard("s1", { showRawData: "true" });
    assert.equal(response.status, "ok");
    if (response.status !== "ok") return;

    assert.deepEqual(response.table, [
      {
        employeeId: 1,
        department: "Sales",
        age: 34,
        gender: "Female",
        attrition: "Yes",
        salary: 52000,
        yearsAtCompany: 3,
        performanceRating: 4,
        hiringDate: "2021-03-15",
      },
      {
        employeeId: 3,
        department: "Sales",
        age: 29,
        gender: "Male",
        attrition: "No",
        salary: 61000,
        yearsAtCompany: 2,
        performanceRating: 2,
        hiringDate: null,
      },
    ]);
  });

  it("reports the no-data state instead of failing", () => {
    upload();
    call(controller.patchFilters, request("s1", { body: { departments: ["Engineering"], attrition: "Yes" } }));

    assert.deepEqual(dashboard(), {
      status: "empty",
      selection: { departments: ["Engineering"], gender: null, attrition: "Yes" },
      totalRecords: 3,
      message: NO_DATA_MESSAGE,
    });
  });

  it("rejects an unknown showRawData value", () => {
    upload();
    const res = call(controller.getDashboard, request("s1", { query: { showRawData: "yes" } }));
    assert.equal(res.statusCode, 400);
    assert.equal(errorCode(res), "INVALID_REQUEST");
  });
});
