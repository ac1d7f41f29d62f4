import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateSampleDataset, parseEmployeeCsv } from "../services/dataset";
import { DashboardSession, FilterSelectionError, NoDatasetError } from "./dashboardSession";
import { MemDashboardSessionStore } from "./sessionStore";

const STAFF_CSV = [
  "Employee ID,Department,Age,Gender,Attrition,Salary,Years at Company,Performance Rating,Hiring Date",
  "1,Sales,34,Female,Yes,52000,3,4,2021-03-15",
  "2,Engineering,41,Male,No,98000,8,3,2019-07-01",
  "3,Sales,29,Male,No,61000,2,2,2020-11-20",
].join("\n");

function loadedSession(): DashboardSession {
  const session = new DashboardSession();
  session.load(parseEmployeeCsv(STAFF_CSV));
  return session;
}

describe("DashboardSession", () => {
  it("throws NoDatasetError until a dataset is loaded", () => {
    const session = new DashboardSession();
    assert.equal(session.hasDataset(), false);
    assert.throws(() => session.getSelection(), NoDatasetError);
    assert.throws(() => session.runPass(), NoDatasetError);
    assert.throws(() => session.updateSelection({ gender: "Male" }), NoDatasetError);
  });

  it("starts with every department selected", () => {
    const session = loadedSession();
    assert.equal(session.hasDataset(), true);
    assert.deepEqual(session.getSelection(), {
      departments: ["Sales", "Engineering"],
      gender: null,
      attrition: null,
    });
    assert.deepEqual(session.filterOptions(), {
      departments: ["Sales", "Engineering"],
      genders: ["Female", "Male"],
      attritionStatuses: ["Yes", "No"],
    });
  });

  it("patches only the given dimensions", () => {
    const session = loadedSession();
    session.updateSelection({ gender: "Male" });
    session.updateSelection({ departments: ["Sales"] });
    assert.deepEqual(session.getSelection(), { departments: ["Sales"], gender: "Male", attrition: null });
    assert.deepEqual(
      session.currentView().map((record) => record.employeeId),
      [3]
    );

    session.updateSelection({ gender: null });
    assert.equal(session.getSelection().gender, null);
  });

  it("rejects unknown values and keeps the previous selection", () => {
    const session = loadedSession();
    assert.throws(
      () => session.replaceSelection({ departments: ["Legal"], gender: null, attrition: "Maybe" }),
      (error: unknown) => {
        assert.ok(error instanceof FilterSelectionError);
        assert.deepEqual(error.problems, ['Unknown department "Legal"', 'Unknown attrition status "Maybe"']);
        return true;
      }
    );
    assert.deepEqual(session.getSelection().departments, ["Sales", "Engineering"]);
  });

  it("copies the departments it is given", () => {
    const session = loadedSession();
    const departments = ["Engineering"];
    session.replaceSelection({ departments, gender: null, attrition: null });
    departments.push("Sales");
    assert.deepEqual(session.getSelection().departments, ["Engineering"]);
  });

  it("resets filters to the defaults", () => {
    const session = loadedSession();
    session.replaceSelection({ departments: [], gender: "Female", attrition: "Yes" });
    assert.equal(session.runPass().status, "empty");

    session.resetFilters();
    const pass = session.runPass();
    assert.equal(pass.status, "ok");
    if (pass.status !== "ok") return;
    assert.equal(pass.aggregates.kpis.totalCount, 3);
  });

  it("resets the selection when a new dataset is loaded", () => {
    const session = loadedSession();
    session.updateSelection({ departments: ["Engineering"], attrition: "No" });

    session.load(generateSampleDataset({ rows: 20, seed: 1 }, new Date(2024, 0, 1)));
    assert.equal(session.getDataset().source, "sample");
    assert.deepEqual(session.getSelection().departments, session.filterOptions().departments);
    assert.equal(session.getSelection().attrition, null);
  });

  it("hands out copies of its selection and options", () => {
    const session = loadedSession();
    const selection = session.getSelection();
    assert.notEqual(selection, session.getSelection());
    assert.notEqual(selection.departments, session.getSelection().departments);

    const options = session.filterOptions();
    options.departments.push("Legal");
    assert.deepEqual(session.filterOptions().departments, ["Sales", "Engineering"]);

    const returned = session.updateSelection({ gender: "Female" });
    assert.notEqual(returned, session.getSelection());
    assert.deepEqual(returned, session.getSelection());
  });

  it("forgets the dataset on clear", () => {
    const session = loadedSession();
    session.clear();
    assert.equal(session.hasDataset(), false);
    assert.throws(() => session.getDataset(), NoDatasetError);
  });
});

describe("MemDashboardSessionStore", () => {
  const HOUR = 60 * 60 * 1000;

  function createClock(start = 0) {
    let now = start;
    return {
      now: () => now,
      advance: (ms: number) => {
        now += ms;
      },
    };
  }

  it("keeps one session per id", () => {
    const store = new MemDashboardSessionStore();
    const a = store.getOrCreate("a");
    assert.equal(store.getOrCreate("a"), a);
    assert.notEqual(store.getOrCreate("b"), a);
    assert.equal(store.size(), 2);

    assert.equal(store.get("missing"), undefined);
    assert.equal(store.delete("a"), true);
    assert.equal(store.get("a"), undefined);
    assert.equal(store.size(), 1);
  });

  it("expires sessions idle for the full TTL", () => {
    const clock = createClock();
    const store = new MemDashboardSessionStore({ ttlMs: 24 * HOUR, now: clock.now });
    const stale = store.getOrCreate("stale");
    store.getOrCreate("active");

    clock.advance(20 * HOUR);
    assert.ok(store.get("active"));

    clock.advance(4 * HOUR);
    assert.equal(store.get("stale"), undefined);
    assert.notEqual(store.getOrCreate("stale"), stale);
    assert.ok(store.get("active"));
    assert.equal(store.size(), 2);

    clock.advance(24 * HOUR);
    assert.equal(store.size(), 0);
  });

  it("prunes expired entries when creating new ones", () => {
    const clock = createClock();
    const store = new MemDashboardSessionStore({ ttlMs: HOUR, now: clock.now });
    for (let i = 0; i < 5; i++) store.getOrCreate(`old-${i}`);

    clock.advance(HOUR);
    store.getOrCreate("new");
    assert.equal(store.prune(), 0);
    assert.equal(store.size(), 1);
  });

  it("evicts the least recently used session beyond the cap", () => {
    const clock = createClock();
    const store = new MemDashboardSessionStore({ maxEntries: 3, now: clock.now });
    const first = store.getOrCreate("a");
    clock.advance(1);
    store.getOrCreate("b");
    clock.advance(1);
    store.getOrCreate("c");
    clock.advance(1);
    assert.equal(store.get("a"), first);

    clock.advance(1);
    store.getOrCreate("d");
    assert.equal(store.size(), 3);
    assert.equal(store.get("b"), undefined);
    assert.equal(store.get("a"), first);
    assert.ok(store.get("c"));
    assert.ok(store.get("d"));
  });

  it("stays bounded however many sessions are created", () => {
    const store = new MemDashboardSessionStore({ maxEntries: 10 });
    for (let i = 0; i < 100; i++) store.getOrCreate(`anonymous-${i}`);
    assert.equal(store.size(), 10);
    assert.ok(store.get("anonymous-99"));
    assert.equal(store.get("anonymous-0"), undefined);
  });
});
