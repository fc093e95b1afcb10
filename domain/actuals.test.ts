import { describe, expect, it } from "vitest";
import { ActualsAccumulator, actualsWindows, collectActuals } from "./actuals.js";
import type { DateKey } from "./calendar.js";
import type { TimesheetSource } from "./repositories.js";

/** Job 101: 14h in January 2025, 4h in February. Job 102 is never asked for. */
const ENTRIES = [
  { id: 1, userId: 1, jobcodeId: 101, durationSeconds: 8 * 3600, date: "2025-01-06" },
  { id: 2, userId: 2, jobcodeId: 101, durationSeconds: 6 * 3600, date: "2025-01-07" },
  { id: 3, userId: 1, jobcodeId: 101, durationSeconds: 4 * 3600, date: "2025-02-03" },
  { id: 4, userId: 3, jobcodeId: 102, durationSeconds: 8 * 3600, date: "2025-02-04" },
];

function recordingSource() {
  const calls: Array<{ startDate: DateKey; endDate: DateKey; jobcodeIds: number[] }> = [];
  const source: TimesheetSource = {
    fetchJobCodes: async () => new Map(),
    fetchUsers: async () => new Map(),
    fetchTimesheets: async (startDate, endDate, jobcodeIds) => {
      calls.push({ startDate, endDate, jobcodeIds: [...jobcodeIds] });
      return ENTRIES.filter(
        (e) => e.date >= startDate && e.date <= endDate && jobcodeIds.includes(e.jobcodeId)
      );
    },
  };
  return { source, calls };
}

describe("actualsWindows", () => {
  it("clips the first and last month to PoP start and query stop", () => {
    expect(actualsWindows("2025-01-16", "2025-03-10")).toEqual([
      { month: "2025-01", start: "2025-01-16", end: "2025-01-31" },
      { month: "2025-02", start: "2025-02-01", end: "2025-02-28" },
      { month: "2025-03", start: "2025-03-01", end: "2025-03-10" },
    ]);
  });

  it("single month", () => {
    expect(actualsWindows("2025-02-03", "2025-02-07")).toEqual([
      { month: "2025-02", start: "2025-02-03", end: "2025-02-07" },
    ]);
  });
});

describe("ActualsAccumulator", () => {
  it("sums hours per month and collects users", () => {
    const acc = new ActualsAccumulator();
    acc.add("2025-01", [
      { id: 1, userId: 7, jobcodeId: 1, durationSeconds: 5400 },
      { id: 2, userId: 8, jobcodeId: 1, durationSeconds: 3600 },
    ]);
    acc.add("2025-01", [{ id: 3, userId: 7, jobcodeId: 1, durationSeconds: 1800 }]);
    acc.add("2025-02", []);
    const actuals = acc.toActuals();
    expect([...actuals.hoursByMonth]).toEqual([
      ["2025-01", 3],
      ["2025-02", 0],
    ]);
    expect([...actuals.userIds].sort()).toEqual([7, 8]);
  });
});

describe("collectActuals", () => {
  it("fetches one window per month for the job", async () => {
    const { source, calls } = recordingSource();
    const actuals = await collectActuals(source, 101, "2025-01-01", "2025-02-28");
    expect([...actuals.hoursByMonth]).toEqual([
      ["2025-01", 14],
      ["2025-02", 4],
    ]);
    expect([...actuals.userIds].sort()).toEqual([1, 2]);
    expect(calls).toEqual([
      { startDate: "2025-01-01", endDate: "2025-01-31", jobcodeIds: [101] },
      { startDate: "2025-02-01", endDate: "2025-02-28", jobcodeIds: [101] },
    ]);
  });

  it("an aborted signal stops before the first fetch", async () => {
    const { source, calls } = recordingSource();
    const controller = new AbortController();
    controller.abort();
    await expect(
      collectActuals(source, 101, "2025-01-01", "2025-02-28", controller.signal)
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(calls).toHaveLength(0);
  });
});
