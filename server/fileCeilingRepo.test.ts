import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync, writeFileSync, mkdirSync, promises as fsPromises } from "node:fs";
import path from "node:path";
import os from "node:os";
import { FileCeilingRepo } from "./fileCeilingRepo.js";
import { saveReleases } from "../domain/ceilingRecord.js";
import { InvariantViolation, PersistenceError, ValidationError } from "../domain/errors.js";

const TZ = "America/New_York";

describe("FileCeilingRepo", () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = mkdtempSync(path.join(os.tmpdir(), "ceiling-"));
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  it("missing file → empty record", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    expect(await repo.loadRecord(42)).toEqual({ releases: [] });
  });

  it("save then load returns the record with releases sorted", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    await repo.saveRecord(5, {
      popStart: "2025-01-01",
      popEnd: "2025-12-31",
      releases: [
        { id: "b", date: "2025-03-01", hours: -10 },
        { id: "a", date: "2025-01-15", hours: 100, note: "base" },
      ],
    });
    expect(await repo.loadRecord(5)).toEqual({
      popStart: "2025-01-01",
      popEnd: "2025-12-31",
      releases: [
        { id: "a", date: "2025-01-15", hours: 100, note: "base" },
        { id: "b", date: "2025-03-01", hours: -10 },
      ],
    });
  });

  it("writes pretty JSON to job_<id>.json and leaves no temp file", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    await repo.saveRecord(5, { releases: [{ id: "a", date: "2025-01-15", hours: 1 }] });
    const file = path.join(rootDir, "job_5.json");
    expect(await fsPromises.readFile(file, "utf8")).toBe(
      JSON.stringify(
        { popStart: null, popEnd: null, releases: [{ id: "a", date: "2025-01-15", hours: 1, note: null }] },
        null,
        2
      )
    );
    expect(await fsPromises.readdir(rootDir)).toEqual(["job_5.json"]);
  });

  it("creates the directory on first save", async () => {
    const repo = new FileCeilingRepo(path.join(rootDir, "nested", "dir"), TZ);
    await repo.saveRecord(1, { releases: [] });
    expect(existsSync(path.join(rootDir, "nested", "dir", "job_1.json"))).toBe(true);
  });

  it("legacy bare-array file loads with generated ids and timestamps floored", async () => {
    writeFileSync(
      path.join(rootDir, "job_9.json"),
      JSON.stringify([{ date: "2025-03-01T03:00:00Z", hours: 12 }])
    );
    const repo = new FileCeilingRepo(rootDir, TZ);
    const record = await repo.loadRecord(9);
    expect(record.popStart).toBeUndefined();
    expect(record.releases).toHaveLength(1);
    expect(record.releases[0]).toMatchObject({ date: "2025-02-28", hours: 12 });
    expect(record.releases[0]?.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("invalid JSON → PersistenceError", async () => {
    writeFileSync(path.join(rootDir, "job_5.json"), "{ not json");
    const repo = new FileCeilingRepo(rootDir, TZ);
    await expect(repo.loadRecord(5)).rejects.toThrow("Invalid JSON in ceiling record for job 5");
  });

  it("malformed record → PersistenceError", async () => {
    writeFileSync(path.join(rootDir, "job_5.json"), JSON.stringify({ popStart: "2025-01-01" }));
    const repo = new FileCeilingRepo(rootDir, TZ);
    await expect(repo.loadRecord(5)).rejects.toThrow(
      "Malformed ceiling record for job 5: Ceiling record releases must be an array"
    );
  });

  it("unreadable path → PersistenceError", async () => {
    mkdirSync(path.join(rootDir, "job_7.json"));
    const repo = new FileCeilingRepo(rootDir, TZ);
    await expect(repo.loadRecord(7)).rejects.toBeInstanceOf(PersistenceError);
  });

  it("save failure → PersistenceError", async () => {
    writeFileSync(path.join(rootDir, "blocker"), "");
    const repo = new FileCeilingRepo(path.join(rootDir, "blocker", "sub"), TZ);
    await expect(repo.saveRecord(1, { releases: [] })).rejects.toThrow("Cannot save ceiling record for job 1");
  });

  it("malformed record with a repeated release id → PersistenceError", async () => {
    writeFileSync(
      path.join(rootDir, "job_5.json"),
      JSON.stringify({
        releases: [
          { id: "x", date: "2025-01-02", hours: 1 },
          { id: "x", date: "2025-01-03", hours: 2 },
        ],
      })
    );
    const repo = new FileCeilingRepo(rootDir, TZ);
    await expect(repo.loadRecord(5)).rejects.toThrow(
      "Malformed ceiling record for job 5: Duplicate ceiling release id: x"
    );
  });

  it("concurrent saves to one job all succeed; the last one wins", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    const saves = Array.from({ length: 20 }, (_, i) =>
      repo.saveRecord(1, { releases: [{ id: `r${i}`, date: "2025-01-02", hours: i }] })
    );
    const results = await Promise.allSettled(saves);
    expect(results.filter((r) => r.status === "rejected")).toEqual([]);
    expect(await fsPromises.readdir(rootDir)).toEqual(["job_1.json"]);
    expect(await repo.loadRecord(1)).toEqual({ releases: [{ id: "r19", date: "2025-01-02", hours: 19 }] });
  });

  it("a PoP update racing a release save keeps both", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    await Promise.all([
      repo.updateRecord(1, (current) => ({ ...current, popStart: "2025-01-01", popEnd: "2025-12-31" })),
      saveReleases(repo, 1, [{ id: "a", date: "2025-02-01", hours: 5 }]),
    ]);
    expect(await repo.loadRecord(1)).toEqual({
      popStart: "2025-01-01",
      popEnd: "2025-12-31",
      releases: [{ id: "a", date: "2025-02-01", hours: 5 }],
    });
  });

  it("updateRecord over a corrupt file starts from an empty record", async () => {
    writeFileSync(path.join(rootDir, "job_5.json"), "{ not json");
    const repo = new FileCeilingRepo(rootDir, TZ);
    const seen: unknown[] = [];
    const saved = await saveReleases(repo, 5, [{ id: "a", date: "2025-05-01", hours: 40 }]);
    await repo.updateRecord(5, (current) => {
      seen.push(current);
      return current;
    });
    expect(saved).toEqual({ releases: [{ id: "a", date: "2025-05-01", hours: 40 }] });
    expect(seen).toEqual([saved]);
  });

  it("a rejected update writes nothing and does not block the next write", async () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    await repo.saveRecord(2, { popStart: "2025-01-01", releases: [] });
    const failed = repo.updateRecord(2, () => {
      throw new ValidationError("PoP start is after PoP end");
    });
    const next = repo.saveRecord(2, { popStart: "2025-02-01", releases: [] });
    await expect(failed).rejects.toBeInstanceOf(ValidationError);
    await next;
    expect(await repo.loadRecord(2)).toEqual({ popStart: "2025-02-01", releases: [] });
  });

  it("recordPath rejects non-integer ids", () => {
    const repo = new FileCeilingRepo(rootDir, TZ);
    expect(() => repo.recordPath(1.5)).toThrow(InvariantViolation);
    expect(repo.recordPath(3)).toBe(path.join(rootDir, "job_3.json"));
  });
});
