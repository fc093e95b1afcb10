/**
 * File-backed CeilingRepo. One JSON record per job: job_<id>.json.
 * Reads the legacy bare-array shape; always writes the record shape.
 * Writes to the same job are serialized, each through its own temp file.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import {
  decodeCeilingRecord,
  encodeCeilingRecord,
  EMPTY_CEILING_RECORD,
  sortReleases,
  type CeilingRecord,
} from "../domain/ceilingRecord.js";
import { DomainError, PersistenceError } from "../domain/errors.js";
import type { CeilingRepo } from "../domain/repositories.js";
import { invariant } from "../domain/validation.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileCeilingRepo implements CeilingRepo {
  private readonly rootDir: string;
  private readonly timezone: string;
  private readonly writes = new Map<number, Promise<void>>();

  /** `timezone` floors timestamp dates written by older versions to a calendar day. */
  constructor(rootDir: string, timezone: string) {
    this.rootDir = rootDir;
    this.timezone = timezone;
  }

  recordPath(jobId: number): string {
    invariant(Number.isSafeInteger(jobId), "jobId must be an integer", { jobId });
    return path.join(this.rootDir, `job_${jobId}.json`);
  }

  async loadRecord(jobId: number): Promise<CeilingRecord> {
    const file = this.recordPath(jobId);

    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err: unknown) {
      const e = err as NodeJS.ErrnoException;
      if (e?.code === "ENOENT") return EMPTY_CEILING_RECORD;
      throw new PersistenceError(`Cannot read ceiling record for job ${jobId}`, {
        jobId,
        cause: errorMessage(err),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new PersistenceError(`Invalid JSON in ceiling record for job ${jobId}`, { jobId });
    }

    try {
      // Older files may lack ids; give them fresh ones on load.
      return decodeCeilingRecord(raw, this.timezone, randomUUID);
    } catch (err) {
      if (!(err instanceof DomainError)) throw err;
      throw new PersistenceError(`Malformed ceiling record for job ${jobId}: ${err.message}`, { jobId });
    }
  }

  saveRecord(jobId: number, record: CeilingRecord): Promise<void> {
    return this.withJobLock(jobId, () => this.writeRecord(jobId, record));
  }

  updateRecord(jobId: number, update: (current: CeilingRecord) => CeilingRecord): Promise<CeilingRecord> {
    return this.withJobLock(jobId, async () => {
      let current: CeilingRecord;
      try {
        current = await this.loadRecord(jobId);
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
        current = EMPTY_CEILING_RECORD;
      }
      const next = update(current);
      await this.writeRecord(jobId, next);
      return { ...next, releases: sortReleases(next.releases) };
    });
  }

  /** Writes to one job run one after another; a failed write does not block the next. */
  private withJobLock<T>(jobId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.writes.get(jobId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.writes.set(jobId, tail);
    void tail.then(() => {
      if (this.writes.get(jobId) === tail) this.writes.delete(jobId);
    });
    return run;
  }

  private async writeRecord(jobId: number, record: CeilingRecord): Promise<void> {
    const file = this.recordPath(jobId);
    const json = JSON.stringify(encodeCeilingRecord(record), null, 2);
    const tmp = `${file}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, json, "utf8");
      try {
        await fs.rename(tmp, file);
      } catch (err) {
        await fs.rm(tmp, { force: true });
        throw err;
      }
    } catch (err) {
      throw new PersistenceError(`Cannot save ceiling record for job ${jobId}`, {
        jobId,
        cause: errorMessage(err),
      });
    }
  }
}
