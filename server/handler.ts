/**
 * Pure HTTP request handler. No server/listen.
 * Injected deps for testability. No domain imports node:http.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { dateKeyFromDate, type DateKey } from "../domain/calendar.js";
import {
  decodeCeilingReleases,
  encodeCeilingRecord,
  saveReleases,
  type CeilingRecord,
} from "../domain/ceilingRecord.js";
import { generateChart, withCeiling } from "../domain/chart.js";
import type { ChartCache } from "../domain/chartCache.js";
import { classifyError, DomainError, ValidationError } from "../domain/errors.js";
import { buildJobTree, findJobNode } from "../domain/jobTree.js";
import type { CeilingRepo } from "../domain/repositories.js";
import { isValidPop, requireDateKey } from "../domain/validation.js";
import { apiError, httpErrorFor, type ErrorCode } from "./apiErrors.js";
import type { CachedTimesheetSource } from "./cachedTimesheetSource.js";
import type { Logger } from "./logger.js";

const API = "/api";

export interface HandlerDeps {
  timesheets: CachedTimesheetSource;
  ceilings: CeilingRepo;
  charts: ChartCache;
  clock: { now: () => number; timezone: string };
  logger: Logger;
  newId?: () => string;
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, statusCode: number, code: ErrorCode, message: string, details?: Record<string, unknown>): void {
  sendJson(res, statusCode, apiError(code, message, details));
}

/** Known domain errors become API errors; anything else propagates. */
function sendDomainError(res: ServerResponse, err: unknown): void {
  const kind = classifyError(err);
  if (kind == null || !(err instanceof DomainError)) throw err;
  const { status, code } = httpErrorFor(kind);
  sendError(res, status, code, err.message, err.metadata);
}

function getPathname(url: string | undefined, host: string | undefined): string {
  if (url === undefined) return "/";
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base).pathname;
  } catch {
    return "/";
  }
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer | string) => {
      body += typeof chunk === "string" ? chunk : chunk.toString();
    });
    req.on("end", () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new ValidationError("Invalid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function parseObjectBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const body = await parseBody(req);
  if (!isObject(body)) throw new ValidationError("Request body must be a JSON object");
  return body;
}

function optionalDate(body: Record<string, unknown>, field: string): DateKey | undefined {
  const value = body[field];
  return value == null ? undefined : requireDateKey(value, field);
}

function matchJob(pathname: string, suffix: string): number | null {
  const m = pathname.match(new RegExp(`^${API}/jobs/(\\d+)${suffix}$`));
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) ? id : null;
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createHandler(deps: HandlerDeps): RequestHandler {
  const newId = deps.newId ?? randomUUID;
  const today = (): DateKey => dateKeyFromDate(new Date(deps.clock.now()), deps.clock.timezone);

  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = getPathname(req.url, req.headers?.host);
    const method = req.method ?? "GET";

    // --- Health ---
    if (method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    try {
      // --- POST /api/refresh: drop cached job codes, users and charts ---
      if (method === "POST" && pathname === `${API}/refresh`) {
        deps.timesheets.invalidate();
        deps.charts.clear();
        sendJson(res, 200, { status: "ok" });
        return;
      }

      // --- GET /api/jobs ---
      if (method === "GET" && pathname === `${API}/jobs`) {
        const codes = await deps.timesheets.fetchJobCodes();
        sendJson(res, 200, buildJobTree(codes.values()));
        return;
      }

      // --- GET /api/jobs/:jobId ---
      const jobId = matchJob(pathname, "");
      if (method === "GET" && jobId != null) {
        const codes = await deps.timesheets.fetchJobCodes();
        const node = findJobNode(buildJobTree(codes.values()), jobId);
        if (!node) {
          sendError(res, 404, "NOT_FOUND", "Job not found", { jobId });
          return;
        }
        sendJson(res, 200, { ...node, hasChart: deps.charts.has(jobId) });
        return;
      }

      // --- GET /api/charts ---
      if (method === "GET" && pathname === `${API}/charts`) {
        sendJson(res, 200, { jobIds: deps.charts.jobIds() });
        return;
      }

      // --- GET /api/jobs/:jobId/ceiling ---
      const ceilingJobId = matchJob(pathname, "/ceiling");
      if (method === "GET" && ceilingJobId != null) {
        const record = await deps.ceilings.loadRecord(ceilingJobId);
        sendJson(res, 200, encodeCeilingRecord(record));
        return;
      }

      // --- PUT /api/jobs/:jobId/ceiling { popStart?, popEnd?, releases } ---
      if (method === "PUT" && ceilingJobId != null) {
        const body = await parseObjectBody(req);
        if (!Array.isArray(body.releases)) {
          sendError(res, 400, "INVALID_INPUT", "releases must be an array");
          return;
        }
        const releases = decodeCeilingReleases(body.releases, deps.clock.timezone, newId);

        let record: CeilingRecord;
        if ("popStart" in body || "popEnd" in body) {
          // A missing key keeps the stored date; null clears it.
          const requestedStart = optionalDate(body, "popStart");
          const requestedEnd = optionalDate(body, "popEnd");
          record = await deps.ceilings.updateRecord(ceilingJobId, (stored) => {
            const popStart = "popStart" in body ? requestedStart : stored.popStart;
            const popEnd = "popEnd" in body ? requestedEnd : stored.popEnd;
            if (popStart != null && popEnd != null && !isValidPop(popStart, popEnd)) {
              throw new ValidationError("PoP start is after PoP end", { popStart, popEnd });
            }
            return {
              ...(popStart != null && { popStart }),
              ...(popEnd != null && { popEnd }),
              releases,
            };
          });
        } else {
          record = await saveReleases(deps.ceilings, ceilingJobId, releases);
        }

        const cached = deps.charts.get(ceilingJobId);
        if (cached) deps.charts.set(withCeiling(cached, record.releases));

        sendJson(res, 200, encodeCeilingRecord(record));
        return;
      }

      // --- GET /api/jobs/:jobId/chart ---
      const chartJobId = matchJob(pathname, "/chart");
      if (method === "GET" && chartJobId != null) {
        const chart = deps.charts.get(chartJobId);
        if (!chart) {
          sendError(res, 404, "NOT_FOUND", "No chart generated for job", { jobId: chartJobId });
          return;
        }
        sendJson(res, 200, { chart });
        return;
      }

      // --- POST /api/jobs/:jobId/chart { queryStop, popStart?, popEnd? } ---
      if (method === "POST" && chartJobId != null) {
        const body = await parseObjectBody(req);
        const queryStop = requireDateKey(body.queryStop, "queryStop");
        const popStart = optionalDate(body, "popStart");
        const popEnd = optionalDate(body, "popEnd");

        const outcome = await generateChart(
          {
            jobId: chartJobId,
            queryStop,
            ...(popStart != null && { popStart }),
            ...(popEnd != null && { popEnd }),
          },
          { timesheets: deps.timesheets, ceilings: deps.ceilings, today }
        );

        if (!outcome.ok) {
          const { status, code } = httpErrorFor(outcome.error.kind);
          if (outcome.error.kind !== "validation") {
            deps.logger.warn(`Chart generation failed for job ${chartJobId}`, outcome.error);
          }
          sendError(res, status, code, outcome.error.message, outcome.error.details);
          return;
        }

        for (const w of outcome.warnings) deps.logger.warn(w, { jobId: chartJobId });
        deps.charts.set(outcome.chart);
        sendJson(res, 200, { chart: outcome.chart, warnings: outcome.warnings });
        return;
      }
    } catch (err) {
      sendDomainError(res, err);
      return;
    }

    sendError(res, 404, "NOT_FOUND", "Not Found");
  };
}
