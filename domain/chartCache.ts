/**
 * Last generated chart per job. Overwritten on the next successful
 * generation, emptied on refresh.
 */

import type { BurnChart } from "./chart.js";

export class ChartCache {
  private readonly byJob = new Map<number, BurnChart>();

  get(jobId: number): BurnChart | null {
    return this.byJob.get(jobId) ?? null;
  }

  set(chart: BurnChart): void {
    this.byJob.set(chart.jobId, chart);
  }

  has(jobId: number): boolean {
    return this.byJob.has(jobId);
  }

  /** Jobs that have a chart, ascending. */
  jobIds(): number[] {
    return [...this.byJob.keys()].sort((a, b) => a - b);
  }

  clear(): void {
    this.byJob.clear();
  }
}
