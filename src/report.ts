import type { RunReport, TaskOutcome } from "./types.js";

export function createEmptyReport(): RunReport {
  return {
    counts: {
      discovered: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      unrecognized: 0,
    },
    succeeded: [],
    skipped: [],
    failed: [],
    unrecognized: [],
    durationMs: 0,
  };
}

function addOutcome(report: RunReport, outcome: TaskOutcome): void {
  report.counts.discovered += 1;
  switch (outcome.status) {
    case "succeeded":
      report.succeeded.push(outcome);
      report.counts.succeeded += 1;
      return;
    case "skipped":
      report.skipped.push(outcome);
      report.counts.skipped += 1;
      return;
    case "failed":
      report.failed.push(outcome);
      report.counts.failed += 1;
      return;
    case "unrecognized-codec":
      report.unrecognized.push(outcome);
      report.counts.unrecognized += 1;
      return;
  }
}

/** Folds outcomes into buckets, keeping arrival order within each bucket. */
export function aggregateOutcomes(outcomes: Iterable<TaskOutcome>, durationMs = 0): RunReport {
  const report = createEmptyReport();
  for (const outcome of outcomes) {
    addOutcome(report, outcome);
  }
  report.durationMs = durationMs;
  return report;
}

/**
 * Collects outcomes from concurrently running tasks. Every task reports
 * exactly once; a second outcome for the same source is a scheduling bug.
 */
export class ReportAccumulator {
  private readonly report = createEmptyReport();
  private readonly seen = new Set<string>();
  private finalized = false;

  add(outcome: TaskOutcome): void {
    if (this.finalized) {
      throw new Error(`Outcome for ${outcome.sourcePath} arrived after the report was finalized`);
    }
    if (this.seen.has(outcome.sourcePath)) {
      throw new Error(`Duplicate outcome for ${outcome.sourcePath}`);
    }
    this.seen.add(outcome.sourcePath);
    addOutcome(this.report, outcome);
  }

  get size(): number {
    return this.report.counts.discovered;
  }

  finalize(durationMs: number): RunReport {
    this.finalized = true;
    this.report.durationMs = durationMs;
    return this.report;
  }
}

export function hasFailures(report: RunReport): boolean {
  return report.counts.failed > 0;
}
