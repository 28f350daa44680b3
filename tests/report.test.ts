import { beforeAll, describe, expect, it } from "vitest";
import chalk from "chalk";
import { aggregateOutcomes, hasFailures, ReportAccumulator } from "../src/report.js";
import {
  displayPath,
  formatDuration,
  formatOutcomeLine,
  formatSummary,
  sanitizeForTerminal,
} from "../src/runner/reporting.js";
import type { TaskOutcome } from "../src/types.js";

const roots = { inputDir: "/photos", outputDir: "/export" };

const outcomes: TaskOutcome[] = [
  { status: "succeeded", sourcePath: "/photos/a.jpg", outputPath: "/export/a.webp" },
  {
    status: "skipped",
    sourcePath: "/photos/b.jpg",
    destinationPath: "/export/b.webp",
    reason: "already exists",
  },
  { status: "failed", sourcePath: "/photos/sub/c.png", reason: "invalid argument" },
  { status: "unrecognized-codec", sourcePath: "/photos/d.gif", codec: "gif" },
  { status: "succeeded", sourcePath: "/photos/e.png", outputPath: "/export/e.webp" },
];

beforeAll(() => {
  chalk.level = 0;
});

describe("aggregateOutcomes", () => {
  it("buckets every outcome exactly once", () => {
    const report = aggregateOutcomes(outcomes, 1500);

    expect(report.counts).toEqual({
      discovered: 5,
      succeeded: 2,
      skipped: 1,
      failed: 1,
      unrecognized: 1,
    });
    expect(report.succeeded.map((o) => o.sourcePath)).toEqual(["/photos/a.jpg", "/photos/e.png"]);
    expect(report.skipped[0].reason).toBe("already exists");
    expect(report.failed[0].reason).toBe("invalid argument");
    expect(report.unrecognized[0].codec).toBe("gif");
    expect(report.durationMs).toBe(1500);
    expect(hasFailures(report)).toBe(true);
  });

  it("produces an empty report for no outcomes", () => {
    const report = aggregateOutcomes([]);
    expect(report.counts.discovered).toBe(0);
    expect(hasFailures(report)).toBe(false);
  });
});

describe("ReportAccumulator", () => {
  it("matches the pure fold", () => {
    const accumulator = new ReportAccumulator();
    for (const outcome of outcomes) accumulator.add(outcome);

    expect(accumulator.size).toBe(5);
    expect(accumulator.finalize(1500)).toEqual(aggregateOutcomes(outcomes, 1500));
  });

  it("rejects a second outcome for the same source", () => {
    const accumulator = new ReportAccumulator();
    accumulator.add(outcomes[0]);
    expect(() => accumulator.add(outcomes[0])).toThrow("Duplicate outcome for /photos/a.jpg");
  });

  it("rejects outcomes after finalize", () => {
    const accumulator = new ReportAccumulator();
    accumulator.finalize(0);
    expect(() => accumulator.add(outcomes[0])).toThrow(
      "Outcome for /photos/a.jpg arrived after the report was finalized"
    );
  });
});

describe("terminal formatting", () => {
  it("escapes control characters", () => {
    expect(sanitizeForTerminal("a\nb\tc\u001b")).toBe("a\\nb\\tc\\x1b");
  });

  it("shows paths relative to their root", () => {
    expect(displayPath("/photos/sub/c.png", "/photos")).toBe("sub/c.png");
    expect(displayPath("/elsewhere/c.png", "/photos")).toBe("/elsewhere/c.png");
  });

  it("formats durations in seconds", () => {
    expect(formatDuration(1234)).toBe("1.2s");
  });

  it("formats one line per outcome status", () => {
    const progress = { completed: 3, discovered: 5 };

    expect(formatOutcomeLine(outcomes[0], progress, roots)).toBe("  [3/5] ✓ a.jpg → a.webp");
    expect(formatOutcomeLine(outcomes[1], progress, roots)).toBe("  [3/5] ○ b.jpg (already exists)");
    expect(formatOutcomeLine(outcomes[2], progress, roots)).toBe(
      "  [3/5] ✗ sub/c.png — invalid argument"
    );
    expect(formatOutcomeLine(outcomes[3], progress, roots)).toBe(
      "  [3/5] ? d.gif (unrecognized codec: gif)"
    );
  });

  it("lists non-converted files in the summary", () => {
    const lines = formatSummary(aggregateOutcomes(outcomes, 2000), roots);

    expect(lines).toEqual([
      "─".repeat(50),
      "Done in 2.0s",
      "  2 converted, 1 skipped, 1 failed, 1 unrecognized (of 5)",
      "",
      "Skipped files: 1",
      "  b.jpg - already exists",
      "",
      "Failed files: 1",
      "  sub/c.png - invalid argument",
      "",
      "Unrecognized codec: 1",
      "  d.gif - gif",
    ]);
  });

  it("confirms a clean run", () => {
    const lines = formatSummary(aggregateOutcomes([outcomes[0]], 100), roots);
    expect(lines.slice(-2)).toEqual(["", "All files were processed."]);
  });
});
