import chalk from "chalk";
import * as path from "path";
import { toPosix } from "../paths.js";
import type { RunProgress } from "../scheduler.js";
import type { RunReport, TaskOutcome } from "../types.js";

export interface ReportRoots {
  inputDir: string;
  outputDir: string;
}

export function sanitizeForTerminal(value: string): string {
  let sanitized = "";
  for (const char of value) {
    if (char === "\n") {
      sanitized += "\\n";
      continue;
    }
    if (char === "\r") {
      sanitized += "\\r";
      continue;
    }
    if (char === "\t") {
      sanitized += "\\t";
      continue;
    }

    const code = char.charCodeAt(0);
    if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) {
      sanitized += `\\x${code.toString(16).padStart(2, "0")}`;
      continue;
    }

    sanitized += char;
  }
  return sanitized;
}

/** Path relative to `root` when it lies inside it, otherwise the full path. */
export function displayPath(targetPath: string, root: string): string {
  const relative = path.relative(root, targetPath);
  if (relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return sanitizeForTerminal(toPosix(relative));
  }
  return sanitizeForTerminal(toPosix(targetPath));
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatProgress(progress: RunProgress): string {
  return `[${progress.completed.toString()}/${progress.discovered.toString()}]`;
}

export function formatOutcomeLine(
  outcome: TaskOutcome,
  progress: RunProgress,
  roots: ReportRoots
): string {
  const counter = chalk.dim(formatProgress(progress));
  const source = displayPath(outcome.sourcePath, roots.inputDir);

  switch (outcome.status) {
    case "succeeded":
      return `  ${counter} ${chalk.green("✓")} ${source} → ${displayPath(outcome.outputPath, roots.outputDir)}`;
    case "skipped":
      return `  ${counter} ${chalk.dim("○")} ${chalk.dim(source)} ${chalk.dim(`(${outcome.reason})`)}`;
    case "unrecognized-codec":
      return `  ${counter} ${chalk.yellow("?")} ${source} ${chalk.yellow(`(unrecognized codec: ${sanitizeForTerminal(outcome.codec)})`)}`;
    case "failed":
      return `  ${counter} ${chalk.red("✗")} ${source} — ${chalk.red(sanitizeForTerminal(outcome.reason))}`;
  }
}

function listSection(title: string, lines: string[]): string[] {
  if (lines.length === 0) return [];
  return ["", `${title}: ${lines.length.toString()}`, ...lines];
}

export function formatSummary(report: RunReport, roots: ReportRoots): string[] {
  const { counts } = report;
  const lines = [
    chalk.dim("─".repeat(50)),
    `Done in ${chalk.bold(formatDuration(report.durationMs))}`,
    `  ${chalk.green(counts.succeeded.toString())} converted, ${chalk.dim(counts.skipped.toString())} skipped, ${
      counts.failed > 0 ? chalk.red(counts.failed.toString()) : counts.failed.toString()
    } failed, ${
      counts.unrecognized > 0 ? chalk.yellow(counts.unrecognized.toString()) : counts.unrecognized.toString()
    } unrecognized (of ${counts.discovered.toString()})`,
  ];

  lines.push(
    ...listSection(
      chalk.dim("Skipped files"),
      report.skipped.map(
        (outcome) => `  ${displayPath(outcome.sourcePath, roots.inputDir)} - ${outcome.reason}`
      )
    ),
    ...listSection(
      chalk.red("Failed files"),
      report.failed.map(
        (outcome) =>
          `  ${displayPath(outcome.sourcePath, roots.inputDir)} - ${sanitizeForTerminal(outcome.reason)}`
      )
    ),
    ...listSection(
      chalk.yellow("Unrecognized codec"),
      report.unrecognized.map(
        (outcome) =>
          `  ${displayPath(outcome.sourcePath, roots.inputDir)} - ${sanitizeForTerminal(outcome.codec)}`
      )
    )
  );

  if (counts.skipped === 0 && counts.failed === 0 && counts.unrecognized === 0) {
    lines.push("", chalk.green("All files were processed."));
  }
  return lines;
}
