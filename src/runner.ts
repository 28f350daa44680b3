import chalk from "chalk";
import { promises as fsp } from "fs";
import * as path from "path";
import { MagickConverter } from "./converter.js";
import { assertReadableRoot, DiscoveryError } from "./discovery.js";
import { FfprobeCodecProbe } from "./probe.js";
import type { ProcessRunner } from "./process.js";
import { hasFailures } from "./report.js";
import { assertToolsAvailable, MissingToolError, requiredTools } from "./runner/preflight.js";
import type { Engine } from "./runner/preflight.js";
import { displayPath, formatOutcomeLine, formatSummary } from "./runner/reporting.js";
import { runConversion } from "./scheduler.js";
import type { SchedulerCollaborators } from "./scheduler.js";
import { SharpCodecProbe, SharpConverter } from "./sharp-engine.js";
import type { RunReport } from "./types.js";

export interface RunOptions {
  version: string;
  inputDir: string;
  outputDir: string;
  quality: number;
  lossless: boolean;
  appendName: boolean;
  concurrency: number;
  engine: Engine;
  ffprobePath: string;
  magickPath: string;
  json: boolean;
  verbose: boolean;
  quiet: boolean;
  signal?: AbortSignal;
}

export interface RunnerError {
  code: string;
  message: string;
  file?: string;
}

export interface RunDocument {
  version: string;
  inputDir: string;
  outputDir: string;
  options: {
    quality: number;
    lossless: boolean;
    appendName: boolean;
    concurrency: number;
    engine: Engine;
  };
  report: RunReport | null;
  errors: RunnerError[];
}

export interface RunResult {
  exitCode: number;
  document: RunDocument;
}

export interface RunnerDependencies {
  /** Replaces the engine's probe and converter. */
  collaborators?: SchedulerCollaborators;
  /** Process runner for the external tools, used by preflight and the magick engine. */
  run?: ProcessRunner;
}

export function createCollaborators(
  options: Pick<RunOptions, "engine" | "ffprobePath" | "magickPath">,
  run?: ProcessRunner
): SchedulerCollaborators {
  if (options.engine === "sharp") {
    return { probe: new SharpCodecProbe(), converter: new SharpConverter() };
  }
  return {
    probe: new FfprobeCodecProbe({ command: options.ffprobePath, run }),
    converter: new MagickConverter({ command: options.magickPath, run }),
  };
}

export async function runWebpMirror(
  options: RunOptions,
  dependencies: RunnerDependencies = {}
): Promise<RunResult> {
  const inputDir = path.resolve(options.inputDir);
  const outputDir = path.resolve(options.outputDir);
  const document: RunDocument = {
    version: options.version,
    inputDir,
    outputDir,
    options: {
      quality: options.quality,
      lossless: options.lossless,
      appendName: options.appendName,
      concurrency: options.concurrency,
      engine: options.engine,
    },
    report: null,
    errors: [],
  };

  const printInfo = (message: string) => {
    if (!options.json) {
      console.log(message);
    }
  };

  const printError = (message: string) => {
    if (!options.json) {
      console.error(message);
    }
  };

  const fail = (code: string, message: string): RunResult => {
    document.errors.push({ code, message });
    printError(chalk.red(message));
    return { exitCode: 1, document };
  };

  const tools = dependencies.collaborators ? [] : requiredTools(options.engine, options);
  try {
    await assertToolsAvailable(tools, dependencies.run);
  } catch (err) {
    if (err instanceof MissingToolError) {
      const result = fail("MISSING_TOOLS", err.message);
      printError(chalk.yellow("Please install:"));
      for (const tool of err.missing) {
        printError(chalk.yellow(`- ${tool.install}`));
      }
      return result;
    }
    throw err;
  }

  try {
    await assertReadableRoot(inputDir);
  } catch (err) {
    if (err instanceof DiscoveryError) {
      return fail(err.code, err.message);
    }
    throw err;
  }

  try {
    await fsp.mkdir(outputDir, { recursive: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    return fail("OUTPUT_NOT_WRITABLE", `Cannot create output directory ${outputDir}: ${message}`);
  }

  if (!options.json) {
    printInfo(chalk.bold(`\nwebpmirror v${options.version}\n`));
    printInfo(`Input:  ${chalk.dim(inputDir)}`);
    printInfo(`Output: ${chalk.dim(outputDir)}`);
    printInfo(
      `Quality: ${chalk.cyan(options.quality.toString())}  Lossless: ${options.lossless ? chalk.green("yes") : chalk.dim("no")}  Append name: ${options.appendName ? chalk.green("yes") : chalk.dim("no")}`
    );
    printInfo(`Concurrency: ${chalk.cyan(options.concurrency.toString())}\n`);
  }

  if (options.verbose && !options.json) {
    printInfo(chalk.dim(`Engine: ${options.engine}`));
    if (options.engine === "magick") {
      printInfo(chalk.dim(`ffprobe: ${options.ffprobePath}`));
      printInfo(chalk.dim(`magick: ${options.magickPath}`));
    }
  }

  const roots = { inputDir, outputDir };
  const collaborators =
    dependencies.collaborators ?? createCollaborators(options, dependencies.run);

  let report: RunReport;
  try {
    report = await runConversion(
      inputDir,
      outputDir,
      {
        quality: options.quality,
        lossless: options.lossless,
        appendName: options.appendName,
        concurrency: options.concurrency,
        signal: options.signal,
        onDiscoveryWarning: (warning) => {
          const message = `Skipping "${warning.path}" during discovery: ${warning.message}`;
          document.errors.push({ code: "DISCOVERY_WARNING", message, file: warning.path });
          printError(chalk.yellow(`Warning: ${message}`));
        },
        onTaskState: (task, state) => {
          if (options.verbose && !options.json && state === "converting") {
            printInfo(chalk.dim(`    converting ${displayPath(task.sourcePath, inputDir)}`));
          }
        },
        onOutcome: (outcome, progress) => {
          if (options.json) return;
          if (outcome.status === "failed") {
            console.error(formatOutcomeLine(outcome, progress, roots));
            return;
          }
          if (!options.quiet) {
            console.log(formatOutcomeLine(outcome, progress, roots));
          }
        },
      },
      collaborators
    );
  } catch (err) {
    if (err instanceof DiscoveryError) {
      return fail(err.code, err.message);
    }
    throw err;
  }

  document.report = report;
  for (const outcome of report.failed) {
    document.errors.push({
      code: "CONVERSION_FAILED",
      message: outcome.reason,
      file: outcome.sourcePath,
    });
  }

  if (report.counts.discovered === 0) {
    printInfo(chalk.yellow(`No images found in ${inputDir}`));
  } else if (!options.json) {
    printInfo("");
    for (const line of formatSummary(report, roots)) {
      printInfo(line);
    }
    printInfo("");
  }

  return { exitCode: hasFailures(report) ? 1 : 0, document };
}
