import * as path from "path";
import pLimit from "p-limit";
import { convertAndVerify } from "./converter.js";
import type { ImageConverter } from "./converter.js";
import { assertReadableRoot, discoverImages } from "./discovery.js";
import type { DiscoveryWarning } from "./discovery.js";
import { ensureParentDirectory, mirrorPath, OutputNameRegistry } from "./paths.js";
import type { CodecProbe } from "./probe.js";
import { ReportAccumulator } from "./report.js";
import type {
  ConversionSettings,
  ConversionTask,
  RunReport,
  TaskOutcome,
  TaskState,
} from "./types.js";

export const DEFAULT_QUALITY = 89;
export const DEFAULT_CONCURRENCY = 8;

export const DEFAULT_SETTINGS: Readonly<ConversionSettings> = {
  quality: DEFAULT_QUALITY,
  lossless: false,
  appendName: true,
};

export const CANCELLED_REASON = "cancelled";
export const ALREADY_EXISTS_REASON = "already exists";

export interface RunProgress {
  completed: number;
  discovered: number;
}

export interface SchedulerOptions extends ConversionSettings {
  concurrency: number;
  signal?: AbortSignal;
  onOutcome?: (outcome: TaskOutcome, progress: RunProgress) => void;
  onTaskState?: (task: ConversionTask, state: TaskState) => void;
  onDiscoveryWarning?: (warning: DiscoveryWarning) => void;
}

export interface SchedulerCollaborators {
  probe: CodecProbe;
  converter: ImageConverter;
  registry?: OutputNameRegistry;
}

function assertSettings(options: SchedulerOptions): void {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a positive integer, received ${options.concurrency.toString()}.`
    );
  }
  if (!Number.isInteger(options.quality) || options.quality < 1 || options.quality > 100) {
    throw new RangeError(
      `Quality must be an integer between 1 and 100, received ${options.quality.toString()}.`
    );
  }
}

/**
 * Converts every image under `inputRoot` into the mirrored tree under
 * `outputRoot`. At most `options.concurrency` tasks probe or convert at once;
 * every discovered file yields exactly one outcome in the returned report.
 * Only an unusable input root rejects the run.
 */
export async function runConversion(
  inputRoot: string,
  outputRoot: string,
  options: SchedulerOptions,
  collaborators: SchedulerCollaborators
): Promise<RunReport> {
  const startTime = Date.now();
  assertSettings(options);
  const resolvedInput = path.resolve(inputRoot);
  const resolvedOutput = path.resolve(outputRoot);
  await assertReadableRoot(resolvedInput);

  const { probe, converter } = collaborators;
  const registry = collaborators.registry ?? new OutputNameRegistry();
  const limiter = pLimit(options.concurrency);
  const accumulator = new ReportAccumulator();
  const signal = options.signal;
  let discovered = 0;

  const setState = (task: ConversionTask, state: TaskState) => {
    options.onTaskState?.(task, state);
  };

  const failed = (task: ConversionTask, reason: string): TaskOutcome => ({
    status: "failed",
    sourcePath: task.sourcePath,
    reason,
  });

  const skipped = (task: ConversionTask): TaskOutcome => ({
    status: "skipped",
    sourcePath: task.sourcePath,
    destinationPath: task.destinationPath,
    reason: ALREADY_EXISTS_REASON,
  });

  async function processTask(task: ConversionTask): Promise<TaskOutcome> {
    if (signal?.aborted) return failed(task, CANCELLED_REASON);

    // With numbering off an existing destination is final: skip before any work.
    if (!task.appendName && (await registry.existsOnDisk(task.destinationPath))) {
      return skipped(task);
    }

    setState(task, "probing");
    const classification = await probe.probe(task.sourcePath, signal);
    if (signal?.aborted) return failed(task, CANCELLED_REASON);

    switch (classification.kind) {
      case "probe-failed":
        return failed(task, classification.reason);
      case "unrecognized":
        return {
          status: "unrecognized-codec",
          sourcePath: task.sourcePath,
          codec: classification.codec,
        };
      case "still":
      case "animated-apng":
        break;
    }

    // A sibling from this run may have written the same name in the meantime.
    let destinationPath = task.destinationPath;
    if (task.appendName) {
      destinationPath = await registry.resolve(task.destinationPath, true);
    } else if (!(await registry.claim(task.destinationPath))) {
      return skipped(task);
    }

    let written = false;
    try {
      await ensureParentDirectory(destinationPath);

      setState(task, "converting");
      const result = await convertAndVerify(task, destinationPath, {
        converter,
        probe,
        animatedApng: classification.kind === "animated-apng",
        signal,
      });
      if (!result.ok) {
        return failed(task, signal?.aborted ? CANCELLED_REASON : result.reason);
      }
      written = true;
      return { status: "succeeded", sourcePath: task.sourcePath, outputPath: result.outputPath };
    } finally {
      if (written) {
        registry.commit(destinationPath);
      } else {
        registry.release(destinationPath);
      }
    }
  }

  async function runTask(task: ConversionTask): Promise<void> {
    let outcome: TaskOutcome;
    try {
      outcome = await processTask(task);
    } catch (err) {
      outcome = failed(task, err instanceof Error ? err.message : "unknown error");
    }
    accumulator.add(outcome);
    setState(task, outcome.status);
    options.onOutcome?.(outcome, { completed: accumulator.size, discovered });
  }

  const pending: Promise<void>[] = [];
  try {
    for await (const sourcePath of discoverImages(resolvedInput, {
      exclude: [resolvedOutput],
      onWarning: options.onDiscoveryWarning,
    })) {
      const task: ConversionTask = Object.freeze({
        sourcePath,
        destinationPath: mirrorPath(resolvedInput, resolvedOutput, sourcePath),
        quality: options.quality,
        lossless: options.lossless,
        appendName: options.appendName,
      });
      discovered += 1;
      setState(task, "pending");
      pending.push(limiter(() => runTask(task)));
    }
  } finally {
    await Promise.allSettled(pending);
  }

  await Promise.all(pending);
  return accumulator.finalize(Date.now() - startTime);
}
