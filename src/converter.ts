import { promises as fsp } from "fs";
import { processDiagnostic, runProcess } from "./process.js";
import type { ProcessRunner } from "./process.js";
import type { CodecProbe } from "./probe.js";
import { TARGET_FORMAT } from "./shared.js";
import type { ConversionTask } from "./types.js";

export interface ConversionRequest {
  sourcePath: string;
  destinationPath: string;
  quality: number;
  lossless: boolean;
  /** Read the source through the APNG decoder so every frame is kept. */
  animatedApng: boolean;
  signal?: AbortSignal;
}

export type ConversionResult = { ok: true } | { ok: false; reason: string };

export interface ImageConverter {
  convert(request: ConversionRequest): Promise<ConversionResult>;
}

export type InvocationResult = { ok: true; outputPath: string } | { ok: false; reason: string };

export interface InvocationCollaborators {
  converter: ImageConverter;
  probe: CodecProbe;
  animatedApng: boolean;
  signal?: AbortSignal;
}

// Fixed encoder profile; only quality and lossless vary per run.
const WEBP_DEFINES = [
  "webp:alpha-compression=1",
  "webp:alpha-filtering=2",
  "webp:alpha-quality=100",
  "webp:auto-filter=true",
  "webp:filter-sharpness=4",
  "webp:filter-strength=50",
  "webp:filter-type=1",
  "webp:method=6",
  // 1 = segment-smooth
  "webp:preprocessing=1",
  "webp:partitions=3",
  "webp:partition-limit=0",
  "webp:pass=10",
  "webp:segment=4",
  "webp:sns-strength=80",
  "webp:thread-level=1",
  "webp:use-sharp-yuv=true",
];

export function buildMagickArgs(request: ConversionRequest): string[] {
  const input = request.animatedApng ? `apng:${request.sourcePath}` : request.sourcePath;
  const args = [input, "-auto-orient", "-coalesce", "-strip", "-quality", request.quality.toString()];
  for (const define of WEBP_DEFINES) {
    args.push("-define", define);
  }
  args.push("-define", `webp:lossless=${request.lossless ? "true" : "false"}`);
  args.push(request.destinationPath);
  return args;
}

export interface MagickOptions {
  command?: string;
  run?: ProcessRunner;
}

export class MagickConverter implements ImageConverter {
  private readonly command: string;
  private readonly run: ProcessRunner;

  constructor(options: MagickOptions = {}) {
    this.command = options.command ?? "magick";
    this.run = options.run ?? runProcess;
  }

  async convert(request: ConversionRequest): Promise<ConversionResult> {
    const result = await this.run({
      command: this.command,
      args: buildMagickArgs(request),
      signal: request.signal,
    });
    if (result.exitCode !== 0) {
      return { ok: false, reason: processDiagnostic(result) };
    }
    return { ok: true };
  }
}

async function discardOutput(destinationPath: string): Promise<void> {
  await fsp.rm(destinationPath, { force: true });
}

/**
 * One conversion attempt for `task` into `destinationPath`, followed by a
 * re-probe of the written file. A zero exit is not trusted on its own: the
 * output must probe as WebP. Whatever was written is removed on failure.
 */
export async function convertAndVerify(
  task: ConversionTask,
  destinationPath: string,
  collaborators: InvocationCollaborators
): Promise<InvocationResult> {
  const { converter, probe, animatedApng, signal } = collaborators;

  let reason: string;
  try {
    const converted = await converter.convert({
      sourcePath: task.sourcePath,
      destinationPath,
      quality: task.quality,
      lossless: task.lossless,
      animatedApng,
      signal,
    });

    if (converted.ok) {
      const written = await probe.probe(destinationPath, signal);
      if (written.kind !== "probe-failed" && written.codec === TARGET_FORMAT) {
        return { ok: true, outputPath: destinationPath };
      }
      reason =
        written.kind === "probe-failed"
          ? `Output verification failed: ${written.reason}`
          : `Unrecognized output codec: ${written.codec}`;
    } else {
      reason = converted.reason;
    }
  } catch (err) {
    reason = err instanceof Error ? err.message : "unknown error";
  }

  try {
    await discardOutput(destinationPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    reason = `${reason} (could not remove partial output: ${message})`;
  }
  return { ok: false, reason };
}
