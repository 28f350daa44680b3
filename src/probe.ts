import { promises as fsp } from "fs";
import { processDiagnostic, runProcess } from "./process.js";
import type { ProcessRunner } from "./process.js";
import { errorCode, isRecord } from "./shared.js";
import type { CodecClassification } from "./types.js";

export interface StreamDescriptor {
  codec: string;
  /** Packets in the primary stream; null when the tool did not count them. */
  frameCount: number | null;
}

export interface CodecProbe {
  probe(filePath: string, signal?: AbortSignal): Promise<CodecClassification>;
}

export const STILL_CODECS: ReadonlySet<string> = new Set([
  "av1",
  "bmp",
  "gif",
  "mjpeg",
  "png",
  "tiff",
  "webp",
]);

export const APNG_CODEC = "apng";

const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

export function classifyStream(descriptor: StreamDescriptor | null): CodecClassification {
  if (!descriptor || descriptor.codec === "") {
    return { kind: "probe-failed", reason: "no image stream found" };
  }

  const { codec, frameCount } = descriptor;
  if (codec === APNG_CODEC) {
    return { kind: "animated-apng", codec: APNG_CODEC };
  }
  if (STILL_CODECS.has(codec) && (frameCount === null || frameCount <= 1)) {
    return { kind: "still", codec };
  }
  return { kind: "unrecognized", codec };
}

/** Parses `ffprobe -of json` output. Throws when the text is not the expected JSON. */
export function parseFfprobeOutput(stdout: string): StreamDescriptor | null {
  const parsed: unknown = JSON.parse(stdout);
  if (!isRecord(parsed)) {
    throw new Error("ffprobe output is not a JSON object");
  }

  const streams = parsed.streams;
  if (streams === undefined) return null;
  if (!Array.isArray(streams)) {
    throw new Error('ffprobe output has a non-array "streams" field');
  }

  const first: unknown = streams[0];
  if (first === undefined) return null;
  if (!isRecord(first) || typeof first.codec_name !== "string") {
    throw new Error("ffprobe stream has no codec_name");
  }

  let frameCount: number | null = null;
  const packets = first.nb_read_packets;
  if (typeof packets === "string" && /^\d+$/u.test(packets)) {
    frameCount = Number.parseInt(packets, 10);
  } else if (typeof packets === "number" && Number.isInteger(packets)) {
    frameCount = packets;
  }

  return { codec: first.codec_name, frameCount };
}

export function ffprobeArgs(filePath: string): string[] {
  return [
    "-v",
    "error",
    "-select_streams",
    "v:0",
    "-count_packets",
    "-show_entries",
    "stream=codec_name,nb_read_packets",
    "-of",
    "json",
    filePath,
  ];
}

export async function sourceExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

export interface FfprobeOptions {
  command?: string;
  timeoutMs?: number;
  run?: ProcessRunner;
}

export class FfprobeCodecProbe implements CodecProbe {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly run: ProcessRunner;

  constructor(options: FfprobeOptions = {}) {
    this.command = options.command ?? "ffprobe";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.run = options.run ?? runProcess;
  }

  async probe(filePath: string, signal?: AbortSignal): Promise<CodecClassification> {
    try {
      if (!(await sourceExists(filePath))) {
        return { kind: "probe-failed", reason: "not found" };
      }

      const result = await this.run({
        command: this.command,
        args: ffprobeArgs(filePath),
        timeoutMs: this.timeoutMs,
        signal,
      });
      if (result.exitCode !== 0) {
        return { kind: "probe-failed", reason: processDiagnostic(result) };
      }

      return classifyStream(parseFfprobeOutput(result.stdout));
    } catch (err) {
      const reason = err instanceof Error ? err.message : "unknown error";
      return { kind: "probe-failed", reason };
    }
  }
}
