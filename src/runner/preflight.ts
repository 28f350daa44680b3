import { ProcessError, runProcess } from "../process.js";
import type { ProcessRunner } from "../process.js";

export type Engine = "magick" | "sharp";

export const ENGINES: readonly Engine[] = ["magick", "sharp"];

export interface ToolRequirement {
  name: string;
  command: string;
  install: string;
}

export interface ToolPaths {
  ffprobePath: string;
  magickPath: string;
}

export class MissingToolError extends Error {
  constructor(readonly missing: ToolRequirement[]) {
    super(
      `The following commands were not found in PATH: ${missing.map((tool) => tool.command).join(", ")}`
    );
    this.name = "MissingToolError";
  }
}

const TOOL_CHECK_TIMEOUT_MS = 10_000;

export function requiredTools(engine: Engine, paths: ToolPaths): ToolRequirement[] {
  if (engine === "sharp") return [];
  return [
    { name: "ffprobe", command: paths.ffprobePath, install: "FFmpeg (for ffprobe)" },
    { name: "magick", command: paths.magickPath, install: "ImageMagick (for magick)" },
  ];
}

async function isRunnable(tool: ToolRequirement, run: ProcessRunner): Promise<boolean> {
  try {
    const result = await run({
      command: tool.command,
      args: ["-version"],
      timeoutMs: TOOL_CHECK_TIMEOUT_MS,
    });
    return result.exitCode === 0;
  } catch (err) {
    if (err instanceof ProcessError) return false;
    throw err;
  }
}

/** Throws MissingToolError listing every external tool that cannot be started. */
export async function assertToolsAvailable(
  tools: ToolRequirement[],
  run: ProcessRunner = runProcess
): Promise<void> {
  const checks = await Promise.all(
    tools.map(async (tool) => ({ tool, ok: await isRunnable(tool, run) }))
  );
  const missing = checks.filter((check) => !check.ok).map((check) => check.tool);
  if (missing.length > 0) {
    throw new MissingToolError(missing);
  }
}
