import * as path from "path";
import { ConfigError, parseEngine } from "./config.js";
import type { LoadedConfig } from "./config.js";
import type { RunOptions } from "./runner.js";
import { DEFAULT_CONCURRENCY, DEFAULT_SETTINGS } from "./scheduler.js";

export type CliFlags = Record<string, unknown>;

function flagString(flags: CliFlags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" ? value : undefined;
}

function flagBoolean(flags: CliFlags, key: string): boolean | undefined {
  const value = flags[key];
  return typeof value === "boolean" ? value : undefined;
}

export function parseIntegerFlag(
  raw: string,
  label: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  const trimmed = raw.trim();
  const parsed = /^\d+$/u.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    const range =
      max === Number.MAX_SAFE_INTEGER
        ? "a positive integer"
        : `an integer between ${min.toString()} and ${max.toString()}`;
    throw new ConfigError(`Invalid ${label}: "${raw}". Must be ${range}.`);
  }
  return parsed;
}

/**
 * Merges CLI flags over config values over defaults. Flags arrive as
 * commander stores them; a flag that was not given is undefined.
 */
export function resolveRunOptions(
  input: string,
  flags: CliFlags,
  loaded: LoadedConfig,
  cwd: string,
  version: string
): RunOptions {
  const { config } = loaded;
  const source = loaded.sourcePath ?? "config";

  const output = flagString(flags, "output") ?? config.output;
  if (output === undefined) {
    throw new ConfigError("Missing output directory. Pass --output <dir> or set \"output\" in config.");
  }

  const qualityFlag = flagString(flags, "quality");
  const concurrencyFlag = flagString(flags, "concurrency");
  const engineFlag = flagString(flags, "engine");

  const verboseFlag = flagBoolean(flags, "verbose");
  const quietFlag = flagBoolean(flags, "quiet");
  let verbose = verboseFlag ?? config.verbose ?? false;
  let quiet = quietFlag ?? config.quiet ?? false;
  if (verboseFlag === true && quietFlag === undefined) quiet = false;
  if (quietFlag === true && verboseFlag === undefined) verbose = false;
  if (verbose && quiet) {
    const origin = verboseFlag === true && quietFlag === true ? "command line" : source;
    throw new ConfigError(
      `Invalid verbosity settings in ${origin}: verbose and quiet cannot both be enabled.`
    );
  }

  return {
    version,
    inputDir: path.resolve(cwd, input),
    outputDir: path.resolve(cwd, output),
    quality:
      qualityFlag === undefined
        ? (config.quality ?? DEFAULT_SETTINGS.quality)
        : parseIntegerFlag(qualityFlag, "quality", 1, 100),
    lossless: flagBoolean(flags, "lossless") ?? config.lossless ?? DEFAULT_SETTINGS.lossless,
    appendName: flagBoolean(flags, "appendName") ?? config.appendName ?? DEFAULT_SETTINGS.appendName,
    concurrency:
      concurrencyFlag === undefined
        ? (config.concurrency ?? DEFAULT_CONCURRENCY)
        : parseIntegerFlag(concurrencyFlag, "concurrency", 1),
    engine:
      (engineFlag === undefined ? undefined : parseEngine(engineFlag, "--engine")) ??
      config.engine ??
      "magick",
    ffprobePath: flagString(flags, "ffprobe") ?? config.ffprobePath ?? "ffprobe",
    magickPath: flagString(flags, "magick") ?? config.magickPath ?? "magick",
    json: flagBoolean(flags, "json") ?? config.json ?? false,
    verbose,
    quiet,
  };
}
