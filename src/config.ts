import * as fs from "fs";
import * as path from "path";
import { ENGINES } from "./runner/preflight.js";
import type { Engine } from "./runner/preflight.js";
import { isRecord } from "./shared.js";

export interface WebpMirrorConfig {
  output?: string;
  quality?: number;
  lossless?: boolean;
  appendName?: boolean;
  concurrency?: number;
  engine?: Engine;
  ffprobePath?: string;
  magickPath?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface LoadedConfig {
  config: WebpMirrorConfig;
  sourcePath: string | null;
}

export class ConfigError extends Error {}

export const CONFIG_FILE = "webpmirror.config.json";
export const PACKAGE_JSON_KEY = "webpmirror";

const ALLOWED_KEYS = new Set([
  "output",
  "quality",
  "lossless",
  "appendName",
  "concurrency",
  "engine",
  "ffprobePath",
  "magickPath",
  "json",
  "verbose",
  "quiet",
]);

function parseString(
  value: unknown,
  key: keyof WebpMirrorConfig,
  sourcePath: string
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected non-empty string.`);
  }
  return value;
}

function parseInteger(
  value: unknown,
  key: keyof WebpMirrorConfig,
  sourcePath: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected integer.`);
  }
  if (value < min || value > max) {
    const range =
      max === Number.MAX_SAFE_INTEGER ? `at least ${min.toString()}` : `${min.toString()}-${max.toString()}`;
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected ${range}.`);
  }
  return value;
}

function parseBoolean(
  value: unknown,
  key: keyof WebpMirrorConfig,
  sourcePath: string
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected boolean.`);
  }
  return value;
}

export function parseEngine(value: unknown, sourcePath: string): Engine | undefined {
  if (value === undefined) return undefined;
  const engine = ENGINES.find((candidate) => candidate === value);
  if (engine === undefined) {
    throw new ConfigError(
      `Invalid "engine" in ${sourcePath}: expected one of ${ENGINES.join(", ")}.`
    );
  }
  return engine;
}

function parseConfig(value: unknown, sourcePath: string): WebpMirrorConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config in ${sourcePath}: expected a JSON object.`);
  }

  for (const key of Object.keys(value)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key "${key}" in ${sourcePath}.`);
    }
  }

  return {
    output: parseString(value.output, "output", sourcePath),
    quality: parseInteger(value.quality, "quality", sourcePath, 1, 100),
    lossless: parseBoolean(value.lossless, "lossless", sourcePath),
    appendName: parseBoolean(value.appendName, "appendName", sourcePath),
    concurrency: parseInteger(value.concurrency, "concurrency", sourcePath, 1),
    engine: parseEngine(value.engine, sourcePath),
    ffprobePath: parseString(value.ffprobePath, "ffprobePath", sourcePath),
    magickPath: parseString(value.magickPath, "magickPath", sourcePath),
    json: parseBoolean(value.json, "json", sourcePath),
    verbose: parseBoolean(value.verbose, "verbose", sourcePath),
    quiet: parseBoolean(value.quiet, "quiet", sourcePath),
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    throw new ConfigError(`Failed to read config file ${filePath}: ${message}`);
  }
}

interface ConfigCandidate {
  filePath: string;
  /** Settings live under this key of the file rather than at its top level. */
  key?: string;
  required?: boolean;
}

function configCandidates(cwd: string, explicitConfigPath?: string): ConfigCandidate[] {
  if (explicitConfigPath) {
    return [{ filePath: path.resolve(cwd, explicitConfigPath), required: true }];
  }
  return [
    { filePath: path.join(cwd, CONFIG_FILE) },
    { filePath: path.join(cwd, "package.json"), key: PACKAGE_JSON_KEY },
  ];
}

/** First match of `--config`, `webpmirror.config.json`, then `package.json#webpmirror`. */
export function loadConfig(cwd: string, explicitConfigPath?: string): LoadedConfig {
  for (const candidate of configCandidates(cwd, explicitConfigPath)) {
    if (!fs.existsSync(candidate.filePath)) {
      if (candidate.required) {
        throw new ConfigError(`Config file not found: ${candidate.filePath}`);
      }
      continue;
    }

    const contents = readJsonFile(candidate.filePath);
    if (candidate.key === undefined) {
      return { config: parseConfig(contents, candidate.filePath), sourcePath: candidate.filePath };
    }
    if (isRecord(contents) && contents[candidate.key] !== undefined) {
      const sourcePath = `${candidate.filePath}#${candidate.key}`;
      return { config: parseConfig(contents[candidate.key], sourcePath), sourcePath };
    }
  }

  return { config: {}, sourcePath: null };
}
