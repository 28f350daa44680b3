import { promises as fsp } from "fs";
import type { Dirent, Stats } from "fs";
import * as path from "path";
import { toPosix } from "./paths.js";

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".avif",
  ".bmp",
  ".gif",
  ".jpeg",
  ".jpg",
  ".png",
  ".tiff",
  ".tif",
  ".webp",
]);

export class DiscoveryError extends Error {
  constructor(
    message: string,
    readonly code: "INPUT_NOT_FOUND" | "DISCOVERY_FAILED"
  ) {
    super(message);
    this.name = "DiscoveryError";
  }
}

export interface DiscoveryWarning {
  path: string;
  message: string;
}

export interface DiscoveryOptions {
  /** Directories that are never descended into, e.g. an output root nested in the input. */
  exclude?: string[];
  onWarning?: (warning: DiscoveryWarning) => void;
}

export function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

async function readEntries(dir: string): Promise<Dirent[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Fails with a DiscoveryError when the input root cannot be walked at all.
 * Runs before any task is scheduled.
 */
export async function assertReadableRoot(inputRoot: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fsp.stat(inputRoot);
  } catch {
    throw new DiscoveryError(`Directory not found: ${inputRoot}`, "INPUT_NOT_FOUND");
  }
  if (!stat.isDirectory()) {
    throw new DiscoveryError(`Input path is not a directory: ${inputRoot}`, "INPUT_NOT_FOUND");
  }
  try {
    await fsp.readdir(inputRoot);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    throw new DiscoveryError(`Cannot read input directory ${inputRoot}: ${message}`, "DISCOVERY_FAILED");
  }
}

/**
 * Lazily walks `inputRoot`, yielding regular image files in name order per
 * directory. Hidden entries and symlinks are ignored; unreadable
 * subdirectories are reported through `onWarning` and skipped.
 */
export async function* discoverImages(
  inputRoot: string,
  options: DiscoveryOptions = {}
): AsyncGenerator<string> {
  const root = path.resolve(inputRoot);
  const excluded = new Set(
    (options.exclude ?? []).map((dir) => path.resolve(dir)).filter((dir) => dir !== root)
  );

  async function* walk(dir: string, isRoot: boolean): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await readEntries(dir);
    } catch (err) {
      const message = err instanceof Error ? err.message : "unknown error";
      if (isRoot) {
        throw new DiscoveryError(`Cannot read input directory ${dir}: ${message}`, "DISCOVERY_FAILED");
      }
      options.onWarning?.({ path: toPosix(dir), message });
      return;
    }

    for (const entry of entries) {
      if (entry.name.startsWith(".") || entry.isSymbolicLink()) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(fullPath)) {
          yield* walk(fullPath, false);
        }
      } else if (entry.isFile() && isImageFile(entry.name)) {
        yield fullPath;
      }
    }
  }

  yield* walk(root, true);
}
