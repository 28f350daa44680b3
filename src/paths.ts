import { promises as fsp } from "fs";
import * as path from "path";
import pLimit from "p-limit";
import { TARGET_EXTENSION } from "./shared.js";

export type TakenCheck = (candidate: string) => Promise<boolean>;

export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, "/").split(path.sep).join("/");
}

/**
 * Destination of `sourcePath` under `outputRoot`, keeping its directory
 * structure relative to `inputRoot` and swapping the extension for `.webp`.
 */
export function mirrorPath(inputRoot: string, outputRoot: string, sourcePath: string): string {
  const relative = path.relative(path.resolve(inputRoot), path.resolve(sourcePath));
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Source is outside the input root: ${sourcePath}`);
  }
  const parsed = path.parse(relative);
  return path.join(path.resolve(outputRoot), parsed.dir, `${parsed.name}${TARGET_EXTENSION}`);
}

export async function ensureParentDirectory(destinationPath: string): Promise<void> {
  await fsp.mkdir(path.dirname(destinationPath), { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsp.lstat(filePath);
    return true;
  } catch {
    return false;
  }
}

/** `photo.webp` with counter 2 becomes `photo (2).webp`. */
export function numberedPath(candidate: string, counter: number): string {
  const parsed = path.parse(candidate);
  return path.join(parsed.dir, `${parsed.name} (${counter.toString()})${parsed.ext}`);
}

export async function resolveCollision(
  candidate: string,
  enabled: boolean,
  isTaken: TakenCheck = pathExists
): Promise<string> {
  if (!enabled) return candidate;
  if (!(await isTaken(candidate))) return candidate;

  for (let counter = 2; ; counter += 1) {
    const next = numberedPath(candidate, counter);
    if (!(await isTaken(next))) return next;
  }
}

function registryKey(filePath: string): string {
  return path.resolve(filePath).normalize("NFC");
}

type Settlement = "written" | "released";

interface Reservation {
  settled: Promise<Settlement>;
  settle: (settlement: Settlement) => void;
}

function createReservation(): Reservation {
  let settle: (settlement: Settlement) => void = () => undefined;
  const settled = new Promise<Settlement>((resolve) => {
    settle = resolve;
  });
  return { settled, settle };
}

type ClaimStep = { claimed: boolean } | { wait: Promise<Settlement> };

/**
 * Destinations handed out during one run. Resolutions go through a
 * single-slot limiter so an existence check and the matching reservation are
 * never interleaved with another task's.
 *
 * A reservation lasts until its task settles it: `commit` once the output is
 * written, `release` on any other ending, which frees the name again.
 * Writers outside this process can still race a reservation.
 */
export class OutputNameRegistry {
  private readonly reserved = new Map<string, Reservation>();
  private readonly serial = pLimit(1);

  constructor(private readonly exists: TakenCheck = pathExists) {}

  isReserved(filePath: string): boolean {
    return this.reserved.has(registryKey(filePath));
  }

  existsOnDisk(filePath: string): Promise<boolean> {
    return this.exists(filePath);
  }

  /** Resolves `candidate` against disk and live reservations, then reserves the result. */
  resolve(candidate: string, appendName: boolean): Promise<string> {
    return this.serial(async () => {
      const isTaken: TakenCheck = async (filePath) =>
        this.isReserved(filePath) || (await this.exists(filePath));
      const resolved = await resolveCollision(candidate, appendName, isTaken);
      this.reserved.set(registryKey(resolved), createReservation());
      return resolved;
    });
  }

  /**
   * Reserves `candidate` when it is free. Used when numbering is off. While
   * another task holds the name this waits for it: a written output means the
   * caller is skipped, a released one is claimed again.
   */
  async claim(candidate: string): Promise<boolean> {
    const key = registryKey(candidate);
    for (;;) {
      const step = await this.serial(async (): Promise<ClaimStep> => {
        const held = this.reserved.get(key);
        if (held) return { wait: held.settled };
        if (await this.exists(candidate)) return { claimed: false };
        this.reserved.set(key, createReservation());
        return { claimed: true };
      });
      if ("claimed" in step) return step.claimed;
      if ((await step.wait) === "written") return false;
    }
  }

  /** Keeps the name taken for the rest of the run. */
  commit(filePath: string): void {
    this.reserved.get(registryKey(filePath))?.settle("written");
  }

  /** Frees a name whose task ended without writing it. */
  release(filePath: string): void {
    const key = registryKey(filePath);
    const reservation = this.reserved.get(key);
    if (reservation === undefined) return;
    this.reserved.delete(key);
    reservation.settle("released");
  }
}
