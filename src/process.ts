import { spawn } from "child_process";

export interface ProcessRequest {
  command: string;
  args: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;

export type ProcessErrorKind = "spawn-failed" | "timeout" | "aborted";

export class ProcessError extends Error {
  constructor(
    message: string,
    readonly kind: ProcessErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProcessError";
  }
}

const MAX_CAPTURED_CHARS = 64 * 1024;
const KILL_GRACE_MS = 5_000;

function appendCapped(current: string, chunk: string): string {
  if (current.length >= MAX_CAPTURED_CHARS) return current;
  return (current + chunk).slice(0, MAX_CAPTURED_CHARS);
}

/**
 * Runs a command to completion and captures its output. The promise settles
 * only after the child has closed, so pipes, timers and the abort listener
 * are released on every path. Timeouts and aborts send SIGTERM, escalating
 * to SIGKILL when the child lingers.
 */
export function runProcess(request: ProcessRequest): Promise<ProcessResult> {
  const { command, args, timeoutMs, signal } = request;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ProcessError(`${command} aborted before start`, "aborted"));
      return;
    }

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let failure: ProcessError | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr = appendCapped(stderr, chunk);
    });

    const terminate = (error: ProcessError) => {
      if (failure) return;
      failure = error;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        child.kill("SIGKILL");
      }, KILL_GRACE_MS);
      killTimer.unref();
    };

    const timer =
      timeoutMs === undefined
        ? null
        : setTimeout(() => {
            terminate(
              new ProcessError(`${command} timed out after ${timeoutMs.toString()}ms`, "timeout")
            );
          }, timeoutMs);

    const onAbort = () => {
      terminate(new ProcessError(`${command} aborted`, "aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const release = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener("abort", onAbort);
    };

    child.once("error", (err) => {
      release();
      if (settled) return;
      settled = true;
      child.stdout.destroy();
      child.stderr.destroy();
      reject(
        new ProcessError(`Failed to start ${command}: ${err.message}`, "spawn-failed", {
          cause: err,
        })
      );
    });

    child.once("close", (code, exitSignal) => {
      release();
      if (settled) return;
      settled = true;
      if (failure) {
        reject(failure);
        return;
      }
      resolve({ exitCode: code ?? -1, signal: exitSignal, stdout, stderr });
    });
  });
}

/** Diagnostic text of a failed run: stderr when present, else stdout. */
export function processDiagnostic(result: ProcessResult): string {
  const stderr = result.stderr.trim();
  if (stderr) return stderr;
  const stdout = result.stdout.trim();
  if (stdout) return stdout;
  if (result.signal) return `terminated by ${result.signal}`;
  return `exited with code ${result.exitCode.toString()}`;
}
