import { describe, expect, it } from "vitest";
import { processDiagnostic, ProcessError, runProcess } from "../src/process.js";

function node(script: string, timeoutMs?: number, signal?: AbortSignal) {
  return runProcess({ command: process.execPath, args: ["-e", script], timeoutMs, signal });
}

describe("runProcess", () => {
  it("captures stdout and the exit code", async () => {
    const result = await node('process.stdout.write("hello")');
    expect(result).toEqual({ exitCode: 0, signal: null, stdout: "hello", stderr: "" });
  });

  it("resolves non-zero exits with stderr", async () => {
    const result = await node('process.stderr.write("bad input\\n"); process.exit(3)');
    expect(result.exitCode).toBe(3);
    expect(processDiagnostic(result)).toBe("bad input");
  });

  it("rejects when the command cannot be started", async () => {
    const error: unknown = await runProcess({ command: "webpmirror-no-such-tool", args: [] }).catch(
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({ kind: "spawn-failed" });
  });

  it("terminates a child that outlives its timeout", async () => {
    const started = Date.now();
    await expect(node("setInterval(() => {}, 1000)", 200)).rejects.toMatchObject({
      kind: "timeout",
      message: `${process.execPath} timed out after 200ms`,
    });
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("terminates a child when the signal aborts", async () => {
    const controller = new AbortController();
    const running = node("setInterval(() => {}, 1000)", undefined, controller.signal);
    setTimeout(() => {
      controller.abort();
    }, 100);
    await expect(running).rejects.toMatchObject({ kind: "aborted" });
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(node("", undefined, controller.signal)).rejects.toMatchObject({
      kind: "aborted",
    });
  });
});

describe("processDiagnostic", () => {
  const base = { exitCode: 1, signal: null, stdout: "", stderr: "" };

  it("prefers stderr, then stdout", () => {
    expect(processDiagnostic({ ...base, stderr: " oops \n", stdout: "out" })).toBe("oops");
    expect(processDiagnostic({ ...base, stdout: "out\n" })).toBe("out");
  });

  it("falls back to the signal or exit code", () => {
    expect(processDiagnostic({ ...base, exitCode: -1, signal: "SIGKILL" })).toBe("terminated by SIGKILL");
    expect(processDiagnostic(base)).toBe("exited with code 1");
  });
});
