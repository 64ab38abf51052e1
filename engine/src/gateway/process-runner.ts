/**
 * Cellar Engine — Process Runner
 *
 * Spawns an external command and collects its output. The returned promise
 * always resolves: launch failures and timeouts are reported in the result,
 * and the caller decides what counts as an error.
 */

import { ChildProcess, spawn } from "child_process";

export interface ProcessOptions {
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  cwd?: string;
  timeoutMs: number;
}

export interface ProcessResult {
  /** -1 when the process could not be launched or was killed */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when spawn itself failed (e.g. ENOENT) */
  launchError?: string;
  durationMs: number;
}

export type ProcessRunner = (
  command: string[],
  options: ProcessOptions,
) => Promise<ProcessResult>;

/** Cap on captured output per stream */
const MAX_OUTPUT = 1024 * 1024;

/** Time between SIGTERM and SIGKILL once a command has timed out */
const KILL_GRACE_MS = 2_000;

/**
 * How long to keep reading after the command exits. Wine helpers it started
 * in the background can hold the output pipes open long after that.
 */
const EXIT_DRAIN_MS = 1_000;

/** Signal the child's whole process group, or the child alone where there is none */
function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  const pid = child.pid;
  if (pid === undefined) return;
  if (process.platform === "win32") {
    child.kill(signal);
    return;
  }
  try {
    process.kill(-pid, signal);
  } catch {
    child.kill(signal);
  }
}

/**
 * Run a command to completion.
 *
 * The command gets its own process group. On timeout the group receives
 * SIGTERM, then SIGKILL after a grace period, and the result settles as soon
 * as the command itself exits, whoever still holds its output pipes.
 */
export const runProcess: ProcessRunner = (command, options) => {
  const [file, ...args] = command;
  const startedAt = Date.now();

  return new Promise<ProcessResult>((resolve) => {
    if (!file) {
      resolve({
        exitCode: -1,
        stdout: "",
        stderr: "",
        timedOut: false,
        launchError: "empty command",
        durationMs: 0,
      });
      return;
    }

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let exitCode: number | null = null;
    let killTimer: NodeJS.Timeout | undefined;
    let drainTimer: NodeJS.Timeout | undefined;

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
      windowsHide: true,
    });

    const finish = (result: Omit<ProcessResult, "durationMs">) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(killTimer);
      clearTimeout(drainTimer);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ ...result, durationMs: Date.now() - startedAt });
    };

    const timer = setTimeout(() => {
      // Already exited and only draining output
      if (exitCode !== null || child.signalCode !== null) return;
      timedOut = true;
      signalTree(child, "SIGTERM");
      killTimer = setTimeout(() => signalTree(child, "SIGKILL"), KILL_GRACE_MS);
    }, options.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => {
      if (stdout.length < MAX_OUTPUT) stdout += chunk.toString("utf8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      if (stderr.length < MAX_OUTPUT) stderr += chunk.toString("utf8");
    });

    child.on("exit", (code) => {
      exitCode = code;
      if (timedOut) {
        // Leftover group members get no grace once the command is gone
        signalTree(child, "SIGKILL");
        finish({ exitCode: code ?? -1, stdout, stderr, timedOut });
        return;
      }
      drainTimer = setTimeout(() => {
        finish({ exitCode: code ?? -1, stdout, stderr, timedOut });
      }, EXIT_DRAIN_MS);
    });

    child.on("close", (code) => {
      finish({ exitCode: code ?? exitCode ?? -1, stdout, stderr, timedOut });
    });

    child.on("error", (err) => {
      finish({
        exitCode: -1,
        stdout,
        stderr,
        timedOut,
        launchError: err.message,
      });
    });
  });
};
