/**
 * Process spawning with stdout/stderr capture
 * Runs one step command and captures its output with size limits
 * SECURITY: Never uses shell mode; arguments are passed as an array
 */

import { spawn, type ChildProcess } from "child_process";
import { isAbsolute, resolve } from "path";
import { createLogger } from "../lib/logger/index.js";
import type { ProcessResult } from "./types.js";
import { validateExecutable, sanitizeEnv } from "./security.js";

const logger = createLogger("fanout:executor:process-spawn");

type CaptureBuffer = {
  text: string;
  truncated: boolean;
};

function capture(buffer: CaptureBuffer, chunk: Buffer, limit: number): void {
  if (buffer.text.length >= limit) {
    buffer.truncated = true;
    return;
  }
  const str = chunk.toString("utf-8");
  const remaining = limit - buffer.text.length;
  buffer.text += str.slice(0, remaining);
  if (str.length > remaining) {
    buffer.truncated = true;
  }
}

function finish(buffer: CaptureBuffer, limit: number): string {
  return buffer.truncated
    ? `${buffer.text}\n... (output truncated at ${limit} bytes)`
    : buffer.text;
}

/**
 * Spawn a command and capture stdout/stderr with size limits.
 * Never rejects for process-level problems: a command that cannot be
 * started resolves with exitCode 127 and spawnError set.
 *
 * @param command - Executable name (looked up on PATH) or a path, relative
 *   paths being taken from cwd
 * @param args - Arguments passed verbatim
 * @param env - Extra environment variables layered over process.env
 * @param cwd - Working directory for the process
 * @param maxLogCapture - Maximum characters to capture from each stream
 * @param onSpawn - Called with the child right after it starts
 * @throws Error if env contains an invalid variable name
 */
export async function spawnProcess(
  command: string,
  args: readonly string[],
  env: Readonly<Record<string, string>>,
  cwd: string,
  maxLogCapture: number = 8192,
  onSpawn?: (proc: ChildProcess) => void,
): Promise<ProcessResult> {
  const startTime = Date.now();
  const safeEnv = sanitizeEnv(env);

  // Paths are resolved against the step's cwd, as spawn itself would
  const executable =
    command.includes("/") && !isAbsolute(command) ? resolve(cwd, command) : command;

  if (executable.includes("/")) {
    try {
      await validateExecutable(executable);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("Command not executable", { command, error: message });
      return {
        exitCode: 127,
        signal: null,
        stdout: "",
        stderr: message,
        durationMs: Date.now() - startTime,
        spawnError: message,
      };
    }
  }

  return new Promise((resolvePromise) => {
    const stdout: CaptureBuffer = { text: "", truncated: false };
    const stderr: CaptureBuffer = { text: "", truncated: false };
    let spawnError: string | undefined;
    let settled = false;

    // SECURITY: NEVER use shell: true to prevent command injection
    const proc = spawn(executable, [...args], {
      cwd,
      env: { ...process.env, ...safeEnv },
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });

    if (proc.pid !== undefined) {
      onSpawn?.(proc);
    }

    proc.stdout?.on("data", (chunk: Buffer) => {
      capture(stdout, chunk, maxLogCapture);
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      capture(stderr, chunk, maxLogCapture);
    });

    proc.on("error", (error) => {
      logger.error("Process error", { command, cwd, error });
      spawnError = error.message;

      // A process that never started may not emit "close"
      if (proc.pid === undefined && !settled) {
        settled = true;
        resolvePromise({
          exitCode: 127,
          signal: null,
          stdout: finish(stdout, maxLogCapture),
          stderr: `${finish(stderr, maxLogCapture)}${stderr.text ? "\n" : ""}Process error: ${error.message}`,
          durationMs: Date.now() - startTime,
          spawnError,
        });
      }
    });

    proc.on("close", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      const durationMs = Date.now() - startTime;
      const exitCode = code ?? (spawnError !== undefined ? 127 : 1);

      logger.debug("Process completed", {
        command,
        exitCode,
        signal,
        durationMs,
        stdoutBytes: stdout.text.length,
        stderrBytes: stderr.text.length,
      });

      resolvePromise({
        exitCode,
        signal,
        stdout: finish(stdout, maxLogCapture),
        stderr: finish(stderr, maxLogCapture),
        durationMs,
        ...(spawnError !== undefined ? { spawnError } : {}),
      });
    });
  });
}
