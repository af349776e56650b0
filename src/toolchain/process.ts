/**
 * Bounded external process execution
 */

import { execFile } from "node:child_process";

export interface ProcessOptions {
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ProcessOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "timeout"; stdout: string; stderr: string }
  | { kind: "aborted" }
  /** Output grew past MAX_OUTPUT_BYTES and the process was killed */
  | { kind: "output-overflow"; limitBytes: number }
  | { kind: "launch-failed"; code: string; message: string };

/** Runs a command to completion. Never rejects. */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: ProcessOptions
) => Promise<ProcessOutcome>;

export const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve) => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        signal: options.signal,
        encoding: "utf-8",
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ kind: "exited", exitCode: 0, stdout, stderr });
          return;
        }

        if (options.signal?.aborted) {
          resolve({ kind: "aborted" });
          return;
        }

        if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          resolve({ kind: "output-overflow", limitBytes: MAX_OUTPUT_BYTES });
          return;
        }

        if (typeof error.code === "string") {
          // ENOENT, EACCES, ...: the process never started
          resolve({ kind: "launch-failed", code: error.code, message: error.message });
          return;
        }

        if (error.killed) {
          resolve({ kind: "timeout", stdout, stderr });
          return;
        }

        resolve({
          kind: "exited",
          exitCode: typeof error.code === "number" ? error.code : 1,
          stdout,
          stderr,
        });
      }
    );
  });
