/**
 * Child-process runner used by the D-Bus backends.
 *
 * Backends take a CommandRunner so tests can stand in for gdbus and
 * journalctl without a session bus.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RunOptions {
  timeout?: number;
  signal?: AbortSignal;
}

/** Run a program and resolve with its stdout. Rejects on non-zero exit. */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, args, {
    timeout: options?.timeout ?? 5000,
    signal: options?.signal,
    maxBuffer: 16 * 1024 * 1024,
    encoding: "utf-8",
  });
  return stdout;
};

/** Stderr captured on a failed execFile, if present. */
export function getStderr(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err) {
    const { stderr } = err;
    if (typeof stderr === "string") return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf-8");
  }
  return "";
}
