/**
 * Session-bus calls through the `gdbus` CLI.
 *
 * No native addon: every call is one `gdbus call --session` child process
 * whose printed reply is parsed as GVariant text.
 */

import { ConnectionFailure, PollError, ProtocolFailure, getErrorCode, getErrorMessage } from "../errors.js";
import type { CommandRunner } from "../exec.js";
import { getStderr } from "../exec.js";
import { parseGVariant, type GVariant } from "../gvariant.js";
import type { BackendKind } from "../types.js";

export interface DbusCallOptions {
  signal?: AbortSignal;
  timeout?: number;
}

export interface DbusTarget {
  dest: string;
  objectPath: string;
  /** Fully qualified, e.g. "org.gnome.Shell.Introspect.GetWindows". */
  method: string;
}

export class GdbusClient {
  readonly backend: BackendKind;
  private readonly run: CommandRunner;

  constructor(backend: BackendKind, run: CommandRunner) {
    this.backend = backend;
    this.run = run;
  }

  /** Call a method and return the raw printed reply. */
  async callRaw(target: DbusTarget, args: string[] = [], options?: DbusCallOptions): Promise<string> {
    const cmdArgs = [
      "call",
      "--session",
      "--dest", target.dest,
      "--object-path", target.objectPath,
      "--method", target.method,
      ...args,
    ];
    try {
      const stdout = await this.run("gdbus", cmdArgs, {
        timeout: options?.timeout ?? 5000,
        signal: options?.signal,
      });
      return stdout.trim();
    } catch (err) {
      throw this.classify(target, err, options?.signal);
    }
  }

  /**
   * Call a method and parse its reply tuple.
   *
   * @returns The reply's out-arguments (the printed tuple, unpacked).
   */
  async call(target: DbusTarget, args: string[] = [], options?: DbusCallOptions): Promise<GVariant[]> {
    const raw = await this.callRaw(target, args, options);
    let parsed: GVariant;
    try {
      parsed = parseGVariant(raw === "" ? "()" : raw);
    } catch (err) {
      throw new ProtocolFailure(
        this.backend,
        `Unreadable reply from ${target.method}: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
    if (!Array.isArray(parsed)) {
      throw new ProtocolFailure(this.backend, `Reply from ${target.method} is not a tuple`);
    }
    return parsed;
  }

  private classify(target: DbusTarget, err: unknown, signal?: AbortSignal): PollError {
    if (signal?.aborted) {
      const reason: unknown = signal.reason;
      if (reason instanceof PollError) return reason;
      return new ProtocolFailure(this.backend, `${target.method} aborted`, { cause: err });
    }
    if (getErrorCode(err) === "ENOENT") {
      return new ConnectionFailure(this.backend, "gdbus not found (install glib2 tools)", { cause: err });
    }
    if (isTimeout(err)) {
      return new ProtocolFailure(this.backend, `${target.method} timed out`, { cause: err });
    }
    const stderr = getStderr(err).trim();
    const detail = stderr || getErrorMessage(err);
    return new ConnectionFailure(this.backend, `${target.method} failed: ${detail}`, { cause: err });
  }
}

function isTimeout(err: unknown): boolean {
  if (err && typeof err === "object" && "killed" in err && "signal" in err) {
    return err.killed === true && err.signal === "SIGTERM";
  }
  return false;
}
