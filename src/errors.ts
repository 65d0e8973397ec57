/**
 * Poll failures.
 *
 * Backends throw these; the scheduler catches them, logs, and keeps the
 * previous snapshot. Nothing here is fatal to the host process.
 */

import type { BackendKind } from "./types.js";

export type PollFailureKind = "connection" | "protocol";

export class PollError extends Error {
  readonly backend: BackendKind;
  readonly failure: PollFailureKind;

  constructor(
    failure: PollFailureKind,
    backend: BackendKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PollError";
    this.failure = failure;
    this.backend = backend;
  }
}

/** The transport could not be opened or the peer is unreachable. */
export class ConnectionFailure extends PollError {
  constructor(backend: BackendKind, message: string, options?: { cause?: unknown }) {
    super("connection", backend, message, options);
    this.name = "ConnectionFailure";
  }
}

/** A reply arrived but was malformed, short, or late. */
export class ProtocolFailure extends PollError {
  constructor(backend: BackendKind, message: string, options?: { cause?: unknown }) {
    super("protocol", backend, message, options);
    this.name = "ProtocolFailure";
  }
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}

/** Node system error code (ENOENT, ECONNREFUSED, ...), if any. */
export function getErrorCode(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : null;
  }
  return null;
}

/**
 * Wrap anything a backend threw as a PollError. Errors that already are
 * PollErrors pass through untouched.
 */
export function toPollError(backend: BackendKind, err: unknown): PollError {
  if (err instanceof PollError) return err;
  return new ProtocolFailure(backend, getErrorMessage(err), { cause: err });
}
