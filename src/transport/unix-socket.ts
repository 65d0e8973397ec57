/**
 * Unix domain socket helpers shared by the Hyprland and Sway backends.
 */

import net from "node:net";

import { ConnectionFailure, PollError, ProtocolFailure, getErrorMessage } from "../errors.js";
import type { BackendKind } from "../types.js";

/**
 * Connect to `path`, wiring the socket's lifetime to `signal`.
 *
 * @throws {ConnectionFailure} If the socket cannot be opened.
 */
export function connectUnix(
  backend: BackendKind,
  path: string,
  signal: AbortSignal,
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(backend, signal));
      return;
    }

    const socket = net.createConnection({ path });
    const onAbort = (): void => {
      socket.destroy();
      reject(abortReason(backend, signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    socket.once("connect", () => {
      signal.removeEventListener("abort", onAbort);
      resolve(socket);
    });
    socket.once("error", (err) => {
      signal.removeEventListener("abort", onAbort);
      socket.destroy();
      reject(new ConnectionFailure(backend, `Cannot connect to ${path}: ${err.message}`, { cause: err }));
    });
  });
}

/**
 * Write `request`, then collect everything the peer sends until it closes.
 */
export function requestUntilClose(
  backend: BackendKind,
  socket: net.Socket,
  request: string | Buffer,
  signal: AbortSignal,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (err: PollError | null): void => {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onAbort);
      socket.destroy();
      if (err) reject(err);
      else resolve(Buffer.concat(chunks));
    };
    const onAbort = (): void => finish(abortReason(backend, signal));

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });

    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.once("end", () => finish(null));
    socket.once("close", () => finish(null));
    socket.once("error", (err) =>
      finish(new ProtocolFailure(backend, `Socket error: ${err.message}`, { cause: err })),
    );
    socket.write(request);
  });
}

/**
 * Reads exact byte counts from a socket, buffering whatever arrives early.
 */
export class ExactReader {
  private chunks: Buffer[] = [];
  private bufferedLength = 0;
  private ended = false;
  private failure: PollError | null = null;
  private waiter: (() => void) | null = null;

  constructor(
    private readonly backend: BackendKind,
    socket: net.Socket,
    signal: AbortSignal,
  ) {
    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.bufferedLength += chunk.length;
      this.wake();
    });
    socket.once("end", () => {
      this.ended = true;
      this.wake();
    });
    socket.once("close", () => {
      this.ended = true;
      this.wake();
    });
    socket.once("error", (err) => {
      this.failure ??= new ProtocolFailure(backend, `Socket error: ${err.message}`, { cause: err });
      this.wake();
    });
    signal.addEventListener(
      "abort",
      () => {
        this.failure ??= abortReason(backend, signal);
        socket.destroy();
        this.wake();
      },
      { once: true },
    );
    if (signal.aborted) this.failure = abortReason(backend, signal);
  }

  /**
   * Resolve with exactly `length` bytes.
   *
   * @throws {ProtocolFailure} If the stream ends first (short read).
   */
  async read(length: number): Promise<Buffer> {
    for (;;) {
      if (this.failure) throw this.failure;
      if (this.bufferedLength >= length) {
        // Join only once enough has arrived; the remainder stays as one chunk.
        const joined =
          this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.bufferedLength);
        const rest = joined.subarray(length);
        this.chunks = rest.length > 0 ? [rest] : [];
        this.bufferedLength = rest.length;
        return joined.subarray(0, length);
      }
      if (this.ended) {
        throw new ProtocolFailure(
          this.backend,
          `Short read: expected ${length} bytes, got ${this.bufferedLength}`,
        );
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

function abortReason(backend: BackendKind, signal: AbortSignal): PollError {
  const reason: unknown = signal.reason;
  if (reason instanceof PollError) return reason;
  return new ProtocolFailure(backend, `Request aborted: ${getErrorMessage(reason)}`);
}
