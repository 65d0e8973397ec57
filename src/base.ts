/**
 * Interface that each window-discovery backend implements.
 */

import type { BackendKind, WindowRecord } from "./types.js";

export interface WindowBackend {
  /** Which session protocol this backend speaks. */
  readonly kind: BackendKind;

  /**
   * Run one request/response cycle against the compositor and return the
   * full current window set.
   *
   * Returns null when the backend has nothing to report by design (the
   * unsupported backend); the registry is then left untouched.
   *
   * Implementations must tear down their transport when `signal` aborts and
   * throw a ConnectionFailure or ProtocolFailure on any failure.
   */
  poll(signal: AbortSignal): Promise<WindowRecord[] | null>;
}
