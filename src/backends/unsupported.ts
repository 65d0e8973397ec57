/**
 * Backend for sessions no protocol applies to. It never performs I/O and
 * never reports data, so the registry keeps whatever overrides it holds.
 */

import type { WindowBackend } from "../base.js";
import type { WindowRecord } from "../types.js";

export class UnsupportedBackend implements WindowBackend {
  readonly kind = "unknown" as const;

  async poll(_signal: AbortSignal): Promise<WindowRecord[] | null> {
    return null;
  }
}
