/**
 * GNOME backend: org.gnome.Shell.Introspect.GetWindows.
 *
 * The reply is a{ta{sv}}: window id -> property bag. GNOME Shell only
 * answers callers it trusts (unsafe mode or an allowlisted sender); a
 * refusal surfaces as a ConnectionFailure like any other unreachable peer.
 */

import type { WindowBackend } from "../base.js";
import { ProtocolFailure } from "../errors.js";
import type { CommandRunner } from "../exec.js";
import { runCommand } from "../exec.js";
import { dictBoolean, dictString, isGVariantDict, type GVariant } from "../gvariant.js";
import type { WindowRecord } from "../types.js";
import { GdbusClient, type DbusTarget } from "./dbus.js";

export const GNOME_GET_WINDOWS: DbusTarget = {
  dest: "org.gnome.Shell.Introspect",
  objectPath: "/org/gnome/Shell/Introspect",
  method: "org.gnome.Shell.Introspect.GetWindows",
};

/**
 * Turn the GetWindows out-arguments into records. Windows without a string
 * `app-id` are dropped rather than counted under a placeholder.
 */
export function parseGnomeWindows(reply: GVariant[]): WindowRecord[] {
  const windows = reply[0];
  if (!isGVariantDict(windows)) {
    throw new ProtocolFailure("gnome", "GetWindows did not return a dictionary");
  }

  const records: WindowRecord[] = [];
  for (const [id, props] of windows) {
    if (!isGVariantDict(props)) continue;
    const appId = dictString(props, "app-id");
    if (!appId) continue;

    records.push({
      id: String(id),
      title: dictString(props, "title") ?? "",
      appId,
      isFocused: dictBoolean(props, "has-focus"),
    });
  }
  return records;
}

export class GnomeBackend implements WindowBackend {
  readonly kind = "gnome" as const;
  private readonly bus: GdbusClient;

  constructor(options?: { run?: CommandRunner }) {
    this.bus = new GdbusClient(this.kind, options?.run ?? runCommand);
  }

  async poll(signal: AbortSignal): Promise<WindowRecord[]> {
    const reply = await this.bus.call(GNOME_GET_WINDOWS, [], { signal });
    return parseGnomeWindows(reply);
  }
}
