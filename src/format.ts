/**
 * Snapshot output: compact text for terminals and a JSON envelope that
 * schema/snapshot.schema.json describes.
 */

import type { BackendKind, SnapshotEnvelope, WindowRecord, WindowSnapshot } from "./types.js";

export const ENVELOPE_VERSION = "0.1.0";

export function buildSnapshotEnvelope(
  snapshot: WindowSnapshot,
  options: { backend: BackendKind; timestamp?: number },
): SnapshotEnvelope {
  return {
    version: ENVELOPE_VERSION,
    backend: options.backend,
    timestamp: options.timestamp ?? Date.now(),
    updatedAt: snapshot.updatedAt,
    counts: Object.fromEntries(snapshot.counts),
    windows: snapshot.windows.map((w) => ({
      id: w.id,
      title: w.title,
      app_id: w.appId,
      focused: w.isFocused,
    })),
  };
}

/**
 * Compact overview, one line per app then its windows:
 *
 *   # dockwatch 0.1.0 | sway | 3 windows, 2 apps
 *
 *   firefox (2)
 *     * [fg] Inbox  #12
 *       Docs  #15
 */
export function formatOverview(snapshot: WindowSnapshot, options: { backend: BackendKind }): string {
  const lines = [
    `# dockwatch ${ENVELOPE_VERSION} | ${options.backend} | ` +
      `${snapshot.windows.length} windows, ${snapshot.counts.size} apps`,
    "",
  ];

  for (const [appId, count] of snapshot.counts) {
    lines.push(`${appId} (${count})`);
    for (const win of snapshot.windows) {
      if (win.appId.toLowerCase() !== appId) continue;
      const title = win.title || "(untitled)";
      const prefix = win.isFocused ? "  * [fg] " : "    ";
      lines.push(`${prefix}${title}  #${win.id}`);
    }
  }

  return lines.join("\n") + "\n";
}

/** Count line for one app followed by its windows, focused ones starred. */
export function formatAppWindows(app: string, count: number, windows: WindowRecord[]): string {
  const lines = [`${app}: ${count} window${count === 1 ? "" : "s"}`];
  for (const win of windows) {
    lines.push(`  ${win.isFocused ? "*" : " "} ${win.title || "(untitled)"}  [${win.appId}] #${win.id}`);
  }
  return lines.join("\n") + "\n";
}

/** Notice for stderr when the session has no supported backend, else null. */
export function sessionNotice(backend: BackendKind): string | null {
  if (backend !== "unknown") return null;
  return "No supported desktop session detected (set --backend to force one).";
}
