/**
 * Window registry: the last known good window set and derived counts.
 *
 * State lives in one immutable snapshot object that is swapped by reference,
 * so a reader always sees records and counts from the same poll.
 */

import type { WindowRecord, WindowSnapshot } from "./types.js";

const EMPTY_SNAPSHOT: WindowSnapshot = Object.freeze({
  windows: Object.freeze([]),
  counts: new Map<string, number>(),
  updatedAt: null,
});

/** Count records per lower-cased app id, preserving first-seen order. */
export function countWindows(windows: readonly WindowRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const win of windows) {
    const key = win.appId.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Loose app id match: case-insensitive, and either side may contain the
 * other (`firefox` vs `Firefox-esr`, `code` vs `code-oss`).
 */
export function appIdMatches(candidate: string, query: string): boolean {
  const a = candidate.toLowerCase();
  const q = query.toLowerCase();
  if (a.length === 0 || q.length === 0) return false;
  return a === q || a.includes(q) || q.includes(a);
}

export class WindowRegistry {
  private snapshot: WindowSnapshot = EMPTY_SNAPSHOT;

  /** Current snapshot. Treat as read-only; it is never mutated in place. */
  getSnapshot(): WindowSnapshot {
    return this.snapshot;
  }

  /** Number of app ids with an explicit (non-zero) count. */
  get countEntries(): number {
    return this.snapshot.counts.size;
  }

  /**
   * Replace the whole window set with the result of one poll. Counts are
   * recomputed from the same records in the same step.
   */
  replace(windows: readonly WindowRecord[], now: number = Date.now()): void {
    const frozen = Object.freeze(windows.map((w) => Object.freeze({ ...w })));
    this.snapshot = Object.freeze({
      windows: frozen,
      counts: countWindows(frozen),
      updatedAt: now,
    });
  }

  getWindowCount(appId: string): number {
    const { counts } = this.snapshot;
    if (appId.length === 0) return 0;

    const exact = counts.get(appId) ?? counts.get(appId.toLowerCase());
    if (exact !== undefined) return exact;

    for (const [key, count] of counts) {
      if (appIdMatches(key, appId)) return count;
    }
    return 0;
  }

  getWindowsForApp(appId: string): WindowRecord[] {
    return this.snapshot.windows.filter((w) => appIdMatches(w.appId, appId));
  }

  getAllWindows(): WindowRecord[] {
    return [...this.snapshot.windows];
  }

  /**
   * Override the count for one app (used when no backend supplies data).
   * A count of zero or less removes the entry. The next successful poll
   * replaces all overrides.
   */
  setWindowCount(appId: string, count: number): void {
    const key = appId.toLowerCase();
    const n = Number.isFinite(count) ? Math.trunc(count) : 0;
    const counts = new Map(this.snapshot.counts);
    if (n <= 0) {
      if (!counts.delete(key)) return;
    } else {
      counts.set(key, n);
    }
    this.snapshot = Object.freeze({ ...this.snapshot, counts });
  }
}
