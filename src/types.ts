/**
 * Core dockwatch type definitions.
 */

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export type BackendKind = "kde" | "gnome" | "hyprland" | "sway" | "unknown";

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

/** One top-level window as reported by the active backend. */
export interface WindowRecord {
  /** Backend-scoped opaque identifier (Hyprland address, Sway node id, ...). */
  readonly id: string;
  readonly title: string;
  readonly appId: string;
  readonly isFocused: boolean;
}

/**
 * Registry state. Records and counts come from the same poll (or from the
 * same override), and are replaced together.
 */
export interface WindowSnapshot {
  readonly windows: readonly WindowRecord[];
  /** Lower-cased app id -> window count. Zero counts are never stored. */
  readonly counts: ReadonlyMap<string, number>;
  /** Epoch ms of the poll that produced the records, null before the first. */
  readonly updatedAt: number | null;
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export type TickOutcome =
  | "updated"
  | "failed"
  | "skipped"
  | "idle"
  | "discarded";

// ---------------------------------------------------------------------------
// Output envelope
// ---------------------------------------------------------------------------

export interface SnapshotEnvelope {
  version: string;
  backend: BackendKind;
  timestamp: number;
  updatedAt: number | null;
  counts: Record<string, number>;
  windows: Array<{
    id: string;
    title: string;
    app_id: string;
    focused: boolean;
  }>;
}
