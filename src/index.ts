/**
 * dockwatch: which applications have windows open, on any Linux desktop.
 *
 * Quick start:
 *
 *   import { WindowTracker } from "dockwatch";
 *
 *   const tracker = await WindowTracker.create();
 *   tracker.start();
 *
 *   // later, on the dock's own timer
 *   const running = tracker.getWindowCount("firefox") > 0;
 *   const windows = tracker.getWindowsForApp("firefox");
 *
 *   tracker.stop();
 */

import type { WindowBackend } from "./base.js";
import { DEFAULT_CONFIG, type BackendChoice } from "./config.js";
import type { PollError } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import { childLogger, silentLogger, type Logger } from "./logger.js";
import { WindowRegistry } from "./registry.js";
import { createBackend, resolveBackendKind } from "./router.js";
import { PollScheduler } from "./scheduler.js";
import type { BackendKind, TickOutcome, WindowRecord, WindowSnapshot } from "./types.js";

export interface TrackerOptions {
  /** Force a backend instead of detecting one. */
  backend?: BackendChoice;
  /** Environment to detect the session from (defaults to process.env). */
  env?: NodeJS.ProcessEnv;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  kdeScriptWaitMs?: number;
  logger?: Logger;
  /** Process runner for the D-Bus backends. */
  run?: CommandRunner;
}

// ---------------------------------------------------------------------------
// WindowTracker
// ---------------------------------------------------------------------------

export class WindowTracker {
  private readonly backend: WindowBackend;
  private readonly registry: WindowRegistry;
  private readonly scheduler: PollScheduler;
  private readonly logger: Logger;

  constructor(backend: WindowBackend, options?: Omit<TrackerOptions, "backend" | "env" | "run">) {
    this.backend = backend;
    this.logger = options?.logger ?? silentLogger;
    this.registry = new WindowRegistry();
    this.scheduler = new PollScheduler(backend, this.registry, {
      intervalMs: options?.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs,
      timeoutMs: options?.pollTimeoutMs ?? DEFAULT_CONFIG.pollTimeoutMs,
      logger: childLogger(this.logger, `[${backend.kind}]`),
    });
  }

  /**
   * Detect the session, build its backend, and return a stopped tracker.
   * Async because backends are loaded on demand.
   */
  static async create(options?: TrackerOptions): Promise<WindowTracker> {
    const logger = options?.logger ?? silentLogger;
    const kind = resolveBackendKind(options?.backend ?? "auto", options?.env);
    logger.info(`Window backend: ${kind}`);
    if (kind === "unknown") {
      logger.warn("No supported desktop session detected, window tracking disabled");
    }

    const backend = await createBackend(kind, {
      env: options?.env,
      run: options?.run,
      logger: childLogger(logger, `[${kind}]`),
      kdeScriptWaitMs: options?.kdeScriptWaitMs ?? DEFAULT_CONFIG.kdeScriptWaitMs,
    });
    return new WindowTracker(backend, options);
  }

  // -- lifecycle -----------------------------------------------------------

  start(): void {
    this.scheduler.start();
  }

  /** Stop polling. The last snapshot stays readable. */
  stop(): void {
    this.scheduler.stop();
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  /** Poll once now, outside the interval. Never rejects. */
  refresh(): Promise<TickOutcome> {
    return this.scheduler.tick();
  }

  /** Why the most recent poll failed, or null after a success. */
  get lastError(): PollError | null {
    return this.scheduler.lastError;
  }

  /** Wait for an in-flight poll to settle. */
  idle(): Promise<void> {
    return this.scheduler.idle();
  }

  // -- queries -------------------------------------------------------------

  getBackendKind(): BackendKind {
    return this.backend.kind;
  }

  getWindowCount(appId: string): number {
    return this.registry.getWindowCount(appId);
  }

  getWindowsForApp(appId: string): WindowRecord[] {
    return this.registry.getWindowsForApp(appId);
  }

  getAllWindows(): WindowRecord[] {
    return this.registry.getAllWindows();
  }

  setWindowCount(appId: string, count: number): void {
    this.registry.setWindowCount(appId, count);
  }

  getSnapshot(): WindowSnapshot {
    return this.registry.getSnapshot();
  }
}

// ---------------------------------------------------------------------------
// Re-exports
// ---------------------------------------------------------------------------

export { detectBackend, resolveBackendKind, createBackend } from "./router.js";
export { WindowRegistry, appIdMatches, countWindows } from "./registry.js";
export { PollScheduler } from "./scheduler.js";
export { loadConfig, DEFAULT_CONFIG, ConfigError } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export { PollError, ConnectionFailure, ProtocolFailure } from "./errors.js";
export { formatOverview, buildSnapshotEnvelope } from "./format.js";
export { parseGVariant } from "./gvariant.js";

export type { WindowBackend } from "./base.js";
export type { BackendChoice, TrackerConfig } from "./config.js";
export type { CommandRunner } from "./exec.js";
export type { Logger, LogLevel } from "./logger.js";
export type { SchedulerOptions } from "./scheduler.js";
export type {
  BackendKind,
  SnapshotEnvelope,
  TickOutcome,
  WindowRecord,
  WindowSnapshot,
} from "./types.js";
