/**
 * Poll scheduler: drives the backend on a fixed interval and feeds the
 * registry.
 *
 * Polls never overlap: a tick that fires while one is in flight is skipped.
 * A poll that times out is reported as failed at once, but keeps its slot
 * until the backend call itself returns. stop() does not abort an in-flight
 * poll; its result is dropped instead.
 */

import type { WindowBackend } from "./base.js";
import { ProtocolFailure, getErrorMessage, toPollError, type PollError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { WindowRegistry } from "./registry.js";
import type { TickOutcome, WindowRecord } from "./types.js";

export interface SchedulerOptions {
  intervalMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface InFlightPoll {
  /** Settles with the backend call, whatever the tick already reported. */
  done: Promise<void>;
}

export class PollScheduler {
  private readonly backend: WindowBackend;
  private readonly registry: WindowRegistry;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private running = false;
  private inFlight: InFlightPoll | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;
  private lastFailure: PollError | null = null;

  constructor(backend: WindowBackend, registry: WindowRegistry, options?: SchedulerOptions) {
    this.backend = backend;
    this.registry = registry;
    this.intervalMs = options?.intervalMs ?? 2000;
    this.timeoutMs = options?.timeoutMs ?? 5000;
    this.logger = options?.logger ?? silentLogger;
    this.now = options?.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Failure of the most recent completed poll, cleared by a success. */
  get lastError(): PollError | null {
    return this.lastFailure;
  }

  /** Begin polling: one tick now, then one every interval. No-op if running. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    this.logger.info(`Polling ${this.backend.kind} every ${this.intervalMs}ms`);
    this.loop(this.generation);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info("Polling stopped");
  }

  /** Resolve once the poll currently in flight (if any) has settled. */
  async idle(): Promise<void> {
    if (this.inFlight) await this.inFlight.done;
  }

  /**
   * Run one poll step. Safe to call directly (tests, manual refresh) whether
   * or not the scheduler is running. Never rejects.
   */
  tick(): Promise<TickOutcome> {
    if (this.inFlight) {
      this.logger.debug("Previous poll still in flight, skipping tick");
      return Promise.resolve("skipped");
    }
    if (this.backend.kind === "unknown") {
      return Promise.resolve("idle");
    }

    const startedWhileRunning = this.running;
    const generation = this.generation;
    const controller = new AbortController();
    const poll = this.startPoll(controller.signal);
    // Registered before runPoll awaits the poll, so the slot is free by the
    // time a poll that finished in time reports its outcome.
    const release = (): void => {
      if (this.inFlight === slot) this.inFlight = null;
    };
    const slot: InFlightPoll = { done: poll.then(release, release) };
    this.inFlight = slot;
    return this.runPoll(poll, controller, startedWhileRunning, generation);
  }

  private async startPoll(signal: AbortSignal): Promise<WindowRecord[] | null> {
    return this.backend.poll(signal);
  }

  private loop(generation: number): void {
    this.tick()
      .then(() => {
        if (!this.running || generation !== this.generation) return;
        this.timer = setTimeout(() => {
          this.timer = null;
          this.loop(generation);
        }, this.intervalMs);
      })
      .catch((err: unknown) => {
        this.logger.error(`Scheduler loop failed: ${getErrorMessage(err)}`);
      });
  }

  private async runPoll(
    poll: Promise<WindowRecord[] | null>,
    controller: AbortController,
    startedWhileRunning: boolean,
    generation: number,
  ): Promise<TickOutcome> {
    const timer = setTimeout(() => {
      controller.abort(
        new ProtocolFailure(this.backend.kind, `Poll timed out after ${this.timeoutMs}ms`),
      );
    }, this.timeoutMs);

    try {
      const windows = await Promise.race([
        poll,
        abortedPromise(controller.signal),
      ]);

      if (startedWhileRunning && (!this.running || generation !== this.generation)) {
        this.logger.debug("Scheduler stopped during poll, discarding result");
        return "discarded";
      }
      if (windows === null) return "idle";

      this.registry.replace(windows, this.now());
      this.lastFailure = null;
      this.logger.debug(`${this.backend.kind}: ${windows.length} windows`);
      return "updated";
    } catch (err) {
      const failure = toPollError(this.backend.kind, err);
      this.lastFailure = failure;
      this.logger.debug(`${this.backend.kind} poll failed (${failure.failure}): ${failure.message}`);
      return "failed";
    } finally {
      clearTimeout(timer);
    }
  }
}

function abortedPromise(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
