#!/usr/bin/env node
/**
 * CLI: print which applications have windows open in this session.
 */

import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { loadConfig, isBackendChoice, isLogLevel, type TrackerConfig } from "./config.js";
import { buildSnapshotEnvelope, formatAppWindows, formatOverview, sessionNotice } from "./format.js";
import { WindowTracker } from "./index.js";
import { createLogger } from "./logger.js";

const HELP = `dockwatch: list application windows on KDE, GNOME, Hyprland and Sway

Options:
  --backend <name>     Force a backend: auto, kde, gnome, hyprland, sway, none
  --app <id>           Only report windows of this app (fuzzy match)
  --watch              Keep polling and print every new snapshot
  --interval <ms>      Poll interval for --watch (default 2000)
  --timeout <ms>       Per-poll timeout (default 5000)
  --json               Print the JSON snapshot instead of text
  --json-out <file>    Also write the JSON snapshot to a file
  --log-level <level>  silent, error, warn, info, debug
  --verbose            Same as --log-level debug
  -h, --help           Show this help message`;

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--${name} expects a positive integer, got '${value}'`);
  }
  return n;
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      backend: { type: "string" },
      app: { type: "string" },
      watch: { type: "boolean", default: false },
      interval: { type: "string" },
      timeout: { type: "string" },
      json: { type: "boolean", default: false },
      "json-out": { type: "string" },
      "log-level": { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const base = loadConfig();
  const config: TrackerConfig = { ...base };

  if (values.backend !== undefined) {
    const backend = values.backend.toLowerCase();
    if (!isBackendChoice(backend)) throw new Error(`Unknown backend '${values.backend}'`);
    config.backend = backend;
  }
  if (values["log-level"] !== undefined) {
    const level = values["log-level"].toLowerCase();
    if (!isLogLevel(level)) throw new Error(`Unknown log level '${values["log-level"]}'`);
    config.logLevel = level;
  }
  if (values.verbose) config.logLevel = "debug";
  config.pollIntervalMs = parsePositiveInt("interval", values.interval, base.pollIntervalMs);
  config.pollTimeoutMs = parsePositiveInt("timeout", values.timeout, base.pollTimeoutMs);

  const logger = createLogger({ level: config.logLevel, prefix: "[dockwatch]" });
  const tracker = await WindowTracker.create({
    backend: config.backend,
    pollIntervalMs: config.pollIntervalMs,
    pollTimeoutMs: config.pollTimeoutMs,
    kdeScriptWaitMs: config.kdeScriptWaitMs,
    logger,
  });

  const render = (): string => {
    const snapshot = tracker.getSnapshot();
    const backend = tracker.getBackendKind();
    if (values.json) {
      return JSON.stringify(buildSnapshotEnvelope(snapshot, { backend }), null, 2) + "\n";
    }
    if (values.app !== undefined) {
      return formatAppWindows(
        values.app,
        tracker.getWindowCount(values.app),
        tracker.getWindowsForApp(values.app),
      );
    }
    return formatOverview(snapshot, { backend });
  };

  const writeJsonOut = (): void => {
    const file = values["json-out"];
    if (file === undefined) return;
    const envelope = buildSnapshotEnvelope(tracker.getSnapshot(), {
      backend: tracker.getBackendKind(),
    });
    writeFileSync(file, JSON.stringify(envelope, null, 2), "utf-8");
  };

  if (!values.watch) {
    const outcome = await tracker.refresh();
    if (outcome === "failed") {
      console.error(`Error: ${tracker.lastError?.message ?? "poll failed"}`);
      return 1;
    }
    const notice = sessionNotice(tracker.getBackendKind());
    if (notice !== null) console.error(notice);
    process.stdout.write(render());
    writeJsonOut();
    return 0;
  }

  // The unknown backend never produces a snapshot, so say so once up front.
  const notice = sessionNotice(tracker.getBackendKind());
  if (notice !== null) console.error(notice);

  let lastSeen: number | null = null;
  const printer = setInterval(() => {
    const { updatedAt } = tracker.getSnapshot();
    if (updatedAt === null || updatedAt === lastSeen) return;
    lastSeen = updatedAt;
    process.stdout.write(render());
    writeJsonOut();
  }, Math.min(config.pollIntervalMs, 500));

  tracker.start();

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      clearInterval(printer);
      tracker.stop();
      resolve();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
  await tracker.idle();
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  },
);
