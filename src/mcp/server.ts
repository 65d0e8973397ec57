/**
 * dockwatch MCP server: read-only window queries for agents.
 *
 * One tracker is created on first use and keeps polling for the lifetime
 * of the server, so every tool answers from the registry without I/O.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { loadConfig } from "../config.js";
import { buildSnapshotEnvelope, formatOverview } from "../format.js";
import { WindowTracker } from "../index.js";
import { getErrorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

export const server = new McpServer({
  name: "dockwatch",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tracker state
// ---------------------------------------------------------------------------

let _tracker: Promise<WindowTracker> | null = null;

async function startTracker(env: NodeJS.ProcessEnv): Promise<WindowTracker> {
  const config = loadConfig(env);
  // stdout carries the protocol; logs go to stderr only.
  const logger = createLogger({
    level: config.logLevel,
    prefix: "[dockwatch]",
    sink: { debug: console.error, info: console.error, warn: console.error, error: console.error },
  });
  const tracker = await WindowTracker.create({
    backend: config.backend,
    env,
    pollIntervalMs: config.pollIntervalMs,
    pollTimeoutMs: config.pollTimeoutMs,
    kdeScriptWaitMs: config.kdeScriptWaitMs,
    logger,
  });
  await tracker.refresh();
  tracker.start();
  return tracker;
}

/**
 * The shared tracker. Concurrent first calls wait on the same creation, so
 * only one tracker ever polls.
 */
export function getTracker(env: NodeJS.ProcessEnv = process.env): Promise<WindowTracker> {
  if (!_tracker) {
    const pending = startTracker(env);
    _tracker = pending;
    pending.catch(() => {
      // let the next tool call retry
      if (_tracker === pending) _tracker = null;
    });
  }
  return _tracker;
}

/** Stop the shared tracker, waiting for it if it is still being created. Never rejects. */
export async function stopTracker(): Promise<void> {
  const pending = _tracker;
  _tracker = null;
  if (!pending) return;
  try {
    (await pending).stop();
  } catch (err) {
    console.error(`[dockwatch] Tracker failed to start: ${getErrorMessage(err)}`);
  }
}

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

server.tool(
  "window_overview",
  `List every application that has windows open, with its window titles.

The first line names the desktop backend in use (kde, gnome, hyprland,
sway) or "unknown" when the session is not supported. Focused windows
are marked with [fg].`,
  { json: z.boolean().optional().describe("Return the JSON snapshot instead of text") },
  async ({ json }) => {
    const tracker = await getTracker();
    const snapshot = tracker.getSnapshot();
    const backend = tracker.getBackendKind();
    if (json) {
      return text(JSON.stringify(buildSnapshotEnvelope(snapshot, { backend })));
    }
    return text(formatOverview(snapshot, { backend }));
  },
);

server.tool(
  "window_count",
  `How many top-level windows an application has open.

Matching is case-insensitive and either name may contain the other, so
"firefox" matches a "Firefox-esr" window class. 0 means not running
(or not visible to the backend).`,
  { app: z.string().min(1).describe("Application id, command or window class") },
  async ({ app }) => {
    const tracker = await getTracker();
    return text(JSON.stringify({ app, count: tracker.getWindowCount(app) }));
  },
);

server.tool(
  "app_windows",
  `List the windows of one application: id, title and focus state.

Uses the same fuzzy matching as window_count.`,
  { app: z.string().min(1).describe("Application id, command or window class") },
  async ({ app }) => {
    const tracker = await getTracker();
    const windows = tracker.getWindowsForApp(app).map((w) => ({
      id: w.id,
      title: w.title,
      app_id: w.appId,
      focused: w.isFocused,
    }));
    return text(JSON.stringify({ app, windows }));
  },
);
