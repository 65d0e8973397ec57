/**
 * KDE backend: KWin over the session bus.
 *
 * Primary path: org.kde.KWin.queryWindowInfo on /KWin. When that call fails
 * or its reply carries no window, the backend switches to the scripting
 * path for the rest of the session:
 *
 *   1. write a one-shot KWin script that prints a marker line followed by
 *      the window list as JSON,
 *   2. load it through org.kde.kwin.Scripting and run it,
 *   3. read the marker line back from the user journal, waiting at most
 *      `scriptWaitMs`,
 *   4. unload the plugin and delete the script file.
 */

import { randomUUID } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";

import type { WindowBackend } from "../base.js";
import { PollError, ProtocolFailure, getErrorMessage } from "../errors.js";
import type { CommandRunner } from "../exec.js";
import { runCommand } from "../exec.js";
import {
  dictBoolean,
  dictString,
  formatGVariantString,
  isGVariantDict,
  type GVariant,
  type GVariantKey,
} from "../gvariant.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { WindowRecord } from "../types.js";
import { GdbusClient, type DbusTarget } from "./dbus.js";

const KWIN_SERVICE = "org.kde.KWin";
const SCRIPTING_IFACE = "org.kde.kwin.Scripting";
const PLUGIN_NAME = "dockwatch-windows";

export const KWIN_QUERY_WINDOW_INFO: DbusTarget = {
  dest: KWIN_SERVICE,
  objectPath: "/KWin",
  method: "org.kde.KWin.queryWindowInfo",
};

const scriptWindowSchema = z.object({
  id: z.string(),
  appId: z.string(),
  title: z.string(),
  active: z.boolean(),
});

const scriptResultSchema = z.array(scriptWindowSchema);

// ---------------------------------------------------------------------------
// Primary path
// ---------------------------------------------------------------------------

function recordFromWindowInfo(info: Map<GVariantKey, GVariant>): WindowRecord | null {
  const appId = dictString(info, "resourceClass") || dictString(info, "resourceName");
  if (!appId) return null;
  return {
    id: dictString(info, "uuid") ?? dictString(info, "internalId") ?? "",
    title: dictString(info, "caption") ?? "",
    appId,
    isFocused: dictBoolean(info, "active"),
  };
}

/**
 * Parse the queryWindowInfo out-arguments: either one property bag or a
 * list of them.
 *
 * @throws {ProtocolFailure} When the reply describes no window at all.
 */
export function parseKWinWindowInfo(reply: GVariant[]): WindowRecord[] {
  const first = reply[0];
  const bags = Array.isArray(first) ? first : [first];
  const records: WindowRecord[] = [];
  for (const bag of bags) {
    if (!isGVariantDict(bag)) continue;
    const record = recordFromWindowInfo(bag);
    if (record) records.push(record);
  }
  if (records.length === 0) {
    throw new ProtocolFailure("kde", "queryWindowInfo returned no window information");
  }
  return records;
}

// ---------------------------------------------------------------------------
// Scripting path
// ---------------------------------------------------------------------------

/** Source of the one-shot enumeration script. */
export function buildKWinScript(marker: string): string {
  return `(function () {
  var list = typeof workspace.windowList === "function"
    ? workspace.windowList()
    : workspace.clientList();
  var out = [];
  for (var i = 0; i < list.length; i++) {
    var w = list[i];
    if (!w.normalWindow || w.skipTaskbar) continue;
    out.push({
      id: String(w.internalId),
      appId: String(w.resourceClass || w.resourceName || ""),
      title: String(w.caption || ""),
      active: !!w.active
    });
  }
  print(${JSON.stringify(marker)} + JSON.stringify(out));
})();
`;
}

/**
 * Find the marker line in journal output and parse the JSON after it.
 * Returns null when the marker has not been logged yet.
 */
export function parseScriptOutput(journal: string, marker: string): WindowRecord[] | null {
  const line = journal.split("\n").find((l) => l.includes(marker));
  if (line === undefined) return null;

  const json = line.slice(line.indexOf(marker) + marker.length).trim();
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ProtocolFailure("kde", `KWin script printed invalid JSON: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = scriptResultSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolFailure("kde", `KWin script result has unexpected shape: ${parsed.error.message}`);
  }

  return parsed.data
    .filter((w) => w.appId.length > 0)
    .map((w) => ({ id: w.id, title: w.title, appId: w.appId, isFocused: w.active }));
}

function firstNumber(reply: GVariant[]): number | null {
  const id = reply[0];
  if (typeof id === "number") return id;
  if (typeof id === "bigint") return Number(id);
  return null;
}

// ---------------------------------------------------------------------------
// KdeBackend
// ---------------------------------------------------------------------------

export interface KdeBackendOptions {
  run?: CommandRunner;
  logger?: Logger;
  /** Upper bound on waiting for the script's output to reach the journal. */
  scriptWaitMs?: number;
  /** Pause between journal reads. */
  scriptPollMs?: number;
}

export class KdeBackend implements WindowBackend {
  readonly kind = "kde" as const;
  private readonly bus: GdbusClient;
  private readonly run: CommandRunner;
  private readonly logger: Logger;
  private readonly scriptWaitMs: number;
  private readonly scriptPollMs: number;
  private useScripting = false;

  constructor(options?: KdeBackendOptions) {
    this.run = options?.run ?? runCommand;
    this.bus = new GdbusClient(this.kind, this.run);
    this.logger = options?.logger ?? silentLogger;
    this.scriptWaitMs = options?.scriptWaitMs ?? 1500;
    this.scriptPollMs = options?.scriptPollMs ?? 100;
  }

  /** Whether the primary path has been abandoned for this session. */
  get scriptingMode(): boolean {
    return this.useScripting;
  }

  async poll(signal: AbortSignal): Promise<WindowRecord[]> {
    if (!this.useScripting) {
      try {
        const reply = await this.bus.call(KWIN_QUERY_WINDOW_INFO, [], { signal, timeout: 1000 });
        return parseKWinWindowInfo(reply);
      } catch (err) {
        if (signal.aborted) throw err;
        this.logger.debug(`queryWindowInfo unusable (${getErrorMessage(err)}), switching to KWin scripting`);
        this.useScripting = true;
      }
    }
    return this.pollViaScript(signal);
  }

  private async pollViaScript(signal: AbortSignal): Promise<WindowRecord[]> {
    const marker = `dockwatch:${randomUUID()}:`;
    const dir = await mkdtemp(join(tmpdir(), "dockwatch-"));
    const scriptPath = join(dir, "windows.js");
    const startedAt = Date.now();

    try {
      await writeFile(scriptPath, buildKWinScript(marker), "utf-8");

      const loaded = await this.bus.call(
        { dest: KWIN_SERVICE, objectPath: "/Scripting", method: `${SCRIPTING_IFACE}.loadScript` },
        [formatGVariantString(scriptPath), formatGVariantString(PLUGIN_NAME)],
        { signal },
      );
      const scriptId = firstNumber(loaded);
      if (scriptId === null || scriptId < 0) {
        throw new ProtocolFailure(this.kind, "KWin refused to load the enumeration script");
      }

      await this.runScript(scriptId, signal);
      return await this.awaitScriptOutput(marker, startedAt, signal);
    } finally {
      await this.unloadScript();
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async runScript(scriptId: number, signal: AbortSignal): Promise<void> {
    // KWin 6 exports scripts under /Scripting/Script<N>, KWin 5 under /<N>.
    const paths = [`/Scripting/Script${scriptId}`, `/${scriptId}`];
    let lastError: unknown = null;
    for (const objectPath of paths) {
      try {
        await this.bus.callRaw(
          { dest: KWIN_SERVICE, objectPath, method: "org.kde.kwin.Script.run" },
          [],
          { signal },
        );
        return;
      } catch (err) {
        if (signal.aborted) throw err;
        lastError = err;
      }
    }
    throw lastError instanceof PollError
      ? lastError
      : new ProtocolFailure(this.kind, "Could not run KWin script", { cause: lastError });
  }

  private async awaitScriptOutput(
    marker: string,
    startedAt: number,
    signal: AbortSignal,
  ): Promise<WindowRecord[]> {
    const since = `@${Math.floor(startedAt / 1000) - 1}`;
    const deadline = Date.now() + this.scriptWaitMs;

    for (;;) {
      const journal = await this.readJournal(since, signal);
      const records = parseScriptOutput(journal, marker);
      if (records !== null) return records;

      if (Date.now() >= deadline) {
        throw new ProtocolFailure(
          this.kind,
          `KWin script output did not appear within ${this.scriptWaitMs}ms`,
        );
      }
      try {
        await delay(this.scriptPollMs, undefined, { signal });
      } catch (err) {
        const reason: unknown = signal.reason;
        throw reason instanceof PollError
          ? reason
          : new ProtocolFailure(this.kind, "Waiting for KWin script output aborted", { cause: err });
      }
    }
  }

  private async readJournal(since: string, signal: AbortSignal): Promise<string> {
    try {
      return await this.run(
        "journalctl",
        ["--user", "--output", "cat", "--no-pager", "--since", since],
        { signal, timeout: 3000 },
      );
    } catch (err) {
      const reason: unknown = signal.reason;
      if (signal.aborted && reason instanceof PollError) throw reason;
      throw new ProtocolFailure(this.kind, `Could not read KWin script output: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async unloadScript(): Promise<void> {
    try {
      await this.bus.callRaw(
        { dest: KWIN_SERVICE, objectPath: "/Scripting", method: `${SCRIPTING_IFACE}.unloadScript` },
        [formatGVariantString(PLUGIN_NAME)],
      );
    } catch (err) {
      this.logger.debug(`unloadScript failed: ${getErrorMessage(err)}`);
    }
  }
}
