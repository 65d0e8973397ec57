/**
 * Tests for the KDE backend: queryWindowInfo and the KWin scripting path.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { describe, it, expect } from "vitest";

import {
  KdeBackend,
  buildKWinScript,
  parseKWinWindowInfo,
  parseScriptOutput,
} from "../src/backends/kde.js";
import { ProtocolFailure } from "../src/errors.js";
import type { CommandRunner } from "../src/exec.js";
import { parseGVariant } from "../src/gvariant.js";
import type { WindowRecord } from "../src/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Call {
  file: string;
  args: string[];
}

function argAfter(args: string[], flag: string): string {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : "";
}

function unquote(literal: string): string {
  const value = parseGVariant(literal);
  if (typeof value !== "string") throw new Error(`expected a string literal, got ${literal}`);
  return value;
}

/** Short label for a call: "<object path> <method>" for gdbus, the program otherwise. */
function label(call: Call): string {
  if (call.file !== "gdbus") return call.file;
  return `${argAfter(call.args, "--object-path")} ${argAfter(call.args, "--method")}`;
}

type Responder = (call: Call) => string | Error;

function fakeRunner(respond: Responder): { run: CommandRunner; calls: Call[] } {
  const calls: Call[] = [];
  const run: CommandRunner = async (file, args) => {
    const call = { file, args };
    calls.push(call);
    const result = respond(call);
    if (result instanceof Error) throw result;
    return result;
  };
  return { run, calls };
}

function dbusError(name: string, text: string): Error {
  return Object.assign(new Error("Command failed"), {
    code: 1,
    stderr: `Error: GDBus.Error:${name}: ${text}\n`,
  });
}

const UNKNOWN_METHOD = dbusError(
  "org.freedesktop.DBus.Error.UnknownMethod",
  "No such method 'queryWindowInfo'",
);

const SCRIPT_WINDOWS = [
  { id: "{aaa}", appId: "org.kde.dolphin", title: "Home", active: true },
  { id: "{bbb}", appId: "", title: "Plasma panel", active: false },
  { id: "{ccc}", appId: "firefox", title: "News", active: false },
];

/**
 * Simulates KWin's scripting interface: remembers the marker of the last
 * loaded script and logs it to the journal once the script runs.
 */
function kwinScripting(options: {
  primary?: string | Error;
  loadReply?: string;
  failKwin6Path?: boolean;
  logOutput?: boolean;
}): { respond: Responder; scriptPaths: string[] } {
  const scriptPaths: string[] = [];
  let marker = "";
  let ran = false;

  const respond: Responder = (call) => {
    const what = label(call);
    if (what === "/KWin org.kde.KWin.queryWindowInfo") return options.primary ?? UNKNOWN_METHOD;
    if (what === "/Scripting org.kde.kwin.Scripting.loadScript") {
      const tail = call.args.slice(-2);
      const path = unquote(tail[0]);
      scriptPaths.push(path);
      const source = readFileSync(path, "utf-8");
      marker = /print\("([^"]+)"/.exec(source)?.[1] ?? "";
      return options.loadReply ?? "(7,)";
    }
    if (what === "/Scripting/Script7 org.kde.kwin.Script.run") {
      if (options.failKwin6Path) {
        return dbusError("org.freedesktop.DBus.Error.UnknownObject", "No such object path '/Scripting/Script7'");
      }
      ran = true;
      return "()";
    }
    if (what === "/7 org.kde.kwin.Script.run") {
      ran = true;
      return "()";
    }
    if (what === "/Scripting org.kde.kwin.Scripting.unloadScript") return "(true,)";
    if (what === "journalctl") {
      const lines = ["kwin_wayland: something unrelated"];
      if (ran && options.logOutput !== false) lines.push(`${marker}${JSON.stringify(SCRIPT_WINDOWS)}`);
      return lines.join("\n") + "\n";
    }
    return new Error(`unexpected call: ${what}`);
  };

  return { respond, scriptPaths };
}

const SCRIPT_RECORDS: WindowRecord[] = [
  { id: "{aaa}", title: "Home", appId: "org.kde.dolphin", isFocused: true },
  { id: "{ccc}", title: "News", appId: "firefox", isFocused: false },
];

// ---------------------------------------------------------------------------
// parseKWinWindowInfo
// ---------------------------------------------------------------------------

describe("parseKWinWindowInfo", () => {
  function parse(text: string): WindowRecord[] {
    const reply = parseGVariant(text);
    if (!Array.isArray(reply)) throw new Error("expected a tuple");
    return parseKWinWindowInfo(reply);
  }

  it("reads a single property bag", () => {
    expect(
      parse("({'resourceClass': <'konsole'>, 'caption': <'~ : bash'>, 'uuid': <'{0f1e}'>, 'active': <true>},)"),
    ).toEqual([{ id: "{0f1e}", title: "~ : bash", appId: "konsole", isFocused: true }]);
  });

  it("reads a list of property bags", () => {
    const records = parse(
      "([{'resourceClass': <'konsole'>, 'uuid': <'{1}'>}, {'resourceName': <'kate'>, 'internalId': <'{2}'>}],)",
    );
    expect(records).toEqual([
      { id: "{1}", title: "", appId: "konsole", isFocused: false },
      { id: "{2}", title: "", appId: "kate", isFocused: false },
    ]);
  });

  it("fails when no window is described", () => {
    expect(() => parse("(@a{sv} {},)")).toThrow("queryWindowInfo returned no window information");
  });
});

// ---------------------------------------------------------------------------
// Script helpers
// ---------------------------------------------------------------------------

describe("buildKWinScript", () => {
  it("prints the marker followed by JSON", () => {
    const source = buildKWinScript("dockwatch:test:");
    expect(source).toContain('print("dockwatch:test:" + JSON.stringify(out));');
    expect(source).toContain("workspace.windowList()");
    expect(source).toContain("workspace.clientList()");
  });
});

describe("parseScriptOutput", () => {
  const marker = "dockwatch:m1:";

  it("returns null until the marker is logged", () => {
    expect(parseScriptOutput("kwin: starting\n", marker)).toBeNull();
  });

  it("parses the JSON after the marker and drops empty app ids", () => {
    const journal = `noise\njs: ${marker}${JSON.stringify(SCRIPT_WINDOWS)}\nmore noise\n`;
    expect(parseScriptOutput(journal, marker)).toEqual(SCRIPT_RECORDS);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseScriptOutput(`${marker}[{`, marker)).toThrow(ProtocolFailure);
  });

  it("rejects JSON of the wrong shape", () => {
    expect(() => parseScriptOutput(`${marker}[{"id": 1}]`, marker)).toThrow(
      "KWin script result has unexpected shape",
    );
  });
});

// ---------------------------------------------------------------------------
// KdeBackend
// ---------------------------------------------------------------------------

describe("KdeBackend", () => {
  it("uses queryWindowInfo when it answers", async () => {
    const { run, calls } = fakeRunner(
      kwinScripting({ primary: "({'resourceClass': <'konsole'>, 'uuid': <'{1}'>, 'active': <true>},)" }).respond,
    );
    const backend = new KdeBackend({ run });
    const records = await backend.poll(new AbortController().signal);

    expect(records).toEqual([{ id: "{1}", title: "", appId: "konsole", isFocused: true }]);
    expect(calls.map(label)).toEqual(["/KWin org.kde.KWin.queryWindowInfo"]);
    expect(backend.scriptingMode).toBe(false);
  });

  it("falls back to a KWin script and reads its output from the journal", async () => {
    const sim = kwinScripting({});
    const { run, calls } = fakeRunner(sim.respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    const records = await backend.poll(new AbortController().signal);

    expect(records).toEqual(SCRIPT_RECORDS);
    expect(backend.scriptingMode).toBe(true);
    expect(calls.map(label)).toEqual([
      "/KWin org.kde.KWin.queryWindowInfo",
      "/Scripting org.kde.kwin.Scripting.loadScript",
      "/Scripting/Script7 org.kde.kwin.Script.run",
      "journalctl",
      "/Scripting org.kde.kwin.Scripting.unloadScript",
    ]);
  });

  it("passes the script path and plugin name to loadScript", async () => {
    const sim = kwinScripting({});
    const { run, calls } = fakeRunner(sim.respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    await backend.poll(new AbortController().signal);

    const load = calls[1];
    expect(unquote(load.args[load.args.length - 1])).toBe("dockwatch-windows");
    expect(sim.scriptPaths[0]).toMatch(/windows\.js$/);
    const journal = calls[3];
    expect(journal.args.slice(0, 5)).toEqual(["--user", "--output", "cat", "--no-pager", "--since"]);
    expect(journal.args[5]).toMatch(/^@\d+$/);
  });

  it("removes the temporary script after the poll", async () => {
    const sim = kwinScripting({});
    const { run } = fakeRunner(sim.respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    await backend.poll(new AbortController().signal);

    expect(sim.scriptPaths).toHaveLength(1);
    expect(existsSync(sim.scriptPaths[0])).toBe(false);
    expect(existsSync(dirname(sim.scriptPaths[0]))).toBe(false);
  });

  it("stays on the scripting path for later polls", async () => {
    const { run, calls } = fakeRunner(kwinScripting({}).respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    await backend.poll(new AbortController().signal);
    calls.length = 0;
    await backend.poll(new AbortController().signal);

    expect(calls.map(label)[0]).toBe("/Scripting org.kde.kwin.Scripting.loadScript");
  });

  it("falls back when queryWindowInfo describes no window", async () => {
    const { run } = fakeRunner(kwinScripting({ primary: "(@a{sv} {},)" }).respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    expect(await backend.poll(new AbortController().signal)).toEqual(SCRIPT_RECORDS);
    expect(backend.scriptingMode).toBe(true);
  });

  it("runs the script under the KWin 5 object path when the KWin 6 one is missing", async () => {
    const { run, calls } = fakeRunner(kwinScripting({ failKwin6Path: true }).respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 500, scriptPollMs: 5 });
    expect(await backend.poll(new AbortController().signal)).toEqual(SCRIPT_RECORDS);
    expect(calls.map(label)).toContain("/7 org.kde.kwin.Script.run");
  });

  it("fails when the script output never reaches the journal, and still unloads", async () => {
    const { run, calls } = fakeRunner(kwinScripting({ logOutput: false }).respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 0, scriptPollMs: 5 });
    const poll = backend.poll(new AbortController().signal);

    await expect(poll).rejects.toBeInstanceOf(ProtocolFailure);
    await expect(poll).rejects.toThrow("KWin script output did not appear within 0ms");
    expect(calls.map(label).at(-1)).toBe("/Scripting org.kde.kwin.Scripting.unloadScript");
  });

  it("fails when KWin refuses the script", async () => {
    const { run } = fakeRunner(kwinScripting({ loadReply: "(-1,)" }).respond);
    const backend = new KdeBackend({ run, scriptWaitMs: 0 });
    await expect(backend.poll(new AbortController().signal)).rejects.toThrow(
      "KWin refused to load the enumeration script",
    );
  });

  it("does not switch paths when the poll itself was aborted", async () => {
    const controller = new AbortController();
    const reason = new ProtocolFailure("kde", "Poll timed out after 5ms");
    const { run, calls } = fakeRunner(() => {
      controller.abort(reason);
      return Object.assign(new Error("The operation was aborted"), { code: "ABORT_ERR" });
    });
    const backend = new KdeBackend({ run });

    await expect(backend.poll(controller.signal)).rejects.toBe(reason);
    expect(backend.scriptingMode).toBe(false);
    expect(calls).toHaveLength(1);
  });
});
