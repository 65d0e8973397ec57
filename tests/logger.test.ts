/**
 * Tests for the leveled logger.
 */

import { describe, it, expect } from "vitest";
import { childLogger, createLogger, silentLogger } from "../src/logger.js";

function recordingSink() {
  const lines: Array<[string, unknown[]]> = [];
  const at =
    (level: string) =>
    (...args: unknown[]): void => {
      lines.push([level, args]);
    };
  return {
    lines,
    sink: { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") },
  };
}

describe("createLogger", () => {
  it("is silent by default", () => {
    expect(createLogger()).toBe(silentLogger);
    expect(createLogger({ level: "silent" })).toBe(silentLogger);
  });

  it("filters by level", () => {
    const { sink, lines } = recordingSink();
    const logger = createLogger({ level: "warn", sink });
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(lines).toEqual([
      ["warn", ["w"]],
      ["error", ["e"]],
    ]);
  });

  it("prints everything at debug", () => {
    const { sink, lines } = recordingSink();
    const logger = createLogger({ level: "debug", sink });
    logger.debug("d");
    logger.info("i");
    expect(lines.map(([level]) => level)).toEqual(["debug", "info"]);
  });

  it("prepends the prefix to the message", () => {
    const { sink, lines } = recordingSink();
    const logger = createLogger({ level: "info", prefix: "[dockwatch]", sink });
    logger.info("Polling sway every 2000ms", 42);
    logger.info({ detail: true });
    expect(lines).toEqual([
      ["info", ["[dockwatch] Polling sway every 2000ms", 42]],
      ["info", ["[dockwatch]", { detail: true }]],
    ]);
  });
});

describe("childLogger", () => {
  it("adds its prefix after the parent's", () => {
    const { sink, lines } = recordingSink();
    const parent = createLogger({ level: "debug", prefix: "[dockwatch]", sink });
    childLogger(parent, "[kde]").debug("switching to KWin scripting");
    expect(lines).toEqual([["debug", ["[dockwatch] [kde] switching to KWin scripting"]]]);
  });

  it("stays silent under a silent parent", () => {
    expect(childLogger(silentLogger, "[sway]")).toBe(silentLogger);
  });
});
