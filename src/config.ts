/**
 * Environment-driven configuration.
 *
 * Every knob has a default; CLI flags layer on top of what this returns.
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { BackendKind } from "./types.js";

export type BackendChoice = "auto" | Exclude<BackendKind, "unknown"> | "none";

export const BACKEND_CHOICES: readonly BackendChoice[] = [
  "auto",
  "kde",
  "gnome",
  "hyprland",
  "sway",
  "none",
];

export interface TrackerConfig {
  backend: BackendChoice;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  kdeScriptWaitMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: TrackerConfig = {
  backend: "auto",
  pollIntervalMs: 2000,
  pollTimeoutMs: 5000,
  kdeScriptWaitMs: 1500,
  logLevel: "warn",
};

const millis = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const envSchema = z.object({
  DOCKWATCH_BACKEND: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["auto", "kde", "gnome", "hyprland", "sway", "none"]))
    .default(DEFAULT_CONFIG.backend),
  DOCKWATCH_POLL_INTERVAL_MS: millis(100, 600_000).default(DEFAULT_CONFIG.pollIntervalMs),
  DOCKWATCH_POLL_TIMEOUT_MS: millis(50, 120_000).default(DEFAULT_CONFIG.pollTimeoutMs),
  DOCKWATCH_KDE_SCRIPT_WAIT_MS: millis(0, 30_000).default(DEFAULT_CONFIG.kdeScriptWaitMs),
  DOCKWATCH_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["silent", "error", "warn", "info", "debug"]))
    .default(DEFAULT_CONFIG.logLevel),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read the tracker configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws {ConfigError} When a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid dockwatch configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    backend: data.DOCKWATCH_BACKEND,
    pollIntervalMs: data.DOCKWATCH_POLL_INTERVAL_MS,
    pollTimeoutMs: data.DOCKWATCH_POLL_TIMEOUT_MS,
    kdeScriptWaitMs: data.DOCKWATCH_KDE_SCRIPT_WAIT_MS,
    logLevel: data.DOCKWATCH_LOG_LEVEL,
  };
}

export function isBackendChoice(value: string): value is BackendChoice {
  return BACKEND_CHOICES.some((choice) => choice === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
