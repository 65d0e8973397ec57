/**
 * Session detection and backend dispatch.
 */

import type { WindowBackend } from "./base.js";
import type { BackendChoice } from "./config.js";
import type { CommandRunner } from "./exec.js";
import type { Logger } from "./logger.js";
import type { BackendKind } from "./types.js";

/**
 * Pick the backend for this session. Compositor-specific markers win over
 * desktop names because they are unambiguous; some sessions set both.
 */
export function detectBackend(env: NodeJS.ProcessEnv = process.env): BackendKind {
  if (env.HYPRLAND_INSTANCE_SIGNATURE) return "hyprland";
  if (env.SWAYSOCK) return "sway";

  const desktops = [env.XDG_CURRENT_DESKTOP ?? "", env.XDG_SESSION_DESKTOP ?? ""].map((d) =>
    d.toLowerCase(),
  );
  if (desktops.some((d) => d.includes("kde") || d.includes("plasma"))) return "kde";
  if (desktops.some((d) => d.includes("gnome"))) return "gnome";

  return "unknown";
}

/** Apply a configured override on top of detection. */
export function resolveBackendKind(
  choice: BackendChoice = "auto",
  env: NodeJS.ProcessEnv = process.env,
): BackendKind {
  if (choice === "auto") return detectBackend(env);
  if (choice === "none") return "unknown";
  return choice;
}

export interface BackendOptions {
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
  logger?: Logger;
  kdeScriptWaitMs?: number;
}

export async function createBackend(
  kind: BackendKind,
  options?: BackendOptions,
): Promise<WindowBackend> {
  switch (kind) {
    case "kde": {
      const { KdeBackend } = await import("./backends/kde.js");
      return new KdeBackend({
        run: options?.run,
        logger: options?.logger,
        scriptWaitMs: options?.kdeScriptWaitMs,
      });
    }
    case "gnome": {
      const { GnomeBackend } = await import("./backends/gnome.js");
      return new GnomeBackend({ run: options?.run });
    }
    case "hyprland": {
      const { HyprlandBackend } = await import("./backends/hyprland.js");
      return new HyprlandBackend({ env: options?.env });
    }
    case "sway": {
      const { SwayBackend } = await import("./backends/sway.js");
      return new SwayBackend({ env: options?.env });
    }
    case "unknown": {
      const { UnsupportedBackend } = await import("./backends/unsupported.js");
      return new UnsupportedBackend();
    }
  }
}
