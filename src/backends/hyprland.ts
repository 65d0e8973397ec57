/**
 * Hyprland backend: request socket, `j/clients`.
 *
 * The compositor answers one request per connection and closes the socket,
 * so the whole stream is a single JSON document.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import type { WindowBackend } from "../base.js";
import { ConnectionFailure, ProtocolFailure, getErrorMessage } from "../errors.js";
import { connectUnix, requestUntilClose } from "../transport/unix-socket.js";
import type { WindowRecord } from "../types.js";

export const HYPRLAND_CLIENTS_REQUEST = "j/clients";

const clientSchema = z
  .object({
    address: z.string(),
    title: z.string(),
    class: z.string(),
    focusHistoryID: z.number().optional(),
  })
  .passthrough();

const clientsSchema = z.array(clientSchema);

/**
 * Socket path for a Hyprland instance. Hyprland 0.40+ places it under
 * $XDG_RUNTIME_DIR/hypr; older releases under /tmp/hypr.
 */
export function hyprlandSocketPath(
  signature: string,
  env: NodeJS.ProcessEnv = process.env,
  exists: (path: string) => boolean = existsSync,
): string {
  const legacy = join("/tmp", "hypr", signature, ".socket.sock");
  const runtimeDir = env.XDG_RUNTIME_DIR;
  if (runtimeDir) {
    const current = join(runtimeDir, "hypr", signature, ".socket.sock");
    if (exists(current)) return current;
  }
  return legacy;
}

/**
 * Parse the `j/clients` reply: one record per client with a non-empty
 * class, `appId = class`, `id = address`.
 *
 * @throws {ProtocolFailure} On an empty body, invalid JSON or a client
 *   missing a required field.
 */
export function parseHyprlandClients(body: string): WindowRecord[] {
  if (body.trim() === "") {
    throw new ProtocolFailure("hyprland", "Empty reply to j/clients");
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new ProtocolFailure("hyprland", `Invalid JSON from j/clients: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = clientsSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolFailure("hyprland", `Unexpected j/clients shape: ${parsed.error.message}`);
  }

  // Unmapped and layer-like clients report an empty class; they are not app windows.
  return parsed.data
    .filter((client) => client.class !== "")
    .map((client) => ({
      id: client.address,
      title: client.title,
      appId: client.class,
      isFocused: client.focusHistoryID === 0,
    }));
}

export class HyprlandBackend implements WindowBackend {
  readonly kind = "hyprland" as const;
  private readonly socketPath: string | null;

  /**
   * @param options.socketPath - Explicit socket, bypassing signature lookup.
   */
  constructor(options?: { socketPath?: string; env?: NodeJS.ProcessEnv }) {
    const env = options?.env ?? process.env;
    const signature = env.HYPRLAND_INSTANCE_SIGNATURE;
    this.socketPath = options?.socketPath ?? (signature ? hyprlandSocketPath(signature, env) : null);
  }

  async poll(signal: AbortSignal): Promise<WindowRecord[]> {
    if (this.socketPath === null) {
      throw new ConnectionFailure(this.kind, "HYPRLAND_INSTANCE_SIGNATURE is not set");
    }
    const socket = await connectUnix(this.kind, this.socketPath, signal);
    const body = await requestUntilClose(this.kind, socket, HYPRLAND_CLIENTS_REQUEST, signal);
    return parseHyprlandClients(body.toString("utf-8"));
  }
}
