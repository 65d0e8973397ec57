/**
 * Sway backend: GET_TREE over the i3-ipc socket named by $SWAYSOCK.
 */

import { z } from "zod";

import type { WindowBackend } from "../base.js";
import { ConnectionFailure, ProtocolFailure, getErrorMessage } from "../errors.js";
import {
  I3_IPC_HEADER_LENGTH,
  I3_IPC_MESSAGE,
  decodeI3IpcHeader,
  encodeI3IpcMessage,
} from "../transport/i3-ipc.js";
import { ExactReader, connectUnix } from "../transport/unix-socket.js";
import type { WindowRecord } from "../types.js";

/** Node types that hold a client window. */
const WINDOW_NODE_TYPES = new Set(["con", "floating_con"]);

// Shallow on purpose: children are checked as the walk reaches them.
const swayNodeSchema = z.object({
  id: z.number().optional(),
  type: z.string().optional(),
  name: z.string().nullable().optional(),
  app_id: z.string().nullable().optional(),
  focused: z.boolean().optional(),
  window_properties: z.object({ class: z.string().optional() }).passthrough().optional(),
  nodes: z.array(z.unknown()).optional(),
  floating_nodes: z.array(z.unknown()).optional(),
});

type SwayNode = z.infer<typeof swayNodeSchema>;

function windowAppId(node: SwayNode): string | null {
  if (node.app_id) return node.app_id;
  // XWayland clients carry their class here instead of app_id.
  const cls = node.window_properties?.class;
  return cls ? cls : null;
}

/**
 * Collect windows from a GET_TREE document, in document order.
 *
 * Iterative: tree depth only grows the explicit stack, never the call stack.
 *
 * @throws {ProtocolFailure} If any node is not an object of the expected shape.
 */
export function collectSwayWindows(tree: unknown): WindowRecord[] {
  const windows: WindowRecord[] = [];
  const stack: unknown[] = [tree];

  while (stack.length > 0) {
    const raw = stack.pop();
    const parsed = swayNodeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolFailure("sway", `Malformed tree node: ${parsed.error.message}`);
    }
    const node = parsed.data;

    if (node.type !== undefined && WINDOW_NODE_TYPES.has(node.type)) {
      const appId = windowAppId(node);
      if (appId) {
        windows.push({
          id: String(node.id ?? ""),
          title: node.name ?? "",
          appId,
          isFocused: node.focused ?? false,
        });
      }
    }

    // Pushed in reverse so children pop in document order: nodes, then floating_nodes.
    const children = [...(node.nodes ?? []), ...(node.floating_nodes ?? [])];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return windows;
}

/**
 * Parse a GET_TREE payload.
 *
 * @throws {ProtocolFailure} On invalid JSON or a malformed tree.
 */
export function parseSwayTree(payload: string): WindowRecord[] {
  let tree: unknown;
  try {
    tree = JSON.parse(payload);
  } catch (err) {
    throw new ProtocolFailure("sway", `Invalid JSON in GET_TREE reply: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
  return collectSwayWindows(tree);
}

export class SwayBackend implements WindowBackend {
  readonly kind = "sway" as const;
  private readonly socketPath: string | null;

  constructor(options?: { socketPath?: string; env?: NodeJS.ProcessEnv }) {
    const env = options?.env ?? process.env;
    this.socketPath = options?.socketPath ?? (env.SWAYSOCK || null);
  }

  async poll(signal: AbortSignal): Promise<WindowRecord[]> {
    if (this.socketPath === null) {
      throw new ConnectionFailure(this.kind, "SWAYSOCK is not set");
    }

    const socket = await connectUnix(this.kind, this.socketPath, signal);
    try {
      const reader = new ExactReader(this.kind, socket, signal);
      socket.write(encodeI3IpcMessage(I3_IPC_MESSAGE.GET_TREE));

      const header = decodeI3IpcHeader(await reader.read(I3_IPC_HEADER_LENGTH));
      if (header === null) {
        throw new ProtocolFailure(this.kind, "Reply does not start with the i3-ipc magic");
      }
      if (header.type !== I3_IPC_MESSAGE.GET_TREE) {
        throw new ProtocolFailure(this.kind, `Expected a GET_TREE reply, got message type ${header.type}`);
      }

      const payload = await reader.read(header.length);
      return parseSwayTree(payload.toString("utf-8"));
    } finally {
      socket.destroy();
    }
  }
}
