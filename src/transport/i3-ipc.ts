/**
 * i3/sway IPC framing.
 *
 *   "i3-ipc" (6 bytes) | payload length (u32) | message type (u32) | payload
 *
 * Both integers are in the host's native byte order, which the protocol
 * documents as such (peers always share a machine). The order is resolved
 * once from os.endianness() and used explicitly in both directions.
 */

import { endianness } from "node:os";

export const I3_IPC_MAGIC = "i3-ipc";
export const I3_IPC_HEADER_LENGTH = 14;

export const I3_IPC_MESSAGE = {
  RUN_COMMAND: 0,
  GET_WORKSPACES: 1,
  SUBSCRIBE: 2,
  GET_OUTPUTS: 3,
  GET_TREE: 4,
  GET_VERSION: 7,
} as const;

export type ByteOrder = "LE" | "BE";

export const NATIVE_BYTE_ORDER: ByteOrder = endianness();

export interface I3IpcHeader {
  length: number;
  type: number;
}

export function encodeI3IpcMessage(
  type: number,
  payload: string | Buffer = "",
  order: ByteOrder = NATIVE_BYTE_ORDER,
): Buffer {
  const body = typeof payload === "string" ? Buffer.from(payload, "utf-8") : payload;
  const header = Buffer.alloc(I3_IPC_HEADER_LENGTH);
  header.write(I3_IPC_MAGIC, 0, "ascii");
  if (order === "LE") {
    header.writeUInt32LE(body.length, 6);
    header.writeUInt32LE(type, 10);
  } else {
    header.writeUInt32BE(body.length, 6);
    header.writeUInt32BE(type, 10);
  }
  return Buffer.concat([header, body]);
}

/**
 * Decode a 14-byte reply header. Returns null when the magic is wrong.
 */
export function decodeI3IpcHeader(
  header: Buffer,
  order: ByteOrder = NATIVE_BYTE_ORDER,
): I3IpcHeader | null {
  if (header.length < I3_IPC_HEADER_LENGTH) return null;
  if (header.toString("ascii", 0, 6) !== I3_IPC_MAGIC) return null;
  return order === "LE"
    ? { length: header.readUInt32LE(6), type: header.readUInt32LE(10) }
    : { length: header.readUInt32BE(6), type: header.readUInt32BE(10) };
}
