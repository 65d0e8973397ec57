#!/usr/bin/env node
/**
 * Entry point for the dockwatch MCP server over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { server, stopTracker } from "./server.js";

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  // The poll timer would otherwise keep the process alive after the client leaves.
  transport.onclose = () => void stopTracker();
  process.stdin.once("end", () => void stopTracker());
  await server.connect(transport);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
