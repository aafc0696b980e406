#!/usr/bin/env node

import { loadConfig } from "./config";
import { createServer } from "./server";
import { StdioJsonRpcTransport } from "./transport";

/**
 * Start the server using stdio transport.
 * stdout carries the protocol, so everything else is logged to stderr.
 */
async function main() {
  const config = loadConfig();
  if (!config.talosconfig) {
    console.warn("TALOSCONFIG is not set; every talosctl tool call will fail until it is");
  }

  const server = createServer(config);
  const transport = new StdioJsonRpcTransport(process.stdin, process.stdout);
  console.error("Talos MCP Server running on stdio");
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
