#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer, version } from "./server.js";

async function main() {
  console.error(`Node.js version: ${process.version}`);
  console.error(`Starting lp-steps MCP server v${version}...`);

  const server = createServer();
  const transport = new StdioServerTransport();

  console.error("Connecting to stdio transport...");
  await server.connect(transport);

  console.error("lp-steps MCP server running - ready to solve linear programs step by step");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
