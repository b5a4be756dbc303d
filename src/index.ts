#!/usr/bin/env node

/**
 * ScoutAPM MCP Server entry point.
 *
 * Exposes the ScoutAPM REST API as MCP tools over stdio. Configuration lives
 * in ~/.scout-apm-mcp/config.yaml and the environment.
 */

import { createServer } from "./server.js";
import { StrictIdStdioTransport } from "./transport.js";
import { VERSION } from "./version.js";

async function main() {
  const server = createServer();

  const transport = new StrictIdStdioTransport();
  await server.connect(transport);

  console.error(`[scout-apm] MCP Server v${VERSION} running (stdio transport)`);
}

main().catch((err) => {
  console.error("[scout-apm] Fatal error:", err);
  process.exit(1);
});
