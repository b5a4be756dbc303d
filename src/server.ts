/**
 * MCP server assembly: one McpServer with every tool group registered.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ScoutClient } from "./core/client.js";
import { getConfig } from "./core/config.js";
import { getApiKey } from "./core/credentials.js";
import { registerAppTools } from "./tools/app-tools.js";
import { registerConfigTools } from "./tools/config-tools.js";
import { registerEndpointTools } from "./tools/endpoint-tools.js";
import { registerErrorTools } from "./tools/error-tools.js";
import { registerInsightTools } from "./tools/insight-tools.js";
import { registerMetricTools } from "./tools/metric-tools.js";
import { registerSchemaTools } from "./tools/schema-tools.js";
import type { ToolContext } from "./tools/shared.js";
import { registerUrlTools } from "./tools/url-tools.js";
import { VERSION } from "./version.js";

export const SERVER_NAME = "scout-apm";

const INSTRUCTIONS = `Read-only access to ScoutAPM application monitoring data.
Start with scout_list_apps to find an app_id, or paste a dashboard URL into scout_parse_url / scout_fetch_url.
Time windows accept quick ranges (30min, 3hrs, 1day, 7days) or ISO 8601 from/to timestamps.`;

/** Builds a client from the current credentials and configuration. */
export function createDefaultContext(): ToolContext {
  return {
    async getClient() {
      const config = await getConfig();
      const apiKey = await getApiKey();
      return new ScoutClient({
        apiKey,
        apiBase: config.api_base,
        sslCertFile: config.ssl_cert_file,
      });
    },
  };
}

export function createServer(context: ToolContext = createDefaultContext()): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      instructions: INSTRUCTIONS,
    }
  );

  registerAppTools(server, context);
  registerMetricTools(server, context);
  registerEndpointTools(server, context);
  registerErrorTools(server, context);
  registerInsightTools(server, context);
  registerUrlTools(server, context);
  registerSchemaTools(server, context);
  registerConfigTools(server);

  return server;
}
