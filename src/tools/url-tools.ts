/**
 * MCP tool definitions for Scout dashboard URLs.
 * Tools: scout_parse_url, scout_fetch_url
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { fetchScoutUrl } from "../core/scout-url.js";
import { parseScoutUrl } from "../core/url.js";
import { jsonResult, runTool, type ToolContext } from "./shared.js";

const urlArg = z.string().min(1).describe("Full ScoutAPM URL");

export function registerUrlTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_parse_url",
    `Extract resource information from a ScoutAPM URL without calling the API.

Returns url_type (app, endpoint, trace, error_group, insight or unknown), app_id, and
endpoint_id, trace_id, error_id, insight_type, query_params and decoded_endpoint when present.

Example: https://scoutapm.com/apps/123/endpoints/<id>/trace/456 gives url_type "trace",
app_id 123, trace_id 456 and the readable endpoint name in decoded_endpoint.`,
    {
      url: urlArg,
    },
    async ({ url }) => runTool("scout_parse_url", async () => jsonResult(parseScoutUrl(url)))
  );

  server.tool(
    "scout_fetch_url",
    `Fetch the data behind a ScoutAPM URL, detecting the resource type automatically.

Supported URLs:
- /apps/{app_id}
- /apps/{app_id}/endpoints/{endpoint_id} (looked up among the last 7 days of endpoints)
- /apps/{app_id}/endpoints/{endpoint_id}/trace/{trace_id}
- /apps/{app_id}/error_groups/{error_id}
- /apps/{app_id}/insights[/{insight_type}]

For trace URLs, set include_endpoint=true to also fetch the endpoint for context.`,
    {
      url: urlArg,
      include_endpoint: z
        .boolean()
        .optional()
        .describe("For trace URLs, also fetch endpoint details (default: false)"),
    },
    async ({ url, include_endpoint }) =>
      runTool("scout_fetch_url", async () => {
        const client = await context.getClient();
        return jsonResult(await fetchScoutUrl(client, url, { includeEndpoint: include_endpoint }));
      })
  );
}
