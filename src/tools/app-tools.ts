/**
 * MCP tool definitions for applications.
 * Tools: scout_list_apps, scout_get_app
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { appIdArg, jsonResult, runTool, type ToolContext } from "./shared.js";

export function registerAppTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_list_apps",
    "List all applications accessible with the API key: name, ID and last reported time. " +
      "Use the app_id from the results for the other tools. " +
      "Optionally only return apps that reported since active_since (ISO 8601).",
    {
      active_since: z
        .string()
        .nullish()
        .describe("Only return apps that reported data since this time (e.g., 2025-01-08T00:00:00Z)"),
    },
    async ({ active_since }) =>
      runTool("scout_list_apps", async () => {
        const client = await context.getClient();
        return jsonResult(await client.listApps({ activeSince: active_since }));
      })
  );

  server.tool(
    "scout_get_app",
    "Get application details for a specific application",
    {
      app_id: appIdArg,
    },
    async ({ app_id }) =>
      runTool("scout_get_app", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getApp(app_id));
      })
  );
}
