/**
 * MCP tool definitions for error groups.
 * Tools: scout_list_error_groups, scout_get_error_group, scout_get_error_group_errors
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { appIdArg, jsonResult, runTool, type ToolContext } from "./shared.js";

const errorIdArg = z.number().int().positive().describe("Error group identifier");

export function registerErrorTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_list_error_groups",
    "List error groups for an application (max 100, within 30 days)",
    {
      app_id: appIdArg,
      from: z.string().nullish().describe("Start time in ISO 8601 format (e.g., 2025-11-17T15:25:35Z)"),
      to: z.string().nullish().describe("End time in ISO 8601 format (e.g., 2025-11-18T15:25:35Z)"),
      endpoint: z.string().nullish().describe("Base64 URL-encoded endpoint filter"),
    },
    async ({ app_id, from, to, endpoint }) =>
      runTool("scout_list_error_groups", async () => {
        const client = await context.getClient();
        return jsonResult(await client.listErrorGroups(app_id, { from, to, endpoint }));
      })
  );

  server.tool(
    "scout_get_error_group",
    "Get details for a specific error group",
    {
      app_id: appIdArg,
      error_id: errorIdArg,
    },
    async ({ app_id, error_id }) =>
      runTool("scout_get_error_group", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getErrorGroup(app_id, error_id));
      })
  );

  server.tool(
    "scout_get_error_group_errors",
    "Get individual errors within an error group (max 100)",
    {
      app_id: appIdArg,
      error_id: errorIdArg,
    },
    async ({ app_id, error_id }) =>
      runTool("scout_get_error_group_errors", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getErrorGroupErrors(app_id, error_id));
      })
  );
}
