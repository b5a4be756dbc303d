/**
 * MCP tool definitions for performance insights.
 * Tools: scout_get_all_insights, scout_get_insight_by_type,
 *        scout_get_insights_history, scout_get_insights_history_by_type
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { appIdArg, insightTypeArg, jsonResult, runTool, type ToolContext } from "./shared.js";

const historyArgs = {
  from: z.string().nullish().describe("Start time in ISO 8601 format (e.g., 2025-11-17T15:25:35Z)"),
  to: z.string().nullish().describe("End time in ISO 8601 format (e.g., 2025-11-18T15:25:35Z)"),
  limit: z.number().int().positive().nullish().describe("Maximum number of items per page (default: 10)"),
  pagination_cursor: z.number().int().nullish().describe("Cursor for pagination (insight ID)"),
  pagination_direction: z
    .enum(["forward", "backward"])
    .nullish()
    .describe("Pagination direction (default: forward)"),
  pagination_page: z.number().int().positive().nullish().describe("Page number for pagination (default: 1)"),
};

export function registerInsightTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_get_all_insights",
    "Get all insight types (N+1 queries, memory bloat, slow queries) for an application. Results are cached by Scout for 5 minutes",
    {
      app_id: appIdArg,
      limit: z.number().int().positive().nullish().describe("Maximum number of items per insight type (default: 20)"),
    },
    async ({ app_id, limit }) =>
      runTool("scout_get_all_insights", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getAllInsights(app_id, { limit }));
      })
  );

  server.tool(
    "scout_get_insight_by_type",
    "Get data for a specific insight type",
    {
      app_id: appIdArg,
      insight_type: insightTypeArg,
      limit: z.number().int().positive().nullish().describe("Maximum number of items (default: 20)"),
    },
    async ({ app_id, insight_type, limit }) =>
      runTool("scout_get_insight_by_type", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getInsightByType(app_id, insight_type, { limit }));
      })
  );

  server.tool(
    "scout_get_insights_history",
    "Get historical insights with cursor-based pagination",
    {
      app_id: appIdArg,
      ...historyArgs,
    },
    async ({ app_id, ...history }) =>
      runTool("scout_get_insights_history", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getInsightsHistory(app_id, history));
      })
  );

  server.tool(
    "scout_get_insights_history_by_type",
    "Get historical insights of one type with cursor-based pagination",
    {
      app_id: appIdArg,
      insight_type: insightTypeArg,
      ...historyArgs,
    },
    async ({ app_id, insight_type, ...history }) =>
      runTool("scout_get_insights_history_by_type", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getInsightsHistoryByType(app_id, insight_type, history));
      })
  );
}
