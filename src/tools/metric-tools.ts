/**
 * MCP tool definitions for application metrics.
 * Tools: scout_list_metrics, scout_get_metric
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  appIdArg,
  fromArg,
  jsonResult,
  metricTypeArg,
  rangeArg,
  runTool,
  toArg,
  type ToolContext,
} from "./shared.js";

export const METRIC_DESCRIPTIONS = `Available metric types:
- apdex: Application Performance Index (0-1, higher is better)
- response_time: Average response time in milliseconds
- response_time_95th: 95th percentile response time in milliseconds
- errors: Number of errors
- throughput: Requests per second
- queue_time: Time spent in queue in milliseconds`;

export function registerMetricTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_list_metrics",
    "List available metric types for an application",
    {
      app_id: appIdArg,
    },
    async ({ app_id }) =>
      runTool("scout_list_metrics", async () => {
        const client = await context.getClient();
        return jsonResult(await client.listMetrics(app_id));
      })
  );

  server.tool(
    "scout_get_metric",
    `Get time-series data for a metric of an application.

${METRIC_DESCRIPTIONS}

Time window: a quick range (range="30min", "1day", "7days") or explicit from/to ISO 8601 timestamps. The span may not exceed 2 weeks.`,
    {
      app_id: appIdArg,
      metric_type: metricTypeArg,
      range: rangeArg,
      from: fromArg,
      to: toArg,
    },
    async ({ app_id, metric_type, range, from, to }) =>
      runTool("scout_get_metric", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getMetric(app_id, metric_type, { range, from, to }));
      })
  );
}
