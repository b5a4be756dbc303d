/**
 * MCP tool definitions for endpoints and traces.
 * Tools: scout_list_endpoints, scout_get_endpoint, scout_get_endpoint_metrics,
 *        scout_list_endpoint_traces, scout_fetch_trace
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { JsonObject } from "../types.js";
import { METRIC_DESCRIPTIONS } from "./metric-tools.js";
import {
  appIdArg,
  endpointIdArg,
  fromArg,
  jsonResult,
  metricTypeArg,
  rangeArg,
  runTool,
  toArg,
  type ToolContext,
} from "./shared.js";

export function registerEndpointTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_list_endpoints",
    `List all endpoints for an application.

Time window: a quick range (range="30min", "1day", "7days") or explicit from/to ISO 8601 timestamps.
Without any window the last 7 days are listed; with only from, to defaults to now.`,
    {
      app_id: appIdArg,
      range: rangeArg,
      from: fromArg,
      to: toArg,
    },
    async ({ app_id, range, from, to }) =>
      runTool("scout_list_endpoints", async () => {
        const client = await context.getClient();
        return jsonResult(await client.listEndpoints(app_id, { range, from, to }));
      })
  );

  server.tool(
    "scout_get_endpoint",
    "Get details for a single endpoint",
    {
      app_id: appIdArg,
      endpoint_id: endpointIdArg,
    },
    async ({ app_id, endpoint_id }) =>
      runTool("scout_get_endpoint", async () => {
        const client = await context.getClient();
        return jsonResult(await client.getEndpoint(app_id, endpoint_id));
      })
  );

  server.tool(
    "scout_get_endpoint_metrics",
    `Get time-series data for a metric of a single endpoint.

${METRIC_DESCRIPTIONS}

Time window: a quick range or explicit from/to ISO 8601 timestamps, at most 2 weeks.`,
    {
      app_id: appIdArg,
      endpoint_id: endpointIdArg,
      metric_type: metricTypeArg,
      range: rangeArg,
      from: fromArg,
      to: toArg,
    },
    async ({ app_id, endpoint_id, metric_type, range, from, to }) =>
      runTool("scout_get_endpoint_metrics", async () => {
        const client = await context.getClient();
        return jsonResult(
          await client.getEndpointMetrics(app_id, endpoint_id, metric_type, { range, from, to })
        );
      })
  );

  server.tool(
    "scout_list_endpoint_traces",
    "List traces for an endpoint (max 100). The window must start within the last 7 days. " +
      "Use a trace_id from the results with scout_fetch_trace.",
    {
      app_id: appIdArg,
      endpoint_id: endpointIdArg,
      range: rangeArg,
      from: fromArg.describe("Start time in ISO 8601 format, within the last 7 days. Ignored if range is provided"),
      to: toArg,
    },
    async ({ app_id, endpoint_id, range, from, to }) =>
      runTool("scout_list_endpoint_traces", async () => {
        const client = await context.getClient();
        return jsonResult(await client.listEndpointTraces(app_id, endpoint_id, { range, from, to }));
      })
  );

  server.tool(
    "scout_fetch_trace",
    "Fetch detailed trace information",
    {
      app_id: appIdArg,
      trace_id: z.number().int().positive().describe("Trace identifier"),
      include_endpoint: z
        .boolean()
        .optional()
        .describe("Also report the metric name of the endpoint the trace belongs to (default: false)"),
    },
    async ({ app_id, trace_id, include_endpoint }) =>
      runTool("scout_fetch_trace", async () => {
        const client = await context.getClient();
        const trace = await client.fetchTrace(app_id, trace_id);
        const result: JsonObject = { trace };
        if (include_endpoint && typeof trace.metric_name === "string") {
          result.trace_metric_name = trace.metric_name;
        }
        return jsonResult(result);
      })
  );
}
