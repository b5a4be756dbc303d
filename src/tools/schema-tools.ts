/**
 * MCP tool definitions for the published OpenAPI schema.
 * Tools: scout_fetch_openapi_schema
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getConfig } from "../core/config.js";
import { inspectOpenApiSchema } from "../core/openapi.js";
import { jsonResult, runTool, type ToolContext } from "./shared.js";

export function registerSchemaTools(server: McpServer, context: ToolContext): void {
  server.tool(
    "scout_fetch_openapi_schema",
    "Fetch the ScoutAPM OpenAPI schema from the API, optionally validating it and comparing it with a local copy",
    {
      validate: z.boolean().optional().describe("Parse the schema as YAML and report its version (default: false)"),
      compare_with_local: z
        .boolean()
        .optional()
        .describe("Compare with the local schema file (openapi_local_path, default tmp/scoutapm_openapi.yaml)"),
    },
    async ({ validate, compare_with_local }) =>
      runTool("scout_fetch_openapi_schema", async () => {
        const client = await context.getClient();
        const schema = await client.fetchOpenApiSchema();
        const config = await getConfig();
        return jsonResult(
          await inspectOpenApiSchema(schema, {
            validate,
            compareWithLocal: compare_with_local,
            localPath: config.openapi_local_path,
          })
        );
      })
  );
}
