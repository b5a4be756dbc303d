/**
 * MCP tool definitions for configuration.
 * Tools: scout_config_get, scout_config_reference
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as config from "../core/config.js";
import { formatConfigReference } from "../core/config.js";
import { dumpYaml } from "../utils/yaml.js";
import { jsonResult, runTool, textResult } from "./shared.js";

export function registerConfigTools(server: McpServer): void {
  server.tool(
    "scout_config_get",
    "Read the effective configuration (config.yaml merged with environment overrides). The API key is redacted",
    {
      key: z.string().optional().describe("Single key to read (e.g., 'api_base')"),
      format: z.enum(["json", "yaml"]).optional().describe("Output format (default: json)"),
    },
    async ({ key, format }) =>
      runTool("scout_config_get", async () => {
        const value = await config.getConfigValue(key);
        if (format === "yaml") return textResult(dumpYaml(value ?? null));
        return jsonResult(value ?? null);
      })
  );

  server.tool(
    "scout_config_reference",
    "Show every configuration parameter with its default, environment override, description and code location. Filter by keyword to narrow results.",
    {
      filter: z
        .string()
        .optional()
        .describe("Optional keyword matched against path, description and environment variable. E.g. 'ssl', '1password'"),
    },
    async ({ filter }) => runTool("scout_config_reference", async () => textResult(formatConfigReference(filter)))
  );
}
