/**
 * Helpers shared by every tool group.
 */

import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ScoutClient } from "../core/client.js";
import { describeError, ScoutError } from "../core/errors.js";
import { RANGE_EXAMPLES } from "../core/time.js";

export interface ToolContext {
  /** Resolved per call so credential changes apply without a restart. */
  getClient(): Promise<ScoutClient>;
}

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
}

export function textResult(text: string): CallToolResult {
  return {
    content: [{ type: "text", text }],
  };
}

export function errorResult(err: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: describeError(err) }],
    isError: true,
  };
}

/**
 * Run a tool body, turning any failure into an isError result.
 */
export async function runTool(
  name: string,
  fn: () => Promise<CallToolResult>
): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (err) {
    const kind = err instanceof ScoutError ? err.kind : "internal";
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[scout-apm] ${name} failed (${kind}): ${message}`);
    return errorResult(err);
  }
}

// ─── Argument schemas ────────────────────────────────────

export const appIdArg = z.number().int().positive().describe("ScoutAPM application ID");

export const endpointIdArg = z
  .string()
  .min(1)
  .describe("Endpoint ID (base64 URL-encoded). Extract it from a Scout URL with scout_parse_url");

export const rangeArg = z
  .string()
  .nullish()
  .describe(
    `Quick time range template: ${RANGE_EXAMPLES.join(", ")}. If provided, calculates from/to automatically`
  );

export const fromArg = z
  .string()
  .nullish()
  .describe("Start time in ISO 8601 format (e.g., 2025-11-17T15:25:35Z). Ignored if range is provided");

export const toArg = z
  .string()
  .nullish()
  .describe("End time in ISO 8601 format (e.g., 2025-11-18T15:25:35Z). Used as end point for range if range is provided");

export const metricTypeArg = z
  .string()
  .describe("Metric type: apdex, response_time, response_time_95th, errors, throughput, queue_time");

export const insightTypeArg = z
  .string()
  .describe("Insight type: n_plus_one, memory_bloat, slow_query");
