/**
 * Core type definitions for the ScoutAPM MCP server.
 */

// ─── JSON ─────────────────────────────────────────────────

export type JsonObject = Record<string, unknown>;

// ─── Time ─────────────────────────────────────────────────

export interface TimeRange {
  from: string | null;
  to: string | null;
}

export interface Duration {
  start: Date;
  end: Date;
}

/** Either a quick range ("3hrs", "7days") or explicit ISO 8601 bounds. */
export interface TimeWindow {
  range?: string | null;
  from?: string | null;
  to?: string | null;
}

// ─── Scout URLs ───────────────────────────────────────────

export type UrlType = "app" | "endpoint" | "trace" | "error_group" | "insight" | "unknown";

export interface ParsedUrl {
  url_type?: UrlType;
  app_id?: number;
  endpoint_id?: string;
  trace_id?: number;
  error_id?: number;
  insight_type?: string;
  query_params?: Record<string, string>;
  decoded_endpoint?: string;
}

// ─── API ──────────────────────────────────────────────────

export const METRIC_TYPES = [
  "apdex",
  "response_time",
  "response_time_95th",
  "errors",
  "throughput",
  "queue_time",
] as const;

export type MetricType = (typeof METRIC_TYPES)[number];

export const INSIGHT_TYPES = ["n_plus_one", "memory_bloat", "slow_query"] as const;

export type InsightType = (typeof INSIGHT_TYPES)[number];

export type PaginationDirection = "forward" | "backward";

export interface ErrorGroupFilter {
  from?: string | null;
  to?: string | null;
  /** Base64 URL-encoded endpoint id. */
  endpoint?: string | null;
}

export interface InsightsHistoryOptions {
  from?: string | null;
  to?: string | null;
  limit?: number | null;
  pagination_cursor?: number | null;
  pagination_direction?: PaginationDirection | null;
  pagination_page?: number | null;
}

export interface OpenApiSchema {
  content: string;
  content_type: string | null;
  status: number;
}

// ─── Config ───────────────────────────────────────────────

export interface ScoutConfig {
  api_key?: string;
  api_base: string;
  ssl_cert_file?: string;
  op_vault?: string;
  op_item?: string;
  op_field: string;
  openapi_local_path: string;
}
