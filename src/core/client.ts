/**
 * ScoutAPM REST client.
 *
 * One GET per operation against {api_base}/apps/..., authenticated with the
 * X-SCOUT-API header. Arguments are validated before anything goes on the
 * wire. The API reports errors both through the HTTP status and in-band
 * (header.status.code in a 200 body); both paths raise.
 */

import fs from "node:fs";
import https from "node:https";
import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";
import { z } from "zod";
import type {
  ErrorGroupFilter,
  InsightType,
  InsightsHistoryOptions,
  JsonObject,
  MetricType,
  OpenApiSchema,
  TimeRange,
  TimeWindow,
} from "../types.js";
import { INSIGHT_TYPES, METRIC_TYPES } from "../types.js";
import { VERSION } from "../version.js";
import { DEFAULT_API_BASE } from "./config.js";
import {
  APIError,
  AuthenticationError,
  InvalidArgumentError,
  NotFoundError,
  RequestError,
  ScoutError,
  SSLError,
} from "./errors.js";
import {
  formatTime,
  parseTime,
  resolveTimeWindow,
  validateTimeRange,
  validateTraceAge,
} from "./time.js";

/** Socket idle timeout; axios applies it to the connect and read phases alike. */
export const REQUEST_TIMEOUT_MS = 10_000;

export const USER_AGENT = `scout-apm-mcp/${VERSION}`;

const OPENAPI_ACCEPT = "application/x-yaml, application/yaml, text/yaml, */*";

const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_SIGNATURE_FAILURE",
  "CERT_UNTRUSTED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

const ErrorEnvelope = z.object({
  header: z.object({
    status: z.object({
      code: z.number().optional(),
      message: z.unknown(),
    }),
  }),
});

type QueryValue = string | number | null | undefined;
type QueryParams = Array<[string, QueryValue]>;

export interface ScoutClientOptions {
  apiKey: string;
  apiBase?: string;
  /** PEM trust store; the platform default is used when unset or missing. */
  sslCertFile?: string | null;
  /** Replaces the HTTP transport (tests). */
  adapter?: AxiosAdapter;
}

export interface ListAppsOptions {
  /** Only apps that reported since this ISO 8601 time. */
  activeSince?: string | null;
}

export interface LimitOptions {
  limit?: number | null;
}

// ─── Helpers ─────────────────────────────────────────────

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function dig(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asObject(value: unknown): JsonObject {
  return isObject(value) ? value : {};
}

function buildQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of params) {
    if (value === null || value === undefined || value === "") continue;
    search.append(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : "";
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Map a transport failure (no HTTP response) to a ScoutError. */
export function wrapTransportError(err: unknown): ScoutError {
  if (err instanceof ScoutError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);

  if (code !== undefined && TLS_ERROR_CODES.has(code)) {
    return new SSLError(
      `SSL verification failed: ${message}. This may be due to system certificate configuration issues.`
    );
  }
  const label = code ?? (err instanceof Error ? err.name : "Error");
  return new RequestError(`Request failed: ${label} - ${message}`);
}

export function buildHttpsAgent(sslCertFile?: string | null): https.Agent | undefined {
  if (!sslCertFile) return undefined;
  if (!fs.existsSync(sslCertFile) || !fs.statSync(sslCertFile).isFile()) {
    console.error(`[client] Trust store ${sslCertFile} not found, using the platform default`);
    return undefined;
  }
  return new https.Agent({ ca: fs.readFileSync(sslCertFile, "utf-8"), keepAlive: false });
}

export function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((type) => type === value);
}

export function isInsightType(value: string): value is InsightType {
  return INSIGHT_TYPES.some((type) => type === value);
}

function assertMetricType(metricType: string): asserts metricType is MetricType {
  if (!isMetricType(metricType)) {
    throw new InvalidArgumentError(
      `Invalid metric_type. Must be one of: ${METRIC_TYPES.join(", ")}`
    );
  }
}

function assertInsightType(insightType: string): asserts insightType is InsightType {
  if (!isInsightType(insightType)) {
    throw new InvalidArgumentError(
      `Invalid insight_type. Must be one of: ${INSIGHT_TYPES.join(", ")}`
    );
  }
}

function checkRange(range: TimeRange): void {
  if (range.from && range.to) validateTimeRange(range.from, range.to);
}

// ─── Client ──────────────────────────────────────────────

export class ScoutClient {
  readonly apiKey: string;
  readonly apiBase: string;
  readonly userAgent: string = USER_AGENT;
  private readonly http: AxiosInstance;

  constructor(options: ScoutClientOptions) {
    const apiKey = (options.apiKey ?? "").trim();
    if (apiKey === "") {
      throw new InvalidArgumentError("API key is required");
    }
    this.apiKey = apiKey;
    this.apiBase = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");

    this.http = axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      httpsAgent: buildHttpsAgent(options.sslCertFile),
      headers: {
        "X-SCOUT-API": this.apiKey,
        "User-Agent": this.userAgent,
      },
      responseType: "text",
      // Status and body are interpreted by this class, not by axios.
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  // ─── Applications ───

  async listApps(options: ListAppsOptions = {}): Promise<JsonObject[]> {
    const since = options.activeSince ? parseTime(options.activeSince) : null;
    const body = await this.get("/apps");
    const apps = asArray(dig(body, "results", "apps")).filter(isObject);
    if (!since) return apps;

    return apps.filter((app) => {
      const reportedAt = app.last_reported_at;
      if (typeof reportedAt !== "string" || reportedAt === "") return false;
      return parseTime(reportedAt).getTime() >= since.getTime();
    });
  }

  async getApp(appId: number): Promise<JsonObject> {
    const body = await this.get(`/apps/${appId}`);
    return asObject(dig(body, "results", "app"));
  }

  // ─── Metrics ───

  async listMetrics(appId: number): Promise<unknown[]> {
    const body = await this.get(`/apps/${appId}/metrics`);
    return asArray(dig(body, "results", "availableMetrics"));
  }

  async getMetric(appId: number, metricType: string, window: TimeWindow = {}): Promise<JsonObject> {
    assertMetricType(metricType);
    const range = resolveTimeWindow(window);
    checkRange(range);

    const body = await this.get(`/apps/${appId}/metrics/${metricType}`, [
      ["from", range.from],
      ["to", range.to],
    ]);
    return asObject(dig(body, "results", "series"));
  }

  // ─── Endpoints ───

  /**
   * Without any window this covers the last 7 days; `from` alone runs to now.
   */
  async listEndpoints(appId: number, window: TimeWindow = {}): Promise<unknown[]> {
    let range = resolveTimeWindow(window);
    if (!range.from && !range.to) {
      range = resolveTimeWindow({ range: "7days" });
    } else if (range.from && !range.to) {
      range = { from: range.from, to: formatTime(new Date()) };
    }
    checkRange(range);

    const body = await this.get(`/apps/${appId}/endpoints`, [
      ["from", range.from],
      ["to", range.to],
    ]);
    return asArray(dig(body, "results"));
  }

  async getEndpoint(appId: number, endpointId: string): Promise<JsonObject> {
    const body = await this.get(`/apps/${appId}/endpoints/${encodeURIComponent(endpointId)}`);
    const endpoint = dig(body, "results", "endpoint");
    return asObject(endpoint ?? dig(body, "results"));
  }

  async getEndpointMetrics(
    appId: number,
    endpointId: string,
    metricType: string,
    window: TimeWindow = {}
  ): Promise<unknown[]> {
    assertMetricType(metricType);
    const range = resolveTimeWindow(window);
    checkRange(range);

    const body = await this.get(
      `/apps/${appId}/endpoints/${encodeURIComponent(endpointId)}/metrics/${metricType}`,
      [
        ["from", range.from],
        ["to", range.to],
      ]
    );
    return asArray(dig(body, "results", "series", metricType));
  }

  /** Up to 100 traces, no older than 7 days. */
  async listEndpointTraces(
    appId: number,
    endpointId: string,
    window: TimeWindow = {}
  ): Promise<unknown[]> {
    const range = resolveTimeWindow(window);
    checkRange(range);
    if (range.from && range.to) {
      // A range with no explicit end is measured back from the `to` it produced.
      const computedEnd = window.range?.trim() && !window.to;
      validateTraceAge(range.from, computedEnd ? parseTime(range.to) : new Date());
    }

    const body = await this.get(`/apps/${appId}/endpoints/${encodeURIComponent(endpointId)}/traces`, [
      ["from", range.from],
      ["to", range.to],
    ]);
    return asArray(dig(body, "results", "traces"));
  }

  async fetchTrace(appId: number, traceId: number): Promise<JsonObject> {
    const body = await this.get(`/apps/${appId}/traces/${traceId}`);
    return asObject(dig(body, "results", "trace"));
  }

  // ─── Errors ───

  /** Up to 100 error groups from the last 30 days. */
  async listErrorGroups(appId: number, filter: ErrorGroupFilter = {}): Promise<unknown[]> {
    checkRange({ from: filter.from ?? null, to: filter.to ?? null });
    const body = await this.get(`/apps/${appId}/error_groups`, [
      ["from", filter.from],
      ["to", filter.to],
      ["endpoint", filter.endpoint],
    ]);
    return asArray(dig(body, "results", "error_groups"));
  }

  async getErrorGroup(appId: number, errorId: number): Promise<JsonObject> {
    const body = await this.get(`/apps/${appId}/error_groups/${errorId}`);
    return asObject(dig(body, "results", "error_group"));
  }

  async getErrorGroupErrors(appId: number, errorId: number): Promise<unknown[]> {
    const body = await this.get(`/apps/${appId}/error_groups/${errorId}/errors`);
    return asArray(dig(body, "results", "errors"));
  }

  // ─── Insights ───

  async getAllInsights(appId: number, options: LimitOptions = {}): Promise<JsonObject> {
    const body = await this.get(`/apps/${appId}/insights`, [["limit", options.limit]]);
    return asObject(dig(body, "results"));
  }

  async getInsightByType(
    appId: number,
    insightType: string,
    options: LimitOptions = {}
  ): Promise<JsonObject> {
    assertInsightType(insightType);
    const body = await this.get(`/apps/${appId}/insights/${insightType}`, [["limit", options.limit]]);
    return asObject(dig(body, "results"));
  }

  async getInsightsHistory(appId: number, options: InsightsHistoryOptions = {}): Promise<unknown> {
    return this.get(`/apps/${appId}/insights/history`, historyParams(options));
  }

  async getInsightsHistoryByType(
    appId: number,
    insightType: string,
    options: InsightsHistoryOptions = {}
  ): Promise<unknown> {
    assertInsightType(insightType);
    return this.get(`/apps/${appId}/insights/history/${insightType}`, historyParams(options));
  }

  // ─── Schema ───

  async fetchOpenApiSchema(): Promise<OpenApiSchema> {
    const response = await this.send(`${this.apiBase}/openapi.yaml`, OPENAPI_ACCEPT);
    const content = typeof response.data === "string" ? response.data : "";

    if (response.status === 401) {
      throw new AuthenticationError();
    }
    if (response.status < 200 || response.status >= 300) {
      throw new APIError(
        `API request failed: ${response.status} ${response.statusText}`.trim(),
        { statusCode: response.status }
      );
    }

    const rawType = response.headers["content-type"];
    return {
      content,
      content_type: typeof rawType === "string" ? rawType.split(";")[0].trim() : null,
      status: response.status,
    };
  }

  // ─── Transport ───

  private async send(url: string, accept: string): Promise<AxiosResponse<string>> {
    try {
      return await this.http.get<string>(url, { headers: { Accept: accept } });
    } catch (err) {
      throw wrapTransportError(err);
    }
  }

  private async get(path: string, params: QueryParams = []): Promise<unknown> {
    const response = await this.send(`${this.apiBase}${path}${buildQuery(params)}`, "application/json");
    const data = interpretResponse(response);
    checkEnvelope(data);
    return data;
  }
}

function historyParams(options: InsightsHistoryOptions): QueryParams {
  return [
    ["from", options.from],
    ["to", options.to],
    ["limit", options.limit],
    ["pagination_cursor", options.pagination_cursor],
    ["pagination_direction", options.pagination_direction],
    ["pagination_page", options.pagination_page],
  ];
}

function parseBody(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function envelopeMessage(data: unknown): string | undefined {
  const envelope = ErrorEnvelope.safeParse(data);
  if (!envelope.success) return undefined;
  const { message } = envelope.data.header.status;
  return typeof message === "string" && message !== "" ? message : undefined;
}

/** HTTP status handling; returns the parsed JSON body of a 2xx response. */
function interpretResponse(response: AxiosResponse<string>): unknown {
  const text = typeof response.data === "string" ? response.data : "";
  const body = parseBody(text);
  const data = body.ok ? body.value : undefined;
  const status = response.status;

  if (status === 401) throw new AuthenticationError();
  if (status === 404) throw new NotFoundError(data);
  if (status < 200 || status >= 300) {
    throw new APIError(envelopeMessage(data) ?? "API request failed", {
      statusCode: status,
      responseData: data,
    });
  }
  if (!body.ok) {
    throw new APIError(`Invalid JSON response: ${text.slice(0, 200)}`, { statusCode: status });
  }
  return data;
}

/** In-band errors: a 200 whose header.status.code is 400 or above. */
function checkEnvelope(data: unknown): void {
  const envelope = ErrorEnvelope.safeParse(data);
  if (!envelope.success) return;
  const { code } = envelope.data.header.status;
  if (code !== undefined && code >= 400) {
    throw new APIError(envelopeMessage(data) ?? "Unknown API error", {
      statusCode: code,
      responseData: data,
    });
  }
}
