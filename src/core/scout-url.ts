/**
 * Resolve a Scout dashboard URL into the matching API data.
 */

import type { JsonObject, ParsedUrl } from "../types.js";
import type { ScoutClient } from "./client.js";
import { APIError, InvalidArgumentError } from "./errors.js";
import { getEndpointId, parseScoutUrl } from "./url.js";

/** Window searched when a URL only carries an endpoint id. */
export const ENDPOINT_LOOKUP_RANGE = "7days";

export interface FetchScoutUrlOptions {
  /** For trace URLs, also look up the endpoint the trace belongs to. */
  includeEndpoint?: boolean;
}

export interface ScoutUrlResult {
  url: string;
  parsed: ParsedUrl;
  data: JsonObject;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function findEndpoint(
  client: ScoutClient,
  appId: number,
  endpointId: string
): Promise<JsonObject | undefined> {
  const endpoints = await client.listEndpoints(appId, { range: ENDPOINT_LOOKUP_RANGE });
  return endpoints.filter(isObject).find((ep) => getEndpointId(ep) === endpointId);
}

export async function fetchScoutUrl(
  client: ScoutClient,
  url: string,
  options: FetchScoutUrlOptions = {}
): Promise<ScoutUrlResult> {
  const parsed = parseScoutUrl(url);
  const appId = parsed.app_id;

  switch (parsed.url_type) {
    case "trace": {
      if (appId === undefined || parsed.trace_id === undefined) {
        throw new InvalidArgumentError(`Invalid trace URL: missing app_id or trace_id (${url})`);
      }
      const data: JsonObject = { trace: await client.fetchTrace(appId, parsed.trace_id) };

      if (options.includeEndpoint && parsed.endpoint_id !== undefined) {
        try {
          const endpoint = await findEndpoint(client, appId, parsed.endpoint_id);
          if (endpoint) {
            data.endpoint = endpoint;
          } else {
            data.endpoint_error = "Endpoint not found in the last 7 days";
          }
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          data.endpoint_error = `Failed to fetch endpoint: ${message}`;
        }
        data.decoded_endpoint = parsed.decoded_endpoint;
      }
      return { url, parsed, data };
    }

    case "endpoint": {
      if (appId === undefined || parsed.endpoint_id === undefined) {
        throw new InvalidArgumentError(`Invalid endpoint URL: missing app_id or endpoint_id (${url})`);
      }
      const endpoint = await findEndpoint(client, appId, parsed.endpoint_id);
      if (!endpoint) {
        throw new APIError(
          "Endpoint not found in the last 7 days. Try scout_list_endpoints with a longer time range.",
          {},
          "not_found"
        );
      }
      return { url, parsed, data: { endpoint, decoded_endpoint: parsed.decoded_endpoint } };
    }

    case "error_group": {
      if (appId === undefined || parsed.error_id === undefined) {
        throw new InvalidArgumentError(`Invalid error group URL: missing app_id or error_id (${url})`);
      }
      return { url, parsed, data: { error_group: await client.getErrorGroup(appId, parsed.error_id) } };
    }

    case "insight": {
      if (appId === undefined) {
        throw new InvalidArgumentError(`Invalid insight URL: missing app_id (${url})`);
      }
      if (parsed.insight_type !== undefined) {
        const insight = await client.getInsightByType(appId, parsed.insight_type);
        return { url, parsed, data: { insight, insight_type: parsed.insight_type } };
      }
      return { url, parsed, data: { insights: await client.getAllInsights(appId) } };
    }

    case "app": {
      if (appId === undefined) {
        throw new InvalidArgumentError(`Invalid app URL: missing app_id (${url})`);
      }
      return { url, parsed, data: { app: await client.getApp(appId) } };
    }

    case "unknown":
      throw new InvalidArgumentError(`Unknown or unsupported ScoutAPM URL format: ${url}`);

    default:
      throw new InvalidArgumentError(`Unable to determine URL type from: ${url}`);
  }
}
