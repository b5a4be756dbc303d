/**
 * Scout dashboard URL parsing.
 *
 * Recognized shapes:
 *   /apps/{app_id}
 *   /apps/{app_id}/endpoints/{endpoint_id}
 *   /apps/{app_id}/endpoints/{endpoint_id}/trace/{trace_id}
 *   /apps/{app_id}/error_groups/{error_id}
 *   /apps/{app_id}/insights[/{insight_type}]
 */

import type { JsonObject, ParsedUrl } from "../types.js";
import { decodeEndpointId } from "./endpoint-id.js";
import { InvalidArgumentError } from "./errors.js";

function parseId(segment: string | undefined, label: string, url: string): number {
  const value = segment !== undefined && /^\d+$/.test(segment) ? parseInt(segment, 10) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(
      `Invalid ${label} in URL: ${segment === undefined ? "missing" : `"${segment}"`} (${url})`
    );
  }
  return value;
}

/** Segment following a marker, if both exist. */
function after(parts: string[], marker: string): string | undefined {
  const index = parts.indexOf(marker);
  return index === -1 ? undefined : parts[index + 1];
}

export function parseScoutUrl(url: string): ParsedUrl {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidArgumentError(`Invalid URL: ${url}`);
  }

  const parts = parsed.pathname.split("/").filter((p) => p.length > 0);
  const appIndex = parts.indexOf("apps");
  if (appIndex === -1) return {};

  const result: ParsedUrl = {
    app_id: parseId(parts[appIndex + 1], "app id", url),
  };

  if (parts.includes("trace")) {
    result.url_type = "trace";
    const endpointId = after(parts, "endpoints");
    const traceId = after(parts, "trace");
    if (parts.includes("endpoints")) {
      if (endpointId !== undefined) result.endpoint_id = endpointId;
      if (traceId !== undefined) result.trace_id = parseId(traceId, "trace id", url);
    }
  } else if (parts.includes("endpoints")) {
    result.url_type = "endpoint";
    const endpointId = after(parts, "endpoints");
    if (endpointId !== undefined) result.endpoint_id = endpointId;
  } else if (parts.includes("error_groups")) {
    result.url_type = "error_group";
    const errorId = after(parts, "error_groups");
    if (errorId !== undefined) result.error_id = parseId(errorId, "error group id", url);
  } else if (parts.includes("insights")) {
    result.url_type = "insight";
    const insightType = after(parts, "insights");
    if (insightType !== undefined) result.insight_type = insightType;
  } else if (parts.length === 2 && parts[0] === "apps") {
    result.url_type = "app";
  } else {
    result.url_type = "unknown";
  }

  if (parsed.search !== "") {
    result.query_params = Object.fromEntries(parsed.searchParams.entries());
  }

  if (result.endpoint_id !== undefined) {
    result.decoded_endpoint = decodeEndpointId(result.endpoint_id);
  }

  return result;
}

/**
 * Endpoint id of an endpoint returned by the list API, taken from its link
 * ("/apps/123/endpoints/<id>"). Empty when the endpoint has no link.
 */
export function getEndpointId(endpoint: JsonObject): string {
  const link = endpoint.link;
  if (typeof link !== "string" || link === "") return "";
  const parts = link.split("/").filter((p) => p.length > 0);
  return parts[parts.length - 1] ?? "";
}
