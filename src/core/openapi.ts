/**
 * Summaries of the published OpenAPI schema: optional YAML validation and a
 * comparison against a local copy.
 */

import path from "node:path";
import { isDeepStrictEqual } from "node:util";
import type { JsonObject, OpenApiSchema } from "../types.js";
import { parseYaml, readText } from "../utils/yaml.js";

export const CONTENT_PREVIEW_LENGTH = 500;

export interface InspectOptions {
  validate?: boolean;
  compareWithLocal?: boolean;
  /** Resolved against the working directory. */
  localPath: string;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pathsCount(doc: unknown): number | null {
  if (!isObject(doc) || !isObject(doc.paths)) return null;
  return Object.keys(doc.paths).length;
}

function validateSchema(content: string): JsonObject {
  try {
    const doc = parseYaml(content);
    const result: JsonObject = { valid_yaml: true };
    if (isObject(doc)) {
      if (doc.openapi !== undefined) result.openapi_version = doc.openapi;
      if (doc.info) result.info = doc.info;
    }
    return result;
  } catch (err) {
    return {
      valid_yaml: false,
      validation_error: err instanceof Error ? err.message : String(err),
    };
  }
}

async function compareWithLocal(content: string, localPath: string): Promise<JsonObject> {
  const local = await readText(path.resolve(localPath));
  if (local === null) return { local_file_exists: false };

  const result: JsonObject = {
    local_file_exists: true,
    local_file_length: local.length,
    content_matches: content === local,
  };
  if (content === local) return result;

  try {
    const remoteDoc = parseYaml(content);
    const localDoc = parseYaml(local);
    result.structure_matches = isDeepStrictEqual(remoteDoc, localDoc);
    const remotePaths = pathsCount(remoteDoc);
    const localPaths = pathsCount(localDoc);
    if (remotePaths !== null) result.remote_paths_count = remotePaths;
    if (localPaths !== null) result.local_paths_count = localPaths;
  } catch (err) {
    result.comparison_error = err instanceof Error ? err.message : String(err);
  }
  return result;
}

export async function inspectOpenApiSchema(
  schema: OpenApiSchema,
  options: InspectOptions
): Promise<JsonObject> {
  let result: JsonObject = {
    fetched: true,
    content_type: schema.content_type,
    status: schema.status,
    content_length: schema.content.length,
  };

  if (options.validate) {
    result = { ...result, ...validateSchema(schema.content) };
  }
  if (options.compareWithLocal) {
    result = { ...result, ...(await compareWithLocal(schema.content, options.localPath)) };
  }

  result.content_preview = schema.content.slice(0, CONTENT_PREVIEW_LENGTH);
  return result;
}
