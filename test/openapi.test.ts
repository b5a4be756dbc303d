import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONTENT_PREVIEW_LENGTH, inspectOpenApiSchema } from "../src/core/openapi.js";
import type { OpenApiSchema } from "../src/types.js";

const REMOTE = "openapi: 3.0.1\ninfo:\n  title: Scout\n  version: v0\npaths:\n  /apps: {}\n";

function schema(content: string): OpenApiSchema {
  return { content, content_type: "application/yaml", status: 200 };
}

let dir: string;
let localPath: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "scout-openapi-"));
  localPath = path.join(dir, "scoutapm_openapi.yaml");
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("inspectOpenApiSchema", () => {
  it("summarizes the fetch", async () => {
    expect(await inspectOpenApiSchema(schema(REMOTE), { localPath })).toEqual({
      fetched: true,
      content_type: "application/yaml",
      status: 200,
      content_length: REMOTE.length,
      content_preview: REMOTE,
    });
  });

  it("truncates the preview", async () => {
    const content = `# ${"x".repeat(600)}\n`;
    const result = await inspectOpenApiSchema(schema(content), { localPath });
    expect(result.content_preview).toBe(content.slice(0, CONTENT_PREVIEW_LENGTH));
    expect(result.content_length).toBe(content.length);
  });

  it("validates YAML and reports the version", async () => {
    const result = await inspectOpenApiSchema(schema(REMOTE), { validate: true, localPath });
    expect(result).toMatchObject({
      valid_yaml: true,
      openapi_version: "3.0.1",
      info: { title: "Scout", version: "v0" },
    });
  });

  it("reports invalid YAML", async () => {
    const result = await inspectOpenApiSchema(schema("paths: [unclosed"), { validate: true, localPath });
    expect(result.valid_yaml).toBe(false);
    expect(typeof result.validation_error).toBe("string");
  });

  it("notes a missing local copy", async () => {
    const result = await inspectOpenApiSchema(schema(REMOTE), { compareWithLocal: true, localPath });
    expect(result.local_file_exists).toBe(false);
    expect(result).not.toHaveProperty("content_matches");
  });

  it("matches an identical local copy", async () => {
    fs.writeFileSync(localPath, REMOTE);
    const result = await inspectOpenApiSchema(schema(REMOTE), { compareWithLocal: true, localPath });
    expect(result).toMatchObject({
      local_file_exists: true,
      local_file_length: REMOTE.length,
      content_matches: true,
    });
    expect(result).not.toHaveProperty("structure_matches");
  });

  it("compares structure when the text differs", async () => {
    const local = "openapi: '3.0.1'\ninfo: {title: Scout, version: v0}\npaths:\n  /apps: {}\n";
    fs.writeFileSync(localPath, local);

    expect(await inspectOpenApiSchema(schema(REMOTE), { compareWithLocal: true, localPath })).toEqual({
      fetched: true,
      content_type: "application/yaml",
      status: 200,
      content_length: REMOTE.length,
      local_file_exists: true,
      local_file_length: local.length,
      content_matches: false,
      structure_matches: true,
      remote_paths_count: 1,
      local_paths_count: 1,
      content_preview: REMOTE,
    });
  });

  it("detects structural drift", async () => {
    fs.writeFileSync(localPath, "openapi: 3.0.1\npaths:\n  /apps: {}\n  \"/apps/{id}\": {}\n");
    const result = await inspectOpenApiSchema(schema(REMOTE), { compareWithLocal: true, localPath });
    expect(result).toMatchObject({
      content_matches: false,
      structure_matches: false,
      remote_paths_count: 1,
      local_paths_count: 2,
    });
  });
});
