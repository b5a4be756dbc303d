/**
 * YAML helpers for the config file and the OpenAPI schema.
 */

import fs from "node:fs/promises";
import yaml from "js-yaml";

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/** Read a file, or null when it does not exist. Other I/O errors propagate. */
export async function readText(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

export async function readYaml(filePath: string): Promise<unknown> {
  const content = await readText(filePath);
  if (content === null) return null;
  return yaml.load(content);
}

export function parseYaml(content: string): unknown {
  return yaml.load(content);
}

export function dumpYaml(data: unknown): string {
  return yaml.dump(data, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
  });
}
