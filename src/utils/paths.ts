/**
 * Centralized path resolution for the ScoutAPM MCP config directory.
 * Lives under ~/.scout-apm-mcp/ unless SCOUT_APM_MCP_HOME says otherwise.
 */

import path from "node:path";
import os from "node:os";

let configDir: string | null = null;

export function setConfigDir(dir: string | null): void {
  configDir = dir;
}

export function getConfigDir(): string {
  if (configDir) return configDir;
  const fromEnv = process.env.SCOUT_APM_MCP_HOME;
  if (fromEnv) return fromEnv;
  return path.join(os.homedir(), ".scout-apm-mcp");
}

export const paths = {
  config: () => path.join(getConfigDir(), "config.yaml"),
};
