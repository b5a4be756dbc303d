/**
 * Configuration for the ScoutAPM MCP server.
 * Reads the optional ~/.scout-apm-mcp/config.yaml and layers environment
 * variables over it.
 *
 * CONFIG_REFERENCE is the single source of truth for all configurable
 * parameters: default values, environment overrides, code locations.
 */

import { z } from "zod";
import type { ScoutConfig } from "../types.js";
import { paths } from "../utils/paths.js";
import { readYaml } from "../utils/yaml.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_API_BASE = "https://scoutapm.com/api/v0";
export const DEFAULT_OP_FIELD = "API_KEY";
export const DEFAULT_OPENAPI_LOCAL_PATH = "tmp/scoutapm_openapi.yaml";

// ─── Centralized Configuration Reference ─────────────────

export interface ConfigParamInfo {
  path: string;
  default_value: unknown;
  type: string;
  description: string;
  env?: string;
  code_ref: string;
}

export const CONFIG_REFERENCE: ConfigParamInfo[] = [
  {
    path: "api_key",
    default_value: null,
    type: "string | null",
    description: "ScoutAPM API key. Environment variables API_KEY and SCOUT_APM_API_KEY take precedence",
    env: "API_KEY, SCOUT_APM_API_KEY",
    code_ref: "src/core/credentials.ts → getApiKey()",
  },
  {
    path: "api_base",
    default_value: DEFAULT_API_BASE,
    type: "string (URL)",
    description: "Base URL of the ScoutAPM REST API",
    env: "SCOUT_APM_API_BASE",
    code_ref: "src/core/client.ts → ScoutClient",
  },
  {
    path: "ssl_cert_file",
    default_value: null,
    type: "string (path) | null",
    description: "PEM bundle used as the trust store for HTTPS. Falls back to the platform default when unset or missing",
    env: "SSL_CERT_FILE",
    code_ref: "src/core/client.ts → buildHttpsAgent()",
  },
  {
    path: "op_vault",
    default_value: null,
    type: "string | null",
    description: "1Password vault holding the API key (used with op_item when no key is set)",
    code_ref: "src/core/credentials.ts → getApiKey()",
  },
  {
    path: "op_item",
    default_value: null,
    type: "string | null",
    description: "1Password item holding the API key",
    env: "OP_ENV_ENTRY_PATH (op://Vault/Item)",
    code_ref: "src/core/credentials.ts → getApiKey()",
  },
  {
    path: "op_field",
    default_value: DEFAULT_OP_FIELD,
    type: "string",
    description: "Field of the 1Password item that contains the API key",
    code_ref: "src/core/credentials.ts → getApiKey()",
  },
  {
    path: "openapi_local_path",
    default_value: DEFAULT_OPENAPI_LOCAL_PATH,
    type: "string (path)",
    description: "Local copy of the OpenAPI schema compared by scout_fetch_openapi_schema (relative to the working directory)",
    code_ref: "src/core/openapi.ts → inspectOpenApiSchema()",
  },
];

/**
 * Format CONFIG_REFERENCE as readable markdown.
 */
export function formatConfigReference(filter?: string): string {
  let params = CONFIG_REFERENCE;
  if (filter) {
    const f = filter.toLowerCase();
    params = params.filter(
      (p) =>
        p.path.toLowerCase().includes(f) ||
        p.description.toLowerCase().includes(f) ||
        (p.env?.toLowerCase().includes(f) ?? false)
    );
  }

  if (params.length === 0) return "No matching parameters found.";

  const lines: string[] = [
    "# ScoutAPM MCP Configuration Reference",
    "",
    `File: ${paths.config()}`,
    `${params.length} parameter(s)${filter ? ` matching "${filter}"` : ""}`,
    "",
  ];

  for (const p of params) {
    const defStr = p.default_value === null ? "null" : String(p.default_value);
    lines.push(`**\`${p.path}\`**`);
    lines.push(`- Type: \`${p.type}\``);
    lines.push(`- Default: \`${defStr}\``);
    if (p.env) lines.push(`- Environment: ${p.env}`);
    lines.push(`- ${p.description}`);
    lines.push(`- Code: \`${p.code_ref}\``);
    lines.push("");
  }

  return lines.join("\n");
}

// ─── Loading ─────────────────────────────────────────────

const ConfigFileSchema = z
  .object({
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
    ssl_cert_file: z.string().optional(),
    op_vault: z.string().optional(),
    op_item: z.string().optional(),
    op_field: z.string().optional(),
    openapi_local_path: z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export async function loadConfigFile(): Promise<ConfigFile> {
  const raw = await readYaml(paths.config());
  if (raw === null || raw === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config file ${paths.config()}: ${issues}`);
  }
  return parsed.data;
}

let cachedConfig: ScoutConfig | null = null;

export async function getConfig(): Promise<ScoutConfig> {
  if (cachedConfig) return cachedConfig;
  const file = await loadConfigFile();
  const config: ScoutConfig = {
    ...file,
    api_base: process.env.SCOUT_APM_API_BASE || file.api_base || DEFAULT_API_BASE,
    ssl_cert_file: process.env.SSL_CERT_FILE || file.ssl_cert_file,
    op_field: file.op_field ?? DEFAULT_OP_FIELD,
    openapi_local_path: file.openapi_local_path ?? DEFAULT_OPENAPI_LOCAL_PATH,
  };
  cachedConfig = config;
  return config;
}

export function invalidateConfigCache(): void {
  cachedConfig = null;
}

/** Effective configuration with the API key masked. */
export function redactConfig(config: ScoutConfig): Record<string, unknown> {
  const { api_key, ...rest } = config;
  return { ...rest, api_key: api_key ? "[redacted]" : null };
}

export async function getConfigValue(key?: string): Promise<unknown> {
  const config = redactConfig(await getConfig());
  if (!key) return config;
  return config[key];
}
