/**
 * API key resolution.
 *
 * Sources, first non-blank wins:
 *   1. explicit value
 *   2. API_KEY / SCOUT_APM_API_KEY environment variables
 *   3. api_key in config.yaml
 *   4. OP_ENV_ENTRY_PATH=op://Vault/Item via the 1Password CLI
 *   5. op_vault + op_item (argument or config.yaml) via the 1Password CLI
 */

import { execFile } from "node:child_process";
import { getConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

export type SecretReader = (reference: string) => Promise<string>;

export interface ApiKeyOptions {
  apiKey?: string | null;
  opVault?: string;
  opItem?: string;
  opField?: string;
  /** Reads an op:// reference; defaults to `op read`. */
  readSecret?: SecretReader;
}

const OP_ENTRY_PATH = /^op:\/\/([^/]+)\/(.+)$/;

export const readOpSecret: SecretReader = (reference) =>
  new Promise((resolve, reject) => {
    execFile("op", ["read", reference], { timeout: 30000 }, (err, stdout, stderr) => {
      if (err) {
        reject(new Error(`op read failed: ${stderr.trim() || err.message}`));
        return;
      }
      resolve(stdout.trim());
    });
  });

function present(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "";
}

async function tryReadSecret(readSecret: SecretReader, reference: string): Promise<string | null> {
  try {
    const value = await readSecret(reference);
    return present(value) ? value.trim() : null;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[credentials] 1Password lookup for ${reference} failed: ${message}`);
    return null;
  }
}

export async function getApiKey(options: ApiKeyOptions = {}): Promise<string> {
  if (present(options.apiKey)) return options.apiKey;

  const fromEnv = process.env.API_KEY || process.env.SCOUT_APM_API_KEY;
  if (present(fromEnv)) return fromEnv;

  const config = await getConfig();
  if (present(config.api_key)) return config.api_key;

  const readSecret = options.readSecret ?? readOpSecret;
  const field = options.opField ?? config.op_field;

  const entryPath = process.env.OP_ENV_ENTRY_PATH;
  if (present(entryPath)) {
    const match = OP_ENTRY_PATH.exec(entryPath.trim());
    if (match) {
      const key = await tryReadSecret(readSecret, `op://${match[1]}/${match[2]}/${field}`);
      if (key) return key;
    } else {
      console.error(`[credentials] Ignoring OP_ENV_ENTRY_PATH, expected op://Vault/Item: ${entryPath}`);
    }
  }

  const vault = options.opVault ?? config.op_vault;
  const item = options.opItem ?? config.op_item;
  if (present(vault) && present(item)) {
    const key = await tryReadSecret(readSecret, `op://${vault}/${item}/${field}`);
    if (key) return key;
  }

  throw new ConfigurationError(
    "API key not found. Set API_KEY or SCOUT_APM_API_KEY, add api_key to " +
      "config.yaml, or provide OP_ENV_ENTRY_PATH (or op_vault and op_item) for 1Password"
  );
}
