/**
 * Shared fixtures: an isolated config directory and environment per test.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { invalidateConfigCache } from "../src/core/config.js";
import { setConfigDir } from "../src/utils/paths.js";

const ENV_KEYS = [
  "API_KEY",
  "SCOUT_APM_API_KEY",
  "OP_ENV_ENTRY_PATH",
  "SSL_CERT_FILE",
  "SCOUT_APM_API_BASE",
  "SCOUT_APM_MCP_HOME",
];

export interface Sandbox {
  dir: string;
  writeConfig(content: string): void;
  restore(): void;
}

export function createSandbox(): Sandbox {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "scout-apm-mcp-"));
  const saved = new Map<string, string | undefined>();
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
  setConfigDir(dir);
  invalidateConfigCache();

  return {
    dir,
    writeConfig(content: string) {
      fs.writeFileSync(path.join(dir, "config.yaml"), content);
    },
    restore() {
      for (const [key, value] of saved) {
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
      setConfigDir(null);
      invalidateConfigCache();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

// ─── HTTP ────────────────────────────────────────────────

export interface FakeResponse {
  status?: number;
  statusText?: string;
  body?: unknown;
  /** Sent verbatim instead of JSON-encoding `body`. */
  raw?: string;
  headers?: Record<string, string>;
}

export interface FakeHttp {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

/**
 * In-process axios adapter answering each request with the next queued
 * response (or error). The last entry repeats once the queue runs dry.
 */
export function fakeHttp(...responses: Array<FakeResponse | Error>): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];
  let index = 0;

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (next === undefined) throw new Error("fakeHttp: no response queued");
    if (next instanceof Error) throw next;

    const response: AxiosResponse<string> = {
      data: next.raw ?? JSON.stringify(next.body ?? {}),
      status: next.status ?? 200,
      statusText: next.statusText ?? "OK",
      headers: next.headers ?? { "content-type": "application/json" },
      config,
      request: {},
    };
    return response;
  };

  return { adapter, requests };
}

export function ok(results: unknown): FakeResponse {
  return { body: { header: { status: { code: 200, message: "OK" } }, results } };
}
