/**
 * Stdio transport that never emits a JSON-RPC error response without an id.
 * Some MCP clients reject `"id": null`, so anonymous errors get a generated
 * `error_<hex>` id before they are written.
 */

import { randomBytes } from "node:crypto";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { JSONRPCMessage, RequestId } from "@modelcontextprotocol/sdk/types.js";

type ErrorResponse = Extract<JSONRPCMessage, { error: unknown }>;

/** An error response as produced before a request id is known. */
export interface AnonymousErrorMessage {
  jsonrpc: "2.0";
  id?: RequestId | null;
  error: ErrorResponse["error"];
}

type OutgoingMessage = JSONRPCMessage | AnonymousErrorMessage;

export function generateErrorId(): string {
  return `error_${randomBytes(8).toString("hex")}`;
}

function isErrorResponse(message: OutgoingMessage): message is ErrorResponse | AnonymousErrorMessage {
  return "error" in message;
}

export function ensureErrorId(message: OutgoingMessage): JSONRPCMessage {
  if (!isErrorResponse(message)) return message;

  const { id, ...rest } = message;
  if (id === null || id === undefined) {
    return { ...rest, id: generateErrorId() };
  }
  return { ...rest, id };
}

export class StrictIdStdioTransport extends StdioServerTransport {
  send(message: OutgoingMessage): Promise<void> {
    return super.send(ensureErrorId(message));
  }
}
