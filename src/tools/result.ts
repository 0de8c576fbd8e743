/**
 * Shared helpers for building AgentToolResult objects.
 */

import type { AgentToolResult } from "@mariozechner/pi-agent-core";
import { isStoreError } from "../store/errors.js";

/**
 * Extract a string message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Build a failure AgentToolResult from a caught error.
 *
 * Store errors carry their kind into both the JSON payload and details, so
 * callers can branch on it without parsing the message.
 *
 * @param prefix  Optional prefix for the user-facing message, e.g. "Failed to read note".
 */
export function toolError(error: unknown, prefix?: string): AgentToolResult<unknown> {
  const msg = errorMessage(error);
  const displayMsg = prefix ? `${prefix}: ${msg}` : msg;
  const kind = isStoreError(error) ? error.kind : "StorageFailure";
  return {
    content: [{ type: "text", text: JSON.stringify({ error: displayMsg, kind }) }],
    details: { error: msg, kind },
  };
}

/**
 * Build a success AgentToolResult with a JSON payload.
 */
export function toolSuccess(data: Record<string, unknown>): AgentToolResult<unknown> {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
    details: data,
  };
}
