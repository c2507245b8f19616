/**
 * @module tools/response
 * @fileoverview MCP tool result helpers shared by every tool handler.
 */

import { formatError } from "../utils/errors.js";

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/** Successful tool result carrying one text block. */
export function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

/** Failed tool result; the error is rendered with {@link formatError}. */
export function errorResult(error: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: formatError(error) }],
    isError: true,
  };
}
