/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for building consistent tool responses.
 */

import type { Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 * The index signature keeps it assignable to the SDK's CallToolResult.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export type ErrorData = { success: false; error: string } & Record<string, unknown>;

export type SuccessData<T extends Record<string, unknown>> = T & { success: true };

/**
 * Create an error response. Extra details (error kind, failing step) are
 * merged into the structured content.
 */
export function errorResponse(
  message: string,
  details: Record<string, unknown> = {}
): ToolResponse<ErrorData> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { ...details, success: false, error: message },
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<SuccessData<T>> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to an MCP tool response with structured data.
 * On success the formatter supplies text and data; on failure the optional
 * `describe` callback supplies extra error details.
 */
export function resultToStructuredResponse<T, E extends Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S },
  describe?: (error: E) => Record<string, unknown>
): ToolResponse<SuccessData<S> | ErrorData> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return successResponse(text, data);
  }
  return errorResponse(result.error.message, describe?.(result.error));
}
