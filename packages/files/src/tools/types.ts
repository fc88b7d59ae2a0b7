/**
 * Shared types for file tool registration.
 */

import type { McpServer } from "@fileops/core";
import type { FileService } from "../core/FileService.js";
import type { FsError } from "../core/errors.js";

export interface ToolRegistrar {
  (server: McpServer, service: FileService): void;
}

/**
 * Structured details attached to every failed tool call.
 */
export function describeFsError(error: FsError): Record<string, unknown> {
  return {
    kind: error.kind,
    step: error.step,
    ...(error.code !== undefined ? { code: error.code } : {}),
  };
}
