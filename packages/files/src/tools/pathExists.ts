/**
 * path_exists tool - Check whether a path exists and is readable.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface PathExistsInput {
  path: string;
}

export const registerPathExists: ToolRegistrar = (server, service) => {
  server.registerTool(
    "path_exists",
    {
      title: "Check path",
      description:
        "Check whether a file or directory exists and whether it can be read. Fails when existence cannot be determined (e.g. permission denied on a parent).",
      inputSchema: {
        path: z.string().describe("Path to check"),
      },
    },
    async (input: PathExistsInput) =>
      resultToStructuredResponse(
        service.checkExists(input.path),
        (exists) => {
          const readable = exists && service.isReadable(input.path);
          const state = exists ? (readable ? "exists (readable)" : "exists (not readable)") : "does not exist";
          return {
            text: `${input.path} ${state}`,
            data: { path: input.path, exists, readable },
          };
        },
        describeFsError
      )
  );
};
