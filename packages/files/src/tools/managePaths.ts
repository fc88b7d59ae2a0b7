/**
 * rename_path and remove_path tools.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface RenameInput {
  from: string;
  to: string;
}

interface RemoveInput {
  path: string;
}

export const registerRenamePath: ToolRegistrar = (server, service) => {
  server.registerTool(
    "rename_path",
    {
      title: "Rename path",
      description: "Rename or move a file or directory. Moving across filesystems is not supported.",
      inputSchema: {
        from: z.string().describe("Current path"),
        to: z.string().describe("New path"),
      },
    },
    async (input: RenameInput) =>
      resultToStructuredResponse(
        service.rename(input.from, input.to),
        () => ({
          text: `Renamed ${input.from} -> ${input.to}`,
          data: { from: input.from, to: input.to },
        }),
        describeFsError
      )
  );
};

export const registerRemovePath: ToolRegistrar = (server, service) => {
  server.registerTool(
    "remove_path",
    {
      title: "Remove path",
      description: "Remove a file, or a directory with everything in it. Succeeds if the path does not exist.",
      inputSchema: {
        path: z.string().describe("Path to remove"),
      },
    },
    async (input: RemoveInput) =>
      resultToStructuredResponse(
        service.remove(input.path),
        () => ({ text: `Removed ${input.path}`, data: { path: input.path } }),
        describeFsError
      )
  );
};
