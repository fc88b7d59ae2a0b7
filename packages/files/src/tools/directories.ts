/**
 * make_dir, clear_dir and list_files tools.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface DirInput {
  path: string;
}

interface ListFilesInput {
  path: string;
  suffix?: string;
}

export const registerMakeDir: ToolRegistrar = (server, service) => {
  server.registerTool(
    "make_dir",
    {
      title: "Make directory",
      description: "Create a directory and any missing parents. Succeeds if it already exists.",
      inputSchema: {
        path: z.string().describe("Directory path"),
      },
    },
    async (input: DirInput) =>
      resultToStructuredResponse(
        service.makeDir(input.path),
        () => ({ text: `Created ${input.path}`, data: { path: input.path } }),
        describeFsError
      )
  );
};

export const registerClearDir: ToolRegistrar = (server, service) => {
  server.registerTool(
    "clear_dir",
    {
      title: "Clear directory",
      description:
        "Remove everything inside a directory but keep the directory. Stops at the first entry that cannot be removed.",
      inputSchema: {
        path: z.string().describe("Directory path"),
      },
    },
    async (input: DirInput) =>
      resultToStructuredResponse(
        service.clearDir(input.path),
        () => ({ text: `Cleared ${input.path}`, data: { path: input.path } }),
        describeFsError
      )
  );
};

export const registerListFiles: ToolRegistrar = (server, service) => {
  server.registerTool(
    "list_files",
    {
      title: "List files",
      description:
        "List the immediate entries of a directory (not recursive), optionally only those with an exact extension such as \".txt\".",
      inputSchema: {
        path: z.string().describe("Directory path"),
        suffix: z.string().optional().describe("Extension to keep, including the dot (e.g. \".ts\")"),
      },
    },
    async (input: ListFilesInput) =>
      resultToStructuredResponse(
        service.listFiles(input.path, input.suffix),
        (files) => ({
          text: files.length > 0 ? files.join("\n") : "(no entries)",
          data: { path: input.path, files, count: files.length },
        }),
        describeFsError
      )
  );
};
