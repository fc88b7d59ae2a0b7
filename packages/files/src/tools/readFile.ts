/**
 * read_file tool - Read a whole file as text.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface ReadFileInput {
  path: string;
}

export const registerReadFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "read_file",
    {
      title: "Read file",
      description: "Read the whole content of a file as UTF-8 text.",
      inputSchema: {
        path: z.string().describe("File path"),
      },
    },
    async (input: ReadFileInput) =>
      resultToStructuredResponse(
        service.read(input.path),
        (content) => ({ text: content, data: { path: input.path, content } }),
        describeFsError
      )
  );
};
