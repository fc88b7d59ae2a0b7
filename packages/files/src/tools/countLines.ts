/**
 * count_lines tool - Count the lines of a file.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface CountLinesInput {
  path: string;
}

export const registerCountLines: ToolRegistrar = (server, service) => {
  server.registerTool(
    "count_lines",
    {
      title: "Count lines",
      description:
        "Count the lines of a file without loading it into memory. A final line without a trailing newline still counts.",
      inputSchema: {
        path: z.string().describe("File path, relative to the server root or absolute"),
      },
    },
    async (input: CountLinesInput) =>
      resultToStructuredResponse(
        service.countLines(input.path),
        (lines) => ({
          text: `${input.path}: ${lines} line${lines === 1 ? "" : "s"}`,
          data: { path: input.path, lines },
        }),
        describeFsError
      )
  );
};
