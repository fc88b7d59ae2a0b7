/**
 * copy_file tool - Copy a file's bytes to another path.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface CopyFileInput {
  source: string;
  destination: string;
}

export const registerCopyFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "copy_file",
    {
      title: "Copy file",
      description: `Copy a file's bytes into another file, creating it if needed.

The destination is not truncated first: copying over a longer existing file keeps its trailing bytes. Remove the destination first when that matters.`,
      inputSchema: {
        source: z.string().describe("File to copy from"),
        destination: z.string().describe("File to copy into"),
      },
    },
    async (input: CopyFileInput) =>
      resultToStructuredResponse(
        service.copy(input.source, input.destination),
        (bytes) => ({
          text: `Copied ${bytes} bytes: ${input.source} -> ${input.destination}`,
          data: { source: input.source, destination: input.destination, bytes },
        }),
        describeFsError
      )
  );
};
