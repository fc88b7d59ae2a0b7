/**
 * write_file and append_file tools.
 */

import * as z from "zod/v4";
import { map, resultToStructuredResponse } from "@fileops/core";
import { describeFsError, type ToolRegistrar } from "./types.js";

interface WriteInput {
  path: string;
  content: string;
}

const inputSchema = {
  path: z.string().describe("File path"),
  content: z.string().describe("Text to write"),
};

export const registerWriteFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "write_file",
    {
      title: "Write file",
      description: "Create a file, or replace the whole content of an existing one. Not atomic.",
      inputSchema,
    },
    async (input: WriteInput) =>
      resultToStructuredResponse(
        map(service.write(input.path, input.content), () => Buffer.byteLength(input.content)),
        (bytes) => ({
          text: `Wrote ${bytes} bytes to ${input.path}`,
          data: { path: input.path, bytes },
        }),
        describeFsError
      )
  );
};

export const registerAppendFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "append_file",
    {
      title: "Append to file",
      description: "Append text at the end of a file, creating the file if it does not exist.",
      inputSchema,
    },
    async (input: WriteInput) =>
      resultToStructuredResponse(
        map(service.append(input.path, input.content), () => Buffer.byteLength(input.content)),
        (bytes) => ({
          text: `Appended ${bytes} bytes to ${input.path}`,
          data: { path: input.path, bytes },
        }),
        describeFsError
      )
  );
};
