import type { McpServer } from "@fileops/core";
import type { FileService } from "../core/FileService.js";
import type { ToolRegistrar } from "./types.js";

import { registerCountLines } from "./countLines.js";
import { registerCopyFile } from "./copyFile.js";
import { registerReadFile } from "./readFile.js";
import { registerWriteFile, registerAppendFile } from "./writeFile.js";
import { registerPathExists } from "./pathExists.js";
import { registerRenamePath, registerRemovePath } from "./managePaths.js";
import { registerMakeDir, registerClearDir, registerListFiles } from "./directories.js";

const allTools: ToolRegistrar[] = [
  registerCountLines,
  registerCopyFile,
  registerReadFile,
  registerWriteFile,
  registerAppendFile,
  registerPathExists,
  registerRenamePath,
  registerRemovePath,
  registerMakeDir,
  registerClearDir,
  registerListFiles,
];

export function registerAllTools(server: McpServer, service: FileService): void {
  for (const register of allTools) {
    register(server, service);
  }
}

export { describeFsError, type ToolRegistrar } from "./types.js";
