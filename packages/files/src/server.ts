#!/usr/bin/env node
/**
 * Files MCP server.
 * Filesystem convenience operations for AI agents, rooted at FILEOPS_ROOT.
 */

import { runServer } from "@fileops/core";
import { FileService } from "./core/FileService.js";
import { loadConfig } from "./config.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { registerAllTools } from "./tools/index.js";

interface Services {
  files: FileService;
}

runServer<Services>({
  config: {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  createServices: () => ({
    files: new FileService(loadConfig().root),
  }),
  registerTools: (server, services) => {
    registerAllTools(server, services.files);
  },
  onStartup: (services) => {
    console.error(`[fileops] Ready. Root: ${services.files.root}`);
  },
  onShutdown: () => {
    console.error("[fileops] Shutting down...");
  },
});
