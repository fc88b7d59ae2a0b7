/**
 * MCP server bootstrap utilities.
 * One lifecycle for every server the workspace ships.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create an McpServer and register tools on it, without connecting a transport.
 */
export async function createServer<S>(
  options: Pick<ServerBootstrapOptions<S>, "config" | "createServices" | "registerTools">
): Promise<{ server: McpServer; services: S }> {
  const services = await options.createServices();
  const server = new McpServer({
    name: options.config.name,
    version: options.config.version,
  });
  options.registerTools(server, services);
  return { server, services };
}

/**
 * Bootstrap an MCP server over stdio.
 *
 * Creates services, registers tools, installs SIGTERM/SIGINT handlers,
 * runs the startup hook and connects the transport.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "fileops:files", version: "0.1.0" },
 *   createServices: () => ({ files: new FileService(root) }),
 *   registerTools: (server, services) => registerAllTools(server, services.files),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { onStartup, onShutdown } = options;
  const { server, services } = await createServer(options);
  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);
  await server.connect(transport);
}

/**
 * Entry point for server scripts: bootstrap, and exit 1 on a fatal error.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
