export { type Result, Ok, Err, map, andThen, unwrapOr, capture } from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type ErrorData,
  type SuccessData,
  errorResponse,
  successResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  createServer,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
