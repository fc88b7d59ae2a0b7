/**
 * Files package - filesystem convenience operations.
 *
 * Every operation is synchronous, returns a Result and holds its handles
 * only for the duration of the call:
 * - countLines, copyFile
 * - readFile, writeFile, appendString
 * - exists, checkExists, isReadable, rename, remove
 * - makeDir, clearDir, listFiles
 *
 * The same operations are exposed as MCP tools by the `fileops:files` server.
 */

export type { FsErrorKind, FsStep } from "./core/model.js";
export { FILE_MODE, DIR_MODE, BUFFER_SIZE } from "./core/model.js";
export { FsError, type FsErrorOptions, toFsError, combineErrors, settle } from "./core/errors.js";
export { countLines } from "./core/lines.js";
export { copyFile } from "./core/copy.js";
export { readFile, writeFile, appendString } from "./core/contents.js";
export { exists, checkExists, isReadable, rename, remove } from "./core/paths.js";
export { makeDir, clearDir, listFiles } from "./core/dirs.js";
export { FileService } from "./core/FileService.js";
export { loadConfig, type FilesConfig } from "./config.js";
export { SERVER_NAME, SERVER_VERSION } from "./constants.js";
export { registerAllTools, describeFsError, type ToolRegistrar } from "./tools/index.js";
