/**
 * Whole-file reads and writes.
 */

import fs from "node:fs";
import type { Result } from "@fileops/core";
import { type FsError, fsCall, settle } from "./errors.js";
import { closeFile, openFile, writeAll } from "./handles.js";
import { FILE_MODE } from "./model.js";

/**
 * Read a whole file as UTF-8 text. No size limit is enforced.
 */
export function readFile(filePath: string): Result<string, FsError> {
  return fsCall("read", filePath, () => fs.readFileSync(filePath, "utf-8"));
}

/**
 * Create or truncate a file and write `data` into it. Not atomic: a crash
 * mid-write leaves a partial file.
 */
export function writeFile(filePath: string, data: string): Result<void, FsError> {
  return fsCall("write", filePath, () => fs.writeFileSync(filePath, data, { mode: FILE_MODE }));
}

/**
 * Append `data` at the end of a file, creating it when missing.
 * Returns once every byte has been handed to the OS.
 */
export function appendString(filePath: string, data: string): Result<void, FsError> {
  const opened = openFile(
    filePath,
    fs.constants.O_RDWR | fs.constants.O_CREAT | fs.constants.O_APPEND,
    FILE_MODE
  );
  if (!opened.ok) {
    return opened;
  }
  const written = writeAll(opened.value, Buffer.from(data, "utf-8"), filePath);
  return settle(written, closeFile(opened.value, filePath));
}
