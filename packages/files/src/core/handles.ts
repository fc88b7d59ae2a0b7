/**
 * File descriptor helpers shared by the streaming operations.
 * Each returns a Result tagged with the step it performs.
 */

import fs from "node:fs";
import type { Result } from "@fileops/core";
import { type FsError, fsCall } from "./errors.js";
import type { FsStep } from "./model.js";

export function openFile(
  filePath: string,
  flags: string | number,
  mode: number | undefined,
  step: FsStep = "open"
): Result<number, FsError> {
  return fsCall(step, filePath, () => fs.openSync(filePath, flags, mode));
}

export function closeFile(fd: number, filePath: string, step: FsStep = "close"): Result<void, FsError> {
  return fsCall(step, filePath, () => fs.closeSync(fd));
}

/**
 * Read the next chunk at the current position. Zero bytes means end of file.
 */
export function readChunk(fd: number, buffer: Buffer, filePath: string): Result<number, FsError> {
  return fsCall("read", filePath, () => fs.readSync(fd, buffer, 0, buffer.length, null));
}

/**
 * Write all of `data`, looping over short writes.
 */
export function writeAll(fd: number, data: Uint8Array, filePath: string): Result<void, FsError> {
  return fsCall("write", filePath, () => {
    let offset = 0;
    while (offset < data.length) {
      offset += fs.writeSync(fd, data, offset, data.length - offset, null);
    }
  });
}
