import { type Result, Ok } from "@fileops/core";
import { type FsError, settle } from "./errors.js";
import { closeFile, openFile, readChunk } from "./handles.js";
import { BUFFER_SIZE } from "./model.js";

const NEWLINE = 0x0a;

/**
 * Count the lines of a file without loading it whole.
 *
 * Every `\n` ends a line (so `\r\n` counts once). A final line without a
 * terminator still counts when it has at least one byte. An empty file has
 * no lines.
 */
export function countLines(filePath: string): Result<number, FsError> {
  const opened = openFile(filePath, "r", undefined);
  if (!opened.ok) {
    return opened;
  }
  const fd = opened.value;
  const counted = scanLines(fd, filePath);
  return settle(counted, closeFile(fd, filePath));
}

function scanLines(fd: number, filePath: string): Result<number, FsError> {
  const buffer = Buffer.alloc(BUFFER_SIZE);
  let count = 0;
  let partial = false;

  for (;;) {
    const read = readChunk(fd, buffer, filePath);
    if (!read.ok) {
      return read;
    }
    if (read.value === 0) {
      break;
    }

    const chunk = buffer.subarray(0, read.value);
    let offset = 0;
    while (offset < chunk.length) {
      const newline = chunk.indexOf(NEWLINE, offset);
      if (newline === -1) {
        partial = true;
        break;
      }
      count++;
      partial = false;
      offset = newline + 1;
    }
  }

  return Ok(partial ? count + 1 : count);
}
