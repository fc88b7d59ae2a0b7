import fs from "node:fs";
import { type Result, Ok } from "@fileops/core";
import { type FsError, settle } from "./errors.js";
import { closeFile, openFile, readChunk, writeAll } from "./handles.js";
import { BUFFER_SIZE, FILE_MODE } from "./model.js";

/**
 * Copy the bytes of `source` into `destination`, returning how many were copied.
 *
 * The destination is created when missing but never truncated: copying a
 * shorter file over a longer one leaves the old trailing bytes in place.
 * Both handles are closed on every path; a close failure overrides a
 * successful copy and is combined with a failed one.
 */
export function copyFile(source: string, destination: string): Result<number, FsError> {
  const src = openFile(source, "r", undefined, "open source");
  if (!src.ok) {
    return src;
  }

  const dst = openFile(
    destination,
    fs.constants.O_WRONLY | fs.constants.O_CREAT,
    FILE_MODE,
    "open destination"
  );
  if (!dst.ok) {
    return settle(dst, closeFile(src.value, source, "close source"));
  }

  const copied = pump(src.value, dst.value, source, destination);
  return settle(
    copied,
    closeFile(src.value, source, "close source"),
    closeFile(dst.value, destination, "close destination")
  );
}

function pump(srcFd: number, dstFd: number, source: string, destination: string): Result<number, FsError> {
  const buffer = Buffer.alloc(BUFFER_SIZE);
  let total = 0;

  for (;;) {
    const read = readChunk(srcFd, buffer, source);
    if (!read.ok) {
      return read;
    }
    if (read.value === 0) {
      return Ok(total);
    }
    const written = writeAll(dstFd, buffer.subarray(0, read.value), destination);
    if (!written.ok) {
      return written;
    }
    total += read.value;
  }
}
