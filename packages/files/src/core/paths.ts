/**
 * Existence checks and whole-path operations.
 */

import fs from "node:fs";
import { type Result, Ok, Err, unwrapOr } from "@fileops/core";
import { type FsError, fsCall } from "./errors.js";

/**
 * Whether an entry of any type is present at `filePath`.
 *
 * `Ok(false)` only when the host says the entry is absent (ENOENT, or a
 * path component that is not a directory). Any other stat failure means
 * existence cannot be confirmed and is returned as an error.
 */
export function checkExists(filePath: string): Result<boolean, FsError> {
  const stat = fsCall("stat", filePath, () => fs.statSync(filePath));
  if (stat.ok) {
    return Ok(true);
  }
  if (stat.error.kind === "not_found") {
    return Ok(false);
  }
  return Err(stat.error);
}

/**
 * True only when a stat of `filePath` succeeds.
 */
export function exists(filePath: string): boolean {
  return unwrapOr(checkExists(filePath), false);
}

/**
 * Whether the current process may read `filePath`.
 */
export function isReadable(filePath: string): boolean {
  return fsCall("access", filePath, () => fs.accessSync(filePath, fs.constants.R_OK)).ok;
}

/**
 * Rename a file or directory. Fails with `unsupported` across filesystems.
 */
export function rename(from: string, to: string): Result<void, FsError> {
  return fsCall("rename", from, () => fs.renameSync(from, to));
}

/**
 * Remove a path and everything under it. A missing path is not an error.
 */
export function remove(filePath: string): Result<void, FsError> {
  return fsCall("remove", filePath, () => fs.rmSync(filePath, { recursive: true, force: true }));
}
