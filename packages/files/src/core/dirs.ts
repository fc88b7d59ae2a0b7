/**
 * Directory operations.
 */

import fs, { type Dir } from "node:fs";
import path from "node:path";
import { type Result, Ok, andThen, map } from "@fileops/core";
import { type FsError, fsCall, settle } from "./errors.js";
import { remove } from "./paths.js";
import { DIR_MODE } from "./model.js";

/**
 * Create a directory and any missing ancestors. An existing directory is fine.
 */
export function makeDir(dirPath: string): Result<void, FsError> {
  return map(
    fsCall("mkdir", dirPath, () => fs.mkdirSync(dirPath, { recursive: true, mode: DIR_MODE })),
    () => undefined
  );
}

/**
 * Remove every child of a directory, keeping the directory itself.
 * Stops at the first child that cannot be removed; later children stay.
 */
export function clearDir(dirPath: string): Result<void, FsError> {
  return withDir(dirPath, (names) => {
    for (const name of names) {
      const removed = remove(path.join(dirPath, name));
      if (!removed.ok) {
        return removed;
      }
    }
    return Ok(undefined);
  });
}

/**
 * List the immediate entries of a directory as paths joined onto `dirPath`,
 * in the order the host returns them.
 *
 * With a non-empty `suffix`, only entries whose extension equals it exactly
 * (leading dot included, e.g. ".txt") are kept.
 */
export function listFiles(dirPath: string, suffix = ""): Result<string[], FsError> {
  return withDir(dirPath, (names) =>
    Ok(
      names
        .filter((name) => suffix === "" || path.extname(name) === suffix)
        .map((name) => path.join(dirPath, name))
    )
  );
}

/**
 * Open a directory, read all its entry names, hand them to `fn` while the
 * handle is still open, then close it.
 */
function withDir<T>(
  dirPath: string,
  fn: (names: string[]) => Result<T, FsError>
): Result<T, FsError> {
  const opened = fsCall("opendir", dirPath, () => fs.opendirSync(dirPath));
  if (!opened.ok) {
    return opened;
  }
  const dir = opened.value;
  const outcome = andThen(readNames(dir, dirPath), fn);
  return settle(outcome, fsCall("close", dirPath, () => dir.closeSync()));
}

function readNames(dir: Dir, dirPath: string): Result<string[], FsError> {
  return fsCall("readdir", dirPath, () => {
    const names: string[] = [];
    for (let entry = dir.readSync(); entry !== null; entry = dir.readSync()) {
      names.push(entry.name);
    }
    return names;
  });
}
