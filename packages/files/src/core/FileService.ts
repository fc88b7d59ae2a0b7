import path from "node:path";
import type { Result } from "@fileops/core";
import type { FsError } from "./errors.js";
import { countLines } from "./lines.js";
import { copyFile } from "./copy.js";
import { appendString, readFile, writeFile } from "./contents.js";
import { checkExists, exists, isReadable, remove, rename } from "./paths.js";
import { clearDir, listFiles, makeDir } from "./dirs.js";

/**
 * File operations relative to a root directory.
 * Relative paths resolve against the root; absolute paths are used as given.
 */
export class FileService {
  readonly root: string;

  constructor(root?: string) {
    this.root = path.resolve(root ?? process.cwd());
  }

  resolve(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.root, filePath);
  }

  countLines(filePath: string): Result<number, FsError> {
    return countLines(this.resolve(filePath));
  }

  copy(source: string, destination: string): Result<number, FsError> {
    return copyFile(this.resolve(source), this.resolve(destination));
  }

  read(filePath: string): Result<string, FsError> {
    return readFile(this.resolve(filePath));
  }

  write(filePath: string, data: string): Result<void, FsError> {
    return writeFile(this.resolve(filePath), data);
  }

  append(filePath: string, data: string): Result<void, FsError> {
    return appendString(this.resolve(filePath), data);
  }

  exists(filePath: string): boolean {
    return exists(this.resolve(filePath));
  }

  checkExists(filePath: string): Result<boolean, FsError> {
    return checkExists(this.resolve(filePath));
  }

  isReadable(filePath: string): boolean {
    return isReadable(this.resolve(filePath));
  }

  rename(from: string, to: string): Result<void, FsError> {
    return rename(this.resolve(from), this.resolve(to));
  }

  remove(filePath: string): Result<void, FsError> {
    return remove(this.resolve(filePath));
  }

  makeDir(dirPath: string): Result<void, FsError> {
    return makeDir(this.resolve(dirPath));
  }

  clearDir(dirPath: string): Result<void, FsError> {
    return clearDir(this.resolve(dirPath));
  }

  listFiles(dirPath: string, suffix?: string): Result<string[], FsError> {
    return listFiles(this.resolve(dirPath), suffix);
  }
}
