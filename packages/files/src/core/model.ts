/**
 * Core domain types for the files package.
 */

/**
 * Closed set of failure kinds every host error is mapped onto.
 */
export type FsErrorKind =
  | "not_found"
  | "permission_denied"
  | "already_exists"
  | "is_directory"
  | "io_fault"
  | "unsupported";

/**
 * Sub-step of an operation that produced an error.
 * Copy distinguishes its two handles; everything else uses the plain step.
 */
export type FsStep =
  | "open"
  | "open source"
  | "open destination"
  | "read"
  | "write"
  | "close"
  | "close source"
  | "close destination"
  | "stat"
  | "access"
  | "rename"
  | "remove"
  | "mkdir"
  | "opendir"
  | "readdir";

/** Mode for files created by copy, write and append (owner rw, others r). */
export const FILE_MODE = 0o644;

/** Mode for directories created by makeDir. */
export const DIR_MODE = 0o755;

/** Size of the buffer used by line counting and copying. */
export const BUFFER_SIZE = 64 * 1024;

/**
 * Host errno codes and the kind each maps to. Unlisted codes are io_fault.
 */
export const ERROR_KINDS: Readonly<Record<string, FsErrorKind>> = {
  ENOENT: "not_found",
  ENOTDIR: "not_found",
  EACCES: "permission_denied",
  EPERM: "permission_denied",
  EROFS: "permission_denied",
  EEXIST: "already_exists",
  ENOTEMPTY: "already_exists",
  EISDIR: "is_directory",
  EXDEV: "unsupported",
  ENOSYS: "unsupported",
  ENOTSUP: "unsupported",
  EOPNOTSUPP: "unsupported",
};
