/**
 * FsError and the mapping from host errors onto it.
 */

import { type Result, Err, capture } from "@fileops/core";
import { ERROR_KINDS, type FsErrorKind, type FsStep } from "./model.js";

export interface FsErrorOptions {
  kind: FsErrorKind;
  step: FsStep;
  path?: string;
  code?: string;
  causes?: FsError[];
  cause?: unknown;
}

export class FsError extends Error {
  readonly kind: FsErrorKind;
  readonly step: FsStep;
  readonly path: string | undefined;
  readonly code: string | undefined;
  /** Component failures of a composite error; empty otherwise. */
  readonly causes: readonly FsError[];

  constructor(message: string, options: FsErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "FsError";
    this.kind = options.kind;
    this.step = options.step;
    this.path = options.path;
    this.code = options.code;
    this.causes = options.causes ?? [];
  }

  get composite(): boolean {
    return this.causes.length > 0;
  }
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}

export function kindOf(code: string | undefined): FsErrorKind {
  return (code !== undefined ? ERROR_KINDS[code] : undefined) ?? "io_fault";
}

/**
 * Map anything a host call threw onto an FsError for the given step.
 */
export function toFsError(thrown: unknown, step: FsStep, path?: string): FsError {
  if (thrown instanceof FsError) {
    return thrown;
  }
  if (isErrnoException(thrown)) {
    return new FsError(`${step}: ${thrown.message}`, {
      kind: kindOf(thrown.code),
      step,
      path: thrown.path ?? path,
      code: thrown.code,
      cause: thrown,
    });
  }
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  return new FsError(`${step}: ${message}`, { kind: "io_fault", step, path, cause: thrown });
}

/**
 * Fold several failures into one error naming all of them.
 * Kind and step come from the first failure.
 */
export function combineErrors(first: FsError, ...rest: FsError[]): FsError {
  if (rest.length === 0) {
    return first;
  }
  const errors = [first, ...rest];
  return new FsError(errors.map((e) => e.message).join("; "), {
    kind: first.kind,
    step: first.step,
    path: first.path,
    code: first.code,
    causes: errors,
  });
}

/**
 * Resolve an operation's outcome from its primary result and the results of
 * releasing the handles it held.
 *
 * A release failure after a successful primary step becomes the outcome.
 * Two or more failures of any origin become a composite error.
 */
export function settle<T>(
  primary: Result<T, FsError>,
  ...releases: Result<void, FsError>[]
): Result<T, FsError> {
  const failures: FsError[] = [];
  for (const outcome of [primary, ...releases]) {
    if (!outcome.ok) {
      failures.push(outcome.error);
    }
  }
  const [first, ...rest] = failures;
  if (first === undefined) {
    return primary;
  }
  return Err(combineErrors(first, ...rest));
}

/**
 * Run one host call, mapping whatever it throws onto an FsError.
 */
export function fsCall<T>(step: FsStep, path: string, fn: () => T): Result<T, FsError> {
  return capture(fn, (thrown) => toFsError(thrown, step, path));
}
