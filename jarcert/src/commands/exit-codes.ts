import { ErrorCodes, JarcertError, isCacheInvalidation } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  CACHE_INVALID: 2,
  INVALID_ARGS: 3,
  ABORTED: 4,
  FATAL: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const FATAL_CODES: ReadonlySet<string> = new Set([
  ErrorCodes.CATALOG_INCONSISTENCY,
  ErrorCodes.CORRUPT_DOWNLOAD,
  ErrorCodes.RESOLUTION_FAILED,
  ErrorCodes.RESOLUTION_UNSETTLED,
  ErrorCodes.BUILD_FAILED,
  ErrorCodes.ARTIFACT_NOT_PRODUCED,
]);

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof AbortedError) return EXIT.ABORTED;
  if (isCacheInvalidation(err)) return EXIT.CACHE_INVALID;
  if (err instanceof JarcertError) {
    if (FATAL_CODES.has(err.code)) return EXIT.FATAL;
    if (err.code === ErrorCodes.CONFIG_ERROR) return EXIT.INVALID_ARGS;
  }
  return EXIT.FAILURE;
}

/** The user declined a confirmation prompt. */
export class AbortedError extends Error {
  constructor(message = "Aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

export class UsageError extends JarcertError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = "UsageError";
  }
}
