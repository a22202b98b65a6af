/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  NOT_HASHABLE: "NOT_HASHABLE",
  INVALID_REPOSITORY: "INVALID_REPOSITORY",
  SCAN_INVARIANT: "SCAN_INVARIANT",
  CORRUPT_SIGNATURE: "CORRUPT_SIGNATURE",

  // Cache invalidation (recoverable)
  ARTIFACT_MISSING: "ARTIFACT_MISSING",
  SIGNATURE_MISSING: "SIGNATURE_MISSING",
  ARTIFACT_HASH_MISMATCH: "ARTIFACT_HASH_MISMATCH",
  REVISION_MISMATCH: "REVISION_MISMATCH",
  UNTRACKED_CHANGES_MISMATCH: "UNTRACKED_CHANGES_MISMATCH",

  // Fatal
  CATALOG_INCONSISTENCY: "CATALOG_INCONSISTENCY",
  CORRUPT_DOWNLOAD: "CORRUPT_DOWNLOAD",
  RESOLUTION_FAILED: "RESOLUTION_FAILED",
  RESOLUTION_UNSETTLED: "RESOLUTION_UNSETTLED",
  BUILD_FAILED: "BUILD_FAILED",
  ARTIFACT_NOT_PRODUCED: "ARTIFACT_NOT_PRODUCED",

  NO_KNOWN_BUILDS: "NO_KNOWN_BUILDS",
  CATALOG_REQUEST: "CATALOG_REQUEST",
  VERSION_DETECTION: "VERSION_DETECTION",
  CONFIG_ERROR: "CONFIG_ERROR",
  PLUGIN_ERROR: "PLUGIN_ERROR",
  JVM_ERROR: "JVM_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class JarcertError extends Error {
  /** Extra diagnostic lines rendered below the summary. */
  readonly details: readonly string[];

  constructor(
    message: string,
    public readonly code: ErrorCode,
    details: readonly string[] = [],
  ) {
    super(message);
    this.name = "JarcertError";
    this.details = details;
  }

  get summary(): string {
    return this.message;
  }
}

export class NotHashableError extends JarcertError {
  constructor(public readonly target: string) {
    super(`Unable to hash directory: ${target}`, ErrorCodes.NOT_HASHABLE);
    this.name = "NotHashableError";
  }
}

export class InvalidRepositoryError extends JarcertError {
  constructor(
    public readonly repoPath: string,
    reason?: string,
  ) {
    super(`Not a valid git repository: ${repoPath}`, ErrorCodes.INVALID_REPOSITORY, reason ? [reason] : []);
    this.name = "InvalidRepositoryError";
  }
}

/** The inspector reported a change the working tree does not show. Indicates a bug, not a cache miss. */
export class ScanInvariantError extends JarcertError {
  constructor(
    public readonly target: string,
    public readonly flag: string,
  ) {
    super(`Unable to find git's claimed modification (${flag}): ${target}`, ErrorCodes.SCAN_INVARIANT);
    this.name = "ScanInvariantError";
  }
}

export class CorruptSignatureError extends JarcertError {
  constructor(
    public readonly signaturePath: string,
    reason: string,
  ) {
    super(`Corrupt build signature: ${signaturePath}`, ErrorCodes.CORRUPT_SIGNATURE, [reason]);
    this.name = "CorruptSignatureError";
  }
}

/**
 * Base class for the expected, recoverable signals that a cached artifact can
 * not be reused. Resolvers catch these and rebuild or re-download.
 */
export abstract class CacheInvalidationError extends JarcertError {
  constructor(message: string, code: ErrorCode, details: readonly string[] = []) {
    super(message, code, details);
    this.name = "CacheInvalidationError";
  }
}

export class ArtifactMissingError extends CacheInvalidationError {
  constructor(public readonly artifactPath: string) {
    super("Missing cached artifact", ErrorCodes.ARTIFACT_MISSING, [`Expected location: ${artifactPath}`]);
    this.name = "ArtifactMissingError";
  }
}

export class SignatureMissingError extends CacheInvalidationError {
  constructor(public readonly signaturePath: string) {
    super(`Missing build signature: ${signaturePath}`, ErrorCodes.SIGNATURE_MISSING);
    this.name = "SignatureMissingError";
  }
}

export class ArtifactHashMismatchError extends CacheInvalidationError {
  constructor(
    message: string,
    public readonly expectedHash: string,
    public readonly actualHash: string,
  ) {
    super(message, ErrorCodes.ARTIFACT_HASH_MISMATCH, [`Expected ${expectedHash}`, `Actually ${actualHash}`]);
    this.name = "ArtifactHashMismatchError";
  }
}

export type RevisionDisplay = {
  /** Short id, or the raw revision when it could not be resolved. */
  shortId: string;
  summary: string;
};

export class RevisionMismatchError extends CacheInvalidationError {
  constructor(
    repoName: string,
    public readonly expected: RevisionDisplay,
    public readonly actual: RevisionDisplay,
  ) {
    super(`Mismatched commits for ${repoName}`, ErrorCodes.REVISION_MISMATCH, [
      `Expected commit ${expected.shortId}: ${expected.summary}`,
      `Actual commit ${actual.shortId}: ${actual.summary}`,
    ]);
    this.name = "RevisionMismatchError";
  }
}

export type SourceChangeKind = "Added" | "Removed" | "Modified";

export type SourceChange = {
  path: string;
  kind: SourceChangeKind;
};

export class UntrackedChangesMismatchError extends CacheInvalidationError {
  constructor(public readonly changes: readonly SourceChange[]) {
    super(
      `Detected ${changes.length} changes to uncommitted files`,
      ErrorCodes.UNTRACKED_CHANGES_MISMATCH,
      changes.map((c) => `${`${c.kind}:`.padEnd(10)} ${c.path}`),
    );
    this.name = "UntrackedChangesMismatchError";
  }
}

export class CatalogInconsistencyError extends JarcertError {
  constructor(
    public readonly version: string,
    public readonly currentBuild: number,
    public readonly maximumBuild: number,
  ) {
    super(`Current build number ${currentBuild} greater than maximum build`, ErrorCodes.CATALOG_INCONSISTENCY, [
      `According to the build catalog, the maximum build for ${version} is ${maximumBuild}`,
    ]);
    this.name = "CatalogInconsistencyError";
  }
}

export class CorruptDownloadError extends JarcertError {
  constructor(
    public readonly artifactPath: string,
    public readonly expectedHash: string,
    public readonly actualHash: string,
  ) {
    super(`Downloaded artifact failed verification: ${artifactPath}`, ErrorCodes.CORRUPT_DOWNLOAD, [
      `Expected ${expectedHash}`,
      `Actually ${actualHash}`,
    ]);
    this.name = "CorruptDownloadError";
  }
}

export class ResolutionFailedError extends JarcertError {
  constructor(
    descriptor: string,
    public readonly invalidation: CacheInvalidationError,
  ) {
    super(
      `Artifact ${descriptor} is still invalid after update: ${invalidation.summary}`,
      ErrorCodes.RESOLUTION_FAILED,
      invalidation.details,
    );
    this.name = "ResolutionFailedError";
  }
}

/** Resolution kept finding updates where none were expected. */
export class ResolutionUnsettledError extends JarcertError {
  constructor(
    message: string,
    public readonly descriptor: string,
  ) {
    super(`${message}: ${descriptor}`, ErrorCodes.RESOLUTION_UNSETTLED);
    this.name = "ResolutionUnsettledError";
  }
}

export class BuildFailedError extends JarcertError {
  constructor(
    public readonly command: readonly string[],
    public readonly exitCode: number,
  ) {
    super(`Unable to compile artifact (exit ${exitCode})`, ErrorCodes.BUILD_FAILED, [`Command: ${command.join(" ")}`]);
    this.name = "BuildFailedError";
  }
}

export class ArtifactNotProducedError extends JarcertError {
  constructor(public readonly artifactPath: string) {
    super(`Unable to find compiled artifact: ${artifactPath}`, ErrorCodes.ARTIFACT_NOT_PRODUCED);
    this.name = "ArtifactNotProducedError";
  }
}

export class NoKnownBuildsError extends JarcertError {
  constructor(public readonly version: string) {
    super(`No known builds for ${version}`, ErrorCodes.NO_KNOWN_BUILDS);
    this.name = "NoKnownBuildsError";
  }
}

export class CatalogRequestError extends JarcertError {
  constructor(url: string, reason: string) {
    super(`Build catalog request failed: ${url}`, ErrorCodes.CATALOG_REQUEST, [reason]);
    this.name = "CatalogRequestError";
  }
}

export class VersionDetectionError extends JarcertError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, ErrorCodes.VERSION_DETECTION, details);
    this.name = "VersionDetectionError";
  }
}

export class ConfigError extends JarcertError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = "ConfigError";
  }
}

export class PluginError extends JarcertError {
  constructor(message: string) {
    super(message, ErrorCodes.PLUGIN_ERROR);
    this.name = "PluginError";
  }
}

export class JvmError extends JarcertError {
  constructor(message: string) {
    super(message, ErrorCodes.JVM_ERROR);
    this.name = "JvmError";
  }
}

export function isCacheInvalidation(err: unknown): err is CacheInvalidationError {
  return err instanceof CacheInvalidationError;
}

/** Render an error as a summary line followed by indented detail lines. */
export function formatError(err: unknown): string[] {
  if (err instanceof JarcertError) {
    return [err.summary, ...err.details.map((line) => (line.trim() ? `    ${line}` : ""))];
  }
  return [err instanceof Error ? err.message : String(err)];
}
