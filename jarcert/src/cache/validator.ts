import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  ArtifactHashMismatchError,
  ArtifactMissingError,
  RevisionMismatchError,
  SignatureMissingError,
  UntrackedChangesMismatchError,
  type RevisionDisplay,
} from "../errors.js";
import type { RepoInspector, RepoOpener } from "../git/inspector.js";
import { silentLogger, type Logger } from "../logging.js";
import type { BuildSignature } from "../types/signature.js";
import { collectWorkspaceChangeSet } from "./change-scanner.js";
import { hashPath } from "./checksum.js";
import { diffChangedSources, hashChangedSources, loadSignature } from "./signature.js";

const UNKNOWN_MESSAGE = "<unknown message>";
const NO_REVISION = "<no commits>";

export type ValidationInput = {
  artifactPath: string;
  signaturePath: string;
  repo: RepoInspector;
  open: RepoOpener;
  /** Checkouts below the repository root whose changes count as the repository's own. */
  nestedRepos?: readonly string[];
  /** Loads the expected signature; defaults to reading `signaturePath`. */
  loadExpected?: () => BuildSignature;
  /** Shown in revision mismatches; defaults to the repository root, relative to the home directory when inside it. */
  repoName?: string;
  logger?: Logger;
};

/**
 * Certify a development artifact against the live repository state. Resolves
 * when the recorded signature still describes the artifact, otherwise rejects
 * with the first applicable {@link CacheInvalidationError}.
 *
 * The artifact hash is compared before anything else: an artifact replaced
 * behind our back says nothing trustworthy about the sources it came from.
 */
export async function validateCache(input: ValidationInput): Promise<void> {
  const { artifactPath, signaturePath, repo, open } = input;
  const logger = input.logger ?? silentLogger;

  if (!fs.existsSync(artifactPath)) {
    throw new ArtifactMissingError(artifactPath);
  }
  if (!fs.existsSync(signaturePath)) {
    throw new SignatureMissingError(signaturePath);
  }

  const expected = input.loadExpected ? input.loadExpected() : loadSignature(signaturePath);

  const actualHash = await hashPath(artifactPath);
  if (actualHash !== expected.artifactHash) {
    throw new ArtifactHashMismatchError("Compiled artifact changed on disk", expected.artifactHash, actualHash);
  }

  const actualRevision = await repo.headRevision();
  if (actualRevision !== expected.sourceRevision) {
    const repoName = input.repoName ?? displayRepoName(repo.root);
    throw new RevisionMismatchError(
      repoName,
      await describeRevision(repo, expected.sourceRevision, logger),
      await describeRevision(repo, actualRevision, logger),
    );
  }

  const changeSet = await collectWorkspaceChangeSet(repo, open, input.nestedRepos ?? []);
  logger.debug("Scanned working tree", { repo: repo.root, changed: changeSet.length });
  const actualSources = await hashChangedSources(changeSet, repo.root, open);

  const changes = diffChangedSources(expected.changedSources, actualSources);
  if (changes.length > 0) {
    throw new UntrackedChangesMismatchError(changes);
  }
}

/** Short id and summary for display, falling back to the raw id when it can not be resolved. */
async function describeRevision(
  repo: RepoInspector,
  revision: string | null,
  logger: Logger,
): Promise<RevisionDisplay> {
  if (revision === null) {
    return { shortId: NO_REVISION, summary: UNKNOWN_MESSAGE };
  }
  try {
    const info = await repo.resolveRevision(revision);
    return { shortId: info.shortId, summary: info.summary };
  } catch (err) {
    logger.debug("Unable to resolve revision", { revision, error: err instanceof Error ? err.message : String(err) });
    return { shortId: revision, summary: UNKNOWN_MESSAGE };
  }
}

export function displayRepoName(root: string): string {
  const relative = path.relative(os.homedir(), root);
  if (relative && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return relative;
  }
  return root;
}
