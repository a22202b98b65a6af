import type { BuildTool } from "../build/build-tool.js";
import type { SignatureStore } from "../cache/signature-store.js";
import type { CatalogStore } from "../catalog/catalog-store.js";
import type { ArtifactDownloader } from "../catalog/downloader.js";
import type { ProductVersion } from "../core/version.js";
import { ResolutionUnsettledError } from "../errors.js";
import type { RepoOpener } from "../git/inspector.js";
import type { Logger } from "../logging.js";
import {
  checkDevelopmentUpdates,
  developmentArtifact,
  describeDevelopment,
  developmentArtifactPath,
  updateDevelopment,
} from "./development.js";
import {
  checkOfficialUpdates,
  describeOfficial,
  officialArtifact,
  officialArtifactPath,
  updateOfficial,
} from "./official.js";

export { developmentArtifact, officialArtifact };

/** A server artifact downloaded from the build catalog. */
export type OfficialArtifact = {
  readonly kind: "official";
  readonly version: ProductVersion;
  readonly buildNumber: number;
};

/** A server artifact compiled from a local checkout. */
export type DevelopmentArtifact = {
  readonly kind: "development";
  readonly version: ProductVersion;
  /** Absolute path of the repository root. */
  readonly repoPath: string;
};

export type Artifact = OfficialArtifact | DevelopmentArtifact;

/** Collaborators shared by every artifact operation. */
export type ResolverContext = {
  cacheDir: string;
  /** Catalog project name; also prefixes descriptors and official file names. */
  project: string;
  /** Build output inside the repository, with `{version}` substituted. */
  developmentArtifactPath: string;
  /** Checkouts inside a development repository that are scanned along with it. */
  nestedRepositories: readonly string[];
  catalog: CatalogStore;
  downloader: ArtifactDownloader;
  signatures: SignatureStore;
  buildTool: BuildTool;
  openRepository: RepoOpener;
  logger: Logger;
};

export type CheckOptions = {
  /** Bypass memoized catalog answers. */
  force?: boolean;
  /** Only validate the cache; never report an update. */
  ignoreUpdates?: boolean;
};

export type UpdateOptions = {
  force?: boolean;
};

/**
 * Resolve with a newer artifact to switch to, or null when this one is current
 * and its cache is valid. Rejects with a CacheInvalidationError when the cache
 * can not be trusted.
 */
export function checkForUpdates(
  artifact: Artifact,
  ctx: ResolverContext,
  options: CheckOptions = {},
): Promise<Artifact | null> {
  switch (artifact.kind) {
    case "official":
      return checkOfficialUpdates(artifact, ctx, options);
    case "development":
      return checkDevelopmentUpdates(artifact, ctx, options);
  }
}

/** Download or compile the artifact as needed. Resolves true when anything was downloaded or compiled. */
export function update(artifact: Artifact, ctx: ResolverContext, options: UpdateOptions = {}): Promise<boolean> {
  switch (artifact.kind) {
    case "official":
      return updateOfficial(artifact, ctx, options);
    case "development":
      return updateDevelopment(artifact, ctx, options);
  }
}

export function describe(artifact: Artifact, ctx: ResolverContext): Promise<string> {
  switch (artifact.kind) {
    case "official":
      return Promise.resolve(describeOfficial(artifact, ctx));
    case "development":
      return describeDevelopment(artifact, ctx);
  }
}

/** Where the artifact lives. The file may not exist yet. */
export function resolvedPath(artifact: Artifact, ctx: ResolverContext): string {
  switch (artifact.kind) {
    case "official":
      return officialArtifactPath(artifact, ctx);
    case "development":
      return developmentArtifactPath(artifact, ctx);
  }
}

export async function validateArtifactCache(artifact: Artifact, ctx: ResolverContext): Promise<void> {
  const next = await checkForUpdates(artifact, ctx, { ignoreUpdates: true });
  if (next !== null) {
    throw new ResolutionUnsettledError("Unexpected update while validating", await describe(artifact, ctx));
  }
}

export function sameArtifact(a: Artifact, b: Artifact): boolean {
  if (!a.version.equals(b.version)) return false;
  if (a.kind === "official" && b.kind === "official") return a.buildNumber === b.buildNumber;
  if (a.kind === "development" && b.kind === "development") return a.repoPath === b.repoPath;
  return false;
}
