import fs from "node:fs";
import path from "node:path";
import type { ProductVersion } from "../core/version.js";
import { computeSha256, hashPath } from "../cache/checksum.js";
import {
  ArtifactHashMismatchError,
  ArtifactMissingError,
  CatalogInconsistencyError,
  CorruptDownloadError,
  NoKnownBuildsError,
} from "../errors.js";
import type { CheckOptions, OfficialArtifact, ResolverContext, UpdateOptions } from "./artifact.js";

export function officialArtifact(version: ProductVersion, buildNumber: number): OfficialArtifact {
  return { kind: "official", version, buildNumber };
}

export function officialArtifactPath(artifact: OfficialArtifact, ctx: ResolverContext): string {
  return path.join(ctx.cacheDir, "official-builds", `${ctx.project}-${artifact.buildNumber}.jar`);
}

export function describeOfficial(artifact: OfficialArtifact, ctx: ResolverContext): string {
  return `${ctx.project}-${artifact.buildNumber}`;
}

export async function checkOfficialUpdates(
  artifact: OfficialArtifact,
  ctx: ResolverContext,
  { force = false, ignoreUpdates = false }: CheckOptions,
): Promise<OfficialArtifact | null> {
  if (!ignoreUpdates) {
    if (force) {
      ctx.catalog.invalidateBuilds(artifact.version);
    }
    const known = await ctx.catalog.knownBuilds(artifact.version);
    if (known.length === 0) {
      throw new NoKnownBuildsError(artifact.version.name);
    }
    const maximum = Math.max(...known);
    if (maximum > artifact.buildNumber) {
      ctx.logger.debug("Newer build available", { current: artifact.buildNumber, latest: maximum });
      return officialArtifact(artifact.version, maximum);
    }
    if (maximum < artifact.buildNumber) {
      throw new CatalogInconsistencyError(artifact.version.name, artifact.buildNumber, maximum);
    }
  }

  const artifactPath = officialArtifactPath(artifact, ctx);
  if (!fs.existsSync(artifactPath)) {
    throw new ArtifactMissingError(artifactPath);
  }
  const info = await ctx.catalog.fetchBuildInfo(artifact.version, artifact.buildNumber);
  const actualHash = await hashPath(artifactPath);
  if (actualHash !== info.downloadHash) {
    throw new ArtifactHashMismatchError(
      `Mismatched hash for ${describeOfficial(artifact, ctx)}`,
      info.downloadHash,
      actualHash,
    );
  }
  return null;
}

/**
 * Download into a partial file beside the target and move it into place only
 * once its hash matches the catalog.
 */
export async function updateOfficial(
  artifact: OfficialArtifact,
  ctx: ResolverContext,
  { force = false }: UpdateOptions,
): Promise<boolean> {
  const artifactPath = officialArtifactPath(artifact, ctx);
  if (!force && fs.existsSync(artifactPath)) return false;

  const info = await ctx.catalog.fetchBuildInfo(artifact.version, artifact.buildNumber);
  const partialPath = `${artifactPath}.part`;
  ctx.logger.info(`Downloading ${describeOfficial(artifact, ctx)}`, { file: info.downloadName });

  try {
    await ctx.downloader.download(info, partialPath);
  } catch (err) {
    await fs.promises.rm(partialPath, { force: true });
    throw err;
  }
  const actualHash = await computeSha256(partialPath);
  if (actualHash !== info.downloadHash) {
    await fs.promises.rm(partialPath, { force: true });
    throw new CorruptDownloadError(artifactPath, info.downloadHash, actualHash);
  }
  await fs.promises.rename(partialPath, artifactPath);
  return true;
}
