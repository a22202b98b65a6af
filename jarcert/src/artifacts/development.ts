import fs from "node:fs";
import path from "node:path";
import { collectWorkspaceChangeSet } from "../cache/change-scanner.js";
import { captureSignature } from "../cache/signature.js";
import { validateCache } from "../cache/validator.js";
import type { ProductVersion } from "../core/version.js";
import {
  ArtifactNotProducedError,
  BuildFailedError,
  CorruptSignatureError,
  formatError,
  isCacheInvalidation,
} from "../errors.js";
import type { BuildSignature } from "../types/signature.js";
import type { CheckOptions, DevelopmentArtifact, ResolverContext, UpdateOptions } from "./artifact.js";

export function developmentArtifact(version: ProductVersion, repoPath: string): DevelopmentArtifact {
  return { kind: "development", version, repoPath: path.resolve(repoPath) };
}

export function developmentArtifactPath(artifact: DevelopmentArtifact, ctx: ResolverContext): string {
  const relative = ctx.developmentArtifactPath.split("{version}").join(artifact.version.name);
  return path.join(artifact.repoPath, relative);
}

/** `<project>-<head>`, with `-dirty` appended when the working tree has changes. */
export async function describeDevelopment(artifact: DevelopmentArtifact, ctx: ResolverContext): Promise<string> {
  const repo = await ctx.openRepository(artifact.repoPath);
  const head = await repo.headRevision();
  const changeSet = await collectWorkspaceChangeSet(repo, ctx.openRepository, ctx.nestedRepositories);
  const descriptor = `${ctx.project}-${head ?? "none"}`;
  return changeSet.length > 0 ? `${descriptor}-dirty` : descriptor;
}

export async function validateDevelopment(artifact: DevelopmentArtifact, ctx: ResolverContext): Promise<void> {
  const repo = await ctx.openRepository(artifact.repoPath);
  await validateCache({
    artifactPath: developmentArtifactPath(artifact, ctx),
    signaturePath: ctx.signatures.pathFor(artifact.version),
    repo,
    open: ctx.openRepository,
    nestedRepos: ctx.nestedRepositories,
    loadExpected: () => ctx.signatures.load(artifact.version),
    logger: ctx.logger,
  });
}

/**
 * A checkout is always current with itself, so the only "update" is the forced
 * one: the artifact itself is returned. Updating it is still a no-op while its
 * cache is valid.
 */
export async function checkDevelopmentUpdates(
  artifact: DevelopmentArtifact,
  ctx: ResolverContext,
  { force = false, ignoreUpdates = false }: CheckOptions,
): Promise<DevelopmentArtifact | null> {
  if (force && !ignoreUpdates) {
    return artifact;
  }
  await validateDevelopment(artifact, ctx);
  return null;
}

export async function updateDevelopment(
  artifact: DevelopmentArtifact,
  ctx: ResolverContext,
  { force = false }: UpdateOptions,
): Promise<boolean> {
  if (!force) {
    try {
      await validateDevelopment(artifact, ctx);
      ctx.logger.debug("Compiled artifact is current; skipping build");
      return false;
    } catch (err) {
      if (!isCacheInvalidation(err) && !(err instanceof CorruptSignatureError)) throw err;
      ctx.logger.debug("Rebuilding", { reason: formatError(err).join("\n") });
    }
  }

  const exitCode = await ctx.buildTool.run(artifact.repoPath);
  if (exitCode !== 0) {
    throw new BuildFailedError(ctx.buildTool.command, exitCode);
  }

  const artifactPath = developmentArtifactPath(artifact, ctx);
  if (!fs.existsSync(artifactPath)) {
    throw new ArtifactNotProducedError(artifactPath);
  }

  const signature = await currentSignature(artifact, ctx);
  ctx.signatures.save(artifact.version, signature);
  ctx.logger.debug("Recorded build signature", {
    path: ctx.signatures.pathFor(artifact.version),
    changed: signature.changedSources.size,
  });
  return true;
}

/** Signature of the artifact on disk against the live repository state. */
export async function currentSignature(artifact: DevelopmentArtifact, ctx: ResolverContext): Promise<BuildSignature> {
  const repo = await ctx.openRepository(artifact.repoPath);
  return captureSignature({
    artifactPath: developmentArtifactPath(artifact, ctx),
    sourceRevision: await repo.headRevision(),
    changeSet: await collectWorkspaceChangeSet(repo, ctx.openRepository, ctx.nestedRepositories),
    repoRoot: repo.root,
    openRepository: ctx.openRepository,
  });
}
