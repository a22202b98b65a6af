import { describe, resolvedPath, validateArtifactCache } from "../artifacts/artifact.js";
import { CorruptSignatureError, formatError, isCacheInvalidation } from "../errors.js";
import type { CommandContext } from "./context.js";
import { selectTarget, type TargetKind, type TargetOptions } from "./targets.js";

export type ValidateReport = {
  descriptor: string;
  path: string;
  valid: boolean;
  /** Summary and detail lines explaining why the cache is invalid. */
  problem: string[] | null;
};

/**
 * Check whether the cached artifact can be reused, without following newer
 * builds and without downloading or compiling anything.
 */
export async function validateTarget(
  ctx: CommandContext,
  kind: TargetKind,
  options: TargetOptions,
): Promise<ValidateReport> {
  const { artifact } = await selectTarget(ctx, kind, options);
  const descriptor = await describe(artifact, ctx.resolver);
  const artifactPath = resolvedPath(artifact, ctx.resolver);

  try {
    await validateArtifactCache(artifact, ctx.resolver);
  } catch (err) {
    if (!isCacheInvalidation(err) && !(err instanceof CorruptSignatureError)) throw err;
    return { descriptor, path: artifactPath, valid: false, problem: formatError(err) };
  }
  return { descriptor, path: artifactPath, valid: true, problem: null };
}
