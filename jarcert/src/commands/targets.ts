import path from "node:path";
import { developmentArtifact, officialArtifact, type Artifact } from "../artifacts/artifact.js";
import { detectDevelopmentVersion } from "../artifacts/dev-version.js";
import { ProductVersion, latestVersion } from "../core/version.js";
import { NoKnownBuildsError } from "../errors.js";
import type { CommandContext } from "./context.js";
import { UsageError } from "./exit-codes.js";

export type TargetKind = "official" | "dev";

export type TargetOptions = {
  /** Product version; defaults to the newest the catalog knows. */
  version?: string;
  /** Official build number; defaults to the newest for the version. */
  build?: number;
  /** Development checkout; defaults to `development.repo`. */
  repo?: string;
};

export type SelectedTarget = {
  artifact: Artifact;
  /** Newest official build, when the catalog was consulted. */
  latestBuild: number | null;
  /** Whether the user pinned an explicit build. */
  pinned: boolean;
};

export async function selectVersion(ctx: CommandContext, requested?: string): Promise<ProductVersion> {
  if (requested !== undefined) {
    if (!ProductVersion.isValid(requested)) {
      throw new UsageError(`Invalid version: ${JSON.stringify(requested)}`);
    }
    return ctx.versions.intern(requested);
  }
  const latest = latestVersion(await ctx.resolver.catalog.knownVersions());
  if (!latest) {
    throw new UsageError("The build catalog lists no versions");
  }
  return latest;
}

export async function selectTarget(
  ctx: CommandContext,
  kind: TargetKind,
  options: TargetOptions,
): Promise<SelectedTarget> {
  if (kind === "dev") {
    const repoPath = path.resolve(options.repo ?? ctx.config.development.repo);
    const detected = detectDevelopmentVersion(
      repoPath,
      { pomFile: ctx.config.development.pom_file, property: ctx.config.development.version_property },
      ctx.versions,
    );
    if (options.version !== undefined && options.version !== detected.name) {
      throw new UsageError(`Detected version ${detected.name} for ${repoPath} (expected ${options.version})`);
    }
    return { artifact: developmentArtifact(detected, repoPath), latestBuild: null, pinned: false };
  }

  const version = await selectVersion(ctx, options.version);
  const known = await ctx.resolver.catalog.knownBuilds(version);
  if (known.length === 0) {
    throw new NoKnownBuildsError(version.name);
  }
  const latestBuild = Math.max(...known);
  const build = options.build ?? latestBuild;
  if (!known.includes(build)) {
    throw new UsageError(`Build ${build} is not a valid build for ${version.name}`, [
      `Known builds: ${[...known].sort((a, b) => a - b).join(", ")}`,
    ]);
  }
  return { artifact: officialArtifact(version, build), latestBuild, pinned: options.build !== undefined };
}
