import path from "node:path";
import { describe, resolvedPath, validateArtifactCache, type Artifact } from "../artifacts/artifact.js";
import { ensureArtifact, type UpdateReason } from "../core/resolver.js";
import { CorruptSignatureError, formatError, isCacheInvalidation } from "../errors.js";
import {
  buildJavaArgs,
  detectAllJvms,
  javaBin,
  launchServer,
  selectJvm,
  type JvmInstall,
} from "../jvm/jvm.js";
import { checkPlugins, loadPluginConfigs } from "../plugins/plugins.js";
import { confirmOrAbort, type Confirm } from "./confirm.js";
import type { CommandContext } from "./context.js";
import { UsageError } from "./exit-codes.js";
import { selectTarget, type TargetKind, type TargetOptions } from "./targets.js";

const MEMORY_PATTERN = /^[0-9]+[KMGkmg]$/;

export type RunOptions = TargetOptions & {
  /** Go through the compile prompt even for a current development artifact; a valid cache is still kept. */
  recompile?: boolean;
  memory?: string;
  yourkit?: boolean;
  dryRun?: boolean;
  jvmMajor?: number;
  confirm: Confirm;
  /** Seams for tests. */
  detectJvms?: (searchDir: string) => Promise<JvmInstall[]>;
  launch?: (install: JvmInstall, args: readonly string[], serverDir: string) => Promise<number>;
};

export type RunReport = {
  descriptor: string;
  artifactPath: string;
  updated: boolean;
  java: string;
  javaArgs: string[];
  /** Server exit code; null for a dry run. */
  exitCode: number | null;
};

/**
 * Resolve the requested artifact (downloading or compiling as needed), check
 * plugins, then start the server.
 */
export async function runServer(ctx: CommandContext, kind: TargetKind, options: RunOptions): Promise<RunReport> {
  const memory = options.memory ?? ctx.config.jvm.memory;
  if (!MEMORY_PATTERN.test(memory)) {
    throw new UsageError(`Invalid memory size: ${memory}`);
  }

  const installs = await (options.detectJvms ?? detectAllJvms)(ctx.config.jvm.search_dir);
  const jvm = selectJvm(installs, options.jvmMajor);
  ctx.logger.info(`Using JVM ${jvm.version} from ${jvm.basePath}`);

  const selected = await selectTarget(ctx, kind, options);
  if (selected.latestBuild !== null && selected.artifact.kind === "official") {
    const { buildNumber, version } = selected.artifact;
    if (buildNumber !== selected.latestBuild) {
      ctx.logger.info(`The latest build for ${version.name} is ${selected.latestBuild}.`);
      await confirmOrAbort(options.confirm, `Are you sure you want to use ${buildNumber} instead?`, false);
    }
  }

  if (options.recompile && selected.artifact.kind === "development") {
    await warnIfCurrent(ctx, selected.artifact);
  }

  const resolution = await ensureArtifact(selected.artifact, ctx.resolver, {
    force: options.recompile ?? false,
    followUpdates: !selected.pinned,
    beforeUpdate: (artifact, reason) => announceUpdate(ctx, artifact, reason, options.confirm),
  });
  const artifact = resolution.artifact;
  if (!resolution.updated) {
    ctx.logger.info("Reusing existing artifact");
  }

  ctx.logger.info("Checking plugins...");
  checkPlugins(loadPluginConfigs(path.resolve(ctx.config.plugins_file)), path.resolve(ctx.config.server_dir));

  const descriptor = await describe(artifact, ctx.resolver);
  const artifactPath = path.resolve(resolvedPath(artifact, ctx.resolver));
  const javaArgs = buildJavaArgs({ memory, artifactPath, yourkit: options.yourkit });
  ctx.logger.info(`Product version: ${artifact.version.name}`);
  ctx.logger.info(`Server version: ${descriptor}`);

  const report = {
    descriptor,
    artifactPath,
    updated: resolution.updated,
    java: javaBin(jvm),
    javaArgs,
  };
  if (options.dryRun) {
    ctx.logger.info("Dry run; not starting the server", { java: report.java, args: javaArgs });
    return { ...report, exitCode: null };
  }

  ctx.logger.info("Starting server...");
  const exitCode = await (options.launch ?? launchServer)(jvm, javaArgs, path.resolve(ctx.config.server_dir));
  return { ...report, exitCode };
}

async function warnIfCurrent(ctx: CommandContext, artifact: Artifact): Promise<void> {
  try {
    await validateArtifactCache(artifact, ctx.resolver);
  } catch (err) {
    if (!isCacheInvalidation(err) && !(err instanceof CorruptSignatureError)) throw err;
    return;
  }
  ctx.logger.warn("The cached development artifact is already up to date.");
}

async function announceUpdate(
  ctx: CommandContext,
  artifact: Artifact,
  reason: UpdateReason,
  confirm: Confirm,
): Promise<void> {
  if (reason.kind === "invalid") {
    const [summary, ...details] = formatError(reason.error);
    ctx.logger.warn(summary, details.length > 0 ? { details } : undefined);
  }

  if (artifact.kind === "official") {
    ctx.logger.info(`Downloading ${await describe(artifact, ctx.resolver)}...`);
    return;
  }

  const repo = await ctx.resolver.openRepository(artifact.repoPath);
  const head = await repo.headRevision();
  if (head !== null) {
    const commit = await repo.resolveRevision(head);
    ctx.logger.info(`Compiling from commit ${commit.shortId}:`);
    for (const line of commit.fullMessage.split("\n")) {
      ctx.logger.info(`    ${line}`);
    }
  } else {
    ctx.logger.info("Compiling a repository without commits");
  }
  await confirmOrAbort(confirm, "Are you sure you want to compile this?", true);
}
