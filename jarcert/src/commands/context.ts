import path from "node:path";
import type { ResolverContext } from "../artifacts/artifact.js";
import { ProcessBuildTool } from "../build/build-tool.js";
import { SignatureStore } from "../cache/signature-store.js";
import { HttpBuildCatalog, type BuildCatalog } from "../catalog/catalog.js";
import { CatalogStore } from "../catalog/catalog-store.js";
import { HttpDownloader } from "../catalog/downloader.js";
import { VersionStore } from "../core/version.js";
import { openRepository } from "../git/operations.js";
import type { Logger } from "../logging.js";
import type { JarcertConfig } from "../types/config.js";

/** Everything a command needs; tests replace the I/O-bound parts. */
export type CommandContext = {
  config: JarcertConfig;
  versions: VersionStore;
  resolver: ResolverContext;
  logger: Logger;
};

export type ContextOverrides = Partial<Omit<ResolverContext, "logger" | "catalog">> & {
  catalog?: BuildCatalog;
  versions?: VersionStore;
};

export function createCommandContext(
  config: JarcertConfig,
  logger: Logger,
  overrides: ContextOverrides = {},
): CommandContext {
  const versions = overrides.versions ?? new VersionStore();
  const catalog =
    overrides.catalog ??
    new HttpBuildCatalog({ baseUrl: config.catalog.base_url, project: config.catalog.project, versions });
  const cacheDir = path.resolve(overrides.cacheDir ?? config.cache_dir);

  return {
    config,
    versions,
    logger,
    resolver: {
      cacheDir,
      project: overrides.project ?? config.catalog.project,
      developmentArtifactPath: overrides.developmentArtifactPath ?? config.development.artifact_path,
      nestedRepositories: overrides.nestedRepositories ?? config.development.nested_repos,
      catalog: new CatalogStore(catalog, versions),
      downloader: overrides.downloader ?? new HttpDownloader(catalog),
      signatures: overrides.signatures ?? new SignatureStore(cacheDir),
      buildTool: overrides.buildTool ?? new ProcessBuildTool(config.development.build_command),
      openRepository: overrides.openRepository ?? openRepository,
      logger,
    },
  };
}
