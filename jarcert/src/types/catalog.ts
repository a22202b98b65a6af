import type { ProductVersion } from "../core/version.js";

/** Build catalog wire types (project, version and build endpoints). */
export type CatalogProject = {
  versions: string[];
};

export type CatalogVersionBuilds = {
  builds: number[];
};

export type CatalogBuildChange = {
  commit: string;
  summary: string;
  message: string;
};

export type CatalogBuild = {
  project_id: string;
  project_name: string;
  version: string;
  build: number;
  time: string;
  changes: CatalogBuildChange[];
  downloads: {
    application: { name: string; sha256: string };
  };
};

export type BuildChange = {
  readonly commitId: string;
  readonly summary: string;
  readonly message: string;
};

/** One catalog build, parsed. */
export type BuildDescriptor = {
  readonly projectId: string;
  readonly projectName: string;
  readonly version: ProductVersion;
  readonly buildNumber: number;
  readonly time: string;
  readonly changes: readonly BuildChange[];
  readonly downloadName: string;
  /** SHA-256 hex of the download. */
  readonly downloadHash: string;
};
