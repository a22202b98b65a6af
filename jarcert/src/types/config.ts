/** Configuration types for the layered config system. */
export type CatalogConfig = {
  base_url: string;
  project: string;
};

export type DevelopmentConfig = {
  /** Default repository path for `run dev`. */
  repo: string;
  /** Build output inside the repository; `{version}` is substituted. */
  artifact_path: string;
  /** POM carrying the product version, relative to the repository. */
  pom_file: string;
  version_property: string;
  build_command: string[];
  /** Checkouts inside the repository, relative to it, that its status does not report. */
  nested_repos: string[];
};

export type JvmConfig = {
  search_dir: string;
  memory: string;
};

export type JarcertConfig = {
  cache_dir: string;
  server_dir: string;
  plugins_file: string;
  catalog: CatalogConfig;
  development: DevelopmentConfig;
  jvm: JvmConfig;
};
