import { CatalogRequestError } from "../errors.js";
import type { ProductVersion, VersionStore } from "../core/version.js";
import { schemaRegistry, type SchemaName, type SchemaTypes } from "../schema/registry.js";
import type { BuildDescriptor, CatalogBuild } from "../types/catalog.js";

/** Remote source of official builds. */
export interface BuildCatalog {
  listVersions(): Promise<string[]>;
  listBuilds(version: ProductVersion): Promise<number[]>;
  fetchBuildInfo(version: ProductVersion, buildNumber: number): Promise<BuildDescriptor>;
  downloadUrl(descriptor: BuildDescriptor): string;
}

export type FetchFn = (url: string) => Promise<Response>;

export type HttpCatalogOptions = {
  baseUrl: string;
  project: string;
  versions: VersionStore;
  fetchFn?: FetchFn;
};

/**
 * Build catalog over the JSON API:
 *
 *   GET <base>/projects/<project>
 *   GET <base>/projects/<project>/versions/<v>
 *   GET <base>/projects/<project>/versions/<v>/builds/<b>
 *   GET <base>/projects/<project>/versions/<v>/builds/<b>/downloads/<name>
 */
export class HttpBuildCatalog implements BuildCatalog {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpCatalogOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? ((url) => fetch(url));
  }

  async listVersions(): Promise<string[]> {
    const project = await this.getJson(this.projectUrl(), "project");
    return project.versions;
  }

  async listBuilds(version: ProductVersion): Promise<number[]> {
    const doc = await this.getJson(this.versionUrl(version), "version-builds");
    return doc.builds;
  }

  async fetchBuildInfo(version: ProductVersion, buildNumber: number): Promise<BuildDescriptor> {
    const url = `${this.versionUrl(version)}/builds/${buildNumber}`;
    const build = await this.getJson(url, "build-info");
    if (build.build !== buildNumber || build.version !== version.name) {
      throw new CatalogRequestError(url, `Catalog answered with ${build.version} build ${build.build}`);
    }
    return toDescriptor(build, this.options.versions);
  }

  downloadUrl(descriptor: BuildDescriptor): string {
    const name = encodeURIComponent(descriptor.downloadName);
    return `${this.versionUrl(descriptor.version)}/builds/${descriptor.buildNumber}/downloads/${name}`;
  }

  private projectUrl(): string {
    return `${this.baseUrl}/projects/${encodeURIComponent(this.options.project)}`;
  }

  private versionUrl(version: ProductVersion): string {
    return `${this.projectUrl()}/versions/${encodeURIComponent(version.name)}`;
  }

  private async getJson<N extends SchemaName>(url: string, schema: N): Promise<SchemaTypes[N]> {
    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (err) {
      throw new CatalogRequestError(url, err instanceof Error ? err.message : String(err));
    }
    if (!response.ok) {
      throw new CatalogRequestError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new CatalogRequestError(url, `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const registry = schemaRegistry();
    if (!registry.validate(schema, body)) {
      throw new CatalogRequestError(url, `Unexpected response: ${registry.errorsText(schema)}`);
    }
    return body;
  }
}

export function toDescriptor(build: CatalogBuild, versions: VersionStore): BuildDescriptor {
  return {
    projectId: build.project_id,
    projectName: build.project_name,
    version: versions.intern(build.version),
    buildNumber: build.build,
    time: build.time,
    changes: build.changes.map((c) => ({ commitId: c.commit, summary: c.summary, message: c.message })),
    downloadName: build.downloads.application.name,
    downloadHash: build.downloads.application.sha256,
  };
}
