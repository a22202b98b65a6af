import type { ProductVersion, VersionStore } from "../core/version.js";
import type { BuildDescriptor } from "../types/catalog.js";
import type { BuildCatalog } from "./catalog.js";

/**
 * Memoizes catalog queries for the lifetime of one invocation. Forcing an
 * update clears the relevant entries through {@link invalidateBuilds}.
 */
export class CatalogStore {
  private versionList: Promise<ProductVersion[]> | null = null;
  private readonly builds = new Map<string, Promise<number[]>>();
  private readonly buildInfo = new Map<string, Promise<BuildDescriptor>>();

  constructor(
    readonly catalog: BuildCatalog,
    readonly versions: VersionStore,
  ) {}

  /** Known product versions, oldest first. Names that are not versions are skipped. */
  knownVersions(): Promise<ProductVersion[]> {
    const pending =
      this.versionList ??
      this.catalog.listVersions().then((names) => this.versions.internAll(names).sort((a, b) => a.compare(b)));
    this.versionList = pending;
    return this.remember(pending, () => {
      this.versionList = null;
    });
  }

  knownBuilds(version: ProductVersion): Promise<number[]> {
    let pending = this.builds.get(version.name);
    if (!pending) {
      pending = this.catalog.listBuilds(version);
      this.builds.set(version.name, pending);
    }
    return this.remember(pending, () => this.builds.delete(version.name));
  }

  fetchBuildInfo(version: ProductVersion, buildNumber: number): Promise<BuildDescriptor> {
    const key = `${version.name}#${buildNumber}`;
    let pending = this.buildInfo.get(key);
    if (!pending) {
      pending = this.catalog.fetchBuildInfo(version, buildNumber);
      this.buildInfo.set(key, pending);
    }
    return this.remember(pending, () => this.buildInfo.delete(key));
  }

  invalidateBuilds(version: ProductVersion): void {
    this.builds.delete(version.name);
  }

  clear(): void {
    this.versionList = null;
    this.builds.clear();
    this.buildInfo.clear();
  }

  /** Failed lookups are not memoized. */
  private async remember<T>(pending: Promise<T>, forget: () => void): Promise<T> {
    try {
      return await pending;
    } catch (err) {
      forget();
      throw err;
    }
  }
}
