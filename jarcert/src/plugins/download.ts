import fs from "node:fs";
import path from "node:path";
import type { FetchFn } from "../catalog/catalog.js";
import { PluginError } from "../errors.js";
import type { PluginJar } from "./plugins.js";

export type DownloadOptions = { force: boolean };

export interface DownloadStrategy {
  /** Ensure the jar is on disk; resolves true when it was (re)downloaded. */
  download(jar: PluginJar, options: DownloadOptions): Promise<boolean>;
}

const PLACEHOLDER = /\{([^{}]*)\}/g;

/** Substitute `{plugin_name}`, `{version}` and `{jar_name}` in a URL pattern. */
export function expandUrlPattern(pattern: string, jar: PluginJar): string {
  const vars = new Map([
    ["plugin_name", jar.plugin.name],
    ["version", jar.plugin.version],
    ["jar_name", jar.name],
  ]);
  return pattern.replace(PLACEHOLDER, (_match, key: string) => {
    const value = vars.get(key);
    if (value === undefined) {
      throw new PluginError(`Missing key ${JSON.stringify(key)} in URL pattern: ${pattern}`);
    }
    return value;
  });
}

export class UrlPatternDownload implements DownloadStrategy {
  private readonly fetchFn: FetchFn;

  constructor(
    readonly pattern: string,
    fetchFn?: FetchFn,
  ) {
    this.fetchFn = fetchFn ?? ((url) => fetch(url));
  }

  async download(jar: PluginJar, { force }: DownloadOptions): Promise<boolean> {
    // the pattern is checked even when the jar is already present
    const url = expandUrlPattern(this.pattern, jar);
    if (!force && fs.existsSync(jar.path)) return false;

    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (e) {
      throw new PluginError(`Unable to download jar: ${url} (${e instanceof Error ? e.message : String(e)})`);
    }
    if (!response.ok) {
      throw new PluginError(`Unable to download jar: ${url} (HTTP ${response.status})`);
    }
    const bytes = Buffer.from(await response.arrayBuffer());

    const partialPath = `${jar.path}.part`;
    await fs.promises.mkdir(path.dirname(jar.path), { recursive: true });
    await fs.promises.writeFile(partialPath, bytes);
    await fs.promises.rename(partialPath, jar.path);
    return true;
  }
}

/** Jars the user has to fetch by hand; never downloaded. */
export class ManualDownload implements DownloadStrategy {
  async download(jar: PluginJar, { force }: DownloadOptions): Promise<boolean> {
    if (force) {
      throw new PluginError(`Can't force-download a manually downloaded plugin: ${jar.fileName}`);
    }
    if (!fs.existsSync(jar.path)) {
      throw new PluginError(`Jar must be downloaded manually: ${jar.path}`);
    }
    return false;
  }
}
