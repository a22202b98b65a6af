import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { minimatch } from "minimatch";
import { PluginError } from "../errors.js";
import { schemaRegistry } from "../schema/registry.js";
import type { PluginEntry } from "../types/plugins.js";
import { ManualDownload, UrlPatternDownload, type DownloadStrategy } from "./download.js";

export type PluginConfig = {
  name: string;
  version: string;
  /** Explicit jar names from the config, or null for the single default jar. */
  jarNames: string[] | null;
  strategy: DownloadStrategy;
};

export type PluginJar = {
  plugin: PluginConfig;
  name: string;
  /** `<name>-v<version>.jar` */
  fileName: string;
  path: string;
};

export function describePlugin(plugin: PluginConfig): string {
  return `${plugin.name} v${plugin.version}`;
}

export function pluginJars(plugin: PluginConfig, serverDir: string): PluginJar[] {
  const names = plugin.jarNames ?? [plugin.name];
  return names.map((name) => {
    const fileName = `${name}-v${plugin.version}.jar`;
    return { plugin, name, fileName, path: path.join(serverDir, "plugins", fileName) };
  });
}

export function parsePluginEntry(name: string, entry: PluginEntry): PluginConfig {
  let strategy: DownloadStrategy;
  if (entry.manual_download) {
    strategy = new ManualDownload();
  } else if (entry.url !== undefined) {
    strategy = new UrlPatternDownload(entry.url);
  } else {
    throw new PluginError(`No download strategy for ${name}`);
  }
  return { name, version: entry.version, jarNames: entry.jars ?? null, strategy };
}

/** Read the plugins file. A missing file means no plugins are configured. */
export function loadPluginConfigs(filePath: string): PluginConfig[] {
  if (!fs.existsSync(filePath)) return [];

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(filePath, "utf8")) ?? {};
  } catch (e) {
    throw new PluginError(`Unable to load ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const registry = schemaRegistry();
  if (!registry.validate("plugins", raw)) {
    throw new PluginError(`Malformed plugin config ${filePath}: ${registry.errorsText("plugins")}`);
  }
  return Object.entries(raw).map(([name, entry]) => parsePluginEntry(name, entry));
}

/** Every configured jar must be present before the server starts. */
export function checkPlugins(plugins: readonly PluginConfig[], serverDir: string): void {
  for (const plugin of plugins) {
    for (const jar of pluginJars(plugin, serverDir)) {
      if (fs.existsSync(jar.path)) continue;
      throw new PluginError(
        plugin.jarNames === null ? `Missing plugin: ${describePlugin(plugin)}` : `Missing jar: ${jar.fileName}`,
      );
    }
  }
}

export type PluginUpdateStatus = "skipped" | "downloaded" | "exists";

export type PluginUpdateResult = {
  plugin: string;
  /** Null for a skipped plugin. */
  jar: string | null;
  status: PluginUpdateStatus;
};

export type UpdatePluginsOptions = {
  serverDir: string;
  force?: boolean;
  /** Glob patterns over plugin names. Each must match at least one plugin. */
  ignore?: readonly string[];
};

/**
 * Download every missing jar (every jar, with `force`). Plugins matched by an
 * ignore pattern are skipped.
 */
export async function updatePlugins(
  plugins: readonly PluginConfig[],
  options: UpdatePluginsOptions,
): Promise<PluginUpdateResult[]> {
  const ignore = options.ignore ?? [];
  for (const pattern of ignore) {
    if (!plugins.some((p) => minimatch(p.name, pattern))) {
      throw new PluginError(`Unknown plugin name: ${pattern}`);
    }
  }

  const results: PluginUpdateResult[] = [];
  for (const plugin of plugins) {
    if (ignore.some((pattern) => minimatch(plugin.name, pattern))) {
      results.push({ plugin: plugin.name, jar: null, status: "skipped" });
      continue;
    }
    for (const jar of pluginJars(plugin, options.serverDir)) {
      const refreshed = await plugin.strategy.download(jar, { force: options.force ?? false });
      results.push({ plugin: plugin.name, jar: jar.fileName, status: refreshed ? "downloaded" : "exists" });
    }
  }
  return results;
}
