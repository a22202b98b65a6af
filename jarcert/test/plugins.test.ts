import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ManualDownload, UrlPatternDownload, expandUrlPattern } from "../src/plugins/download.js";
import {
  checkPlugins,
  loadPluginConfigs,
  parsePluginEntry,
  pluginJars,
  updatePlugins,
  type PluginConfig,
} from "../src/plugins/plugins.js";
import { PluginError } from "../src/errors.js";
import { makeTmpDir, writeFile } from "./helpers/fakes.js";

/** Serves every URL with its own text, recording requests. */
function echoFetch(requested: string[]) {
  return async (url: string): Promise<Response> => {
    requested.push(url);
    return new Response(`jar from ${url}`, { status: 200 });
  };
}

describe("plugin config", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir("plugins");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing plugins file as no plugins", () => {
    expect(loadPluginConfigs(path.join(dir, "plugins.yaml"))).toEqual([]);
  });

  it("parses url and manual plugins", () => {
    const file = writeFile(
      dir,
      "plugins.yaml",
      [
        "WorldEdit:",
        "  version: '7.2.15'",
        "  url: https://plugins.invalid/{plugin_name}/{version}/{jar_name}.jar",
        "Essentials:",
        "  version: '2.20.1'",
        "  manual_download: true",
        "  jars: [EssentialsX, EssentialsXChat]",
        "",
      ].join("\n"),
    );

    const [worldEdit, essentials] = loadPluginConfigs(file);
    expect(worldEdit?.name).toBe("WorldEdit");
    expect(worldEdit?.jarNames).toBeNull();
    expect(worldEdit?.strategy).toBeInstanceOf(UrlPatternDownload);
    expect(essentials?.jarNames).toEqual(["EssentialsX", "EssentialsXChat"]);
    expect(essentials?.strategy).toBeInstanceOf(ManualDownload);
  });

  it("rejects an entry without a version", () => {
    const file = writeFile(dir, "plugins.yaml", "Broken:\n  url: https://plugins.invalid/x.jar\n");
    expect(() => loadPluginConfigs(file)).toThrow(PluginError);
  });

  it("rejects an entry without a download strategy", () => {
    expect(() => parsePluginEntry("Lonely", { version: "1.0" })).toThrow("No download strategy for Lonely");
  });

  it("names jars after the plugin and version", () => {
    const plugin = parsePluginEntry("Vault", { version: "1.7.3", manual_download: true });
    expect(pluginJars(plugin, "/srv/server")).toEqual([
      { plugin, name: "Vault", fileName: "Vault-v1.7.3.jar", path: path.join("/srv/server", "plugins", "Vault-v1.7.3.jar") },
    ]);
  });
});

describe("checkPlugins", () => {
  let serverDir: string;

  beforeEach(() => {
    serverDir = makeTmpDir("server");
  });

  afterEach(() => {
    fs.rmSync(serverDir, { recursive: true, force: true });
  });

  it("passes when every jar is present", () => {
    const plugin = parsePluginEntry("Vault", { version: "1.7.3", manual_download: true });
    writeFile(serverDir, "plugins/Vault-v1.7.3.jar", "jar");
    expect(() => checkPlugins([plugin], serverDir)).not.toThrow();
  });

  it("names a missing single-jar plugin", () => {
    const plugin = parsePluginEntry("Vault", { version: "1.7.3", manual_download: true });
    expect(() => checkPlugins([plugin], serverDir)).toThrow("Missing plugin: Vault v1.7.3");
  });

  it("names the missing jar of a multi-jar plugin", () => {
    const plugin = parsePluginEntry("Essentials", { version: "2.20.1", manual_download: true, jars: ["A", "B"] });
    writeFile(serverDir, "plugins/A-v2.20.1.jar", "jar");
    expect(() => checkPlugins([plugin], serverDir)).toThrow("Missing jar: B-v2.20.1.jar");
  });
});

describe("updatePlugins", () => {
  let serverDir: string;
  let requested: string[];
  let plugins: PluginConfig[];

  beforeEach(() => {
    serverDir = makeTmpDir("update");
    requested = [];
    const fetchFn = echoFetch(requested);
    plugins = [
      {
        name: "WorldEdit",
        version: "7.2.15",
        jarNames: null,
        strategy: new UrlPatternDownload("https://plugins.invalid/{plugin_name}/{version}/{jar_name}.jar", fetchFn),
      },
      {
        name: "WorldGuard",
        version: "7.0.9",
        jarNames: null,
        strategy: new UrlPatternDownload("https://plugins.invalid/{jar_name}-{version}.jar", fetchFn),
      },
    ];
  });

  afterEach(() => {
    fs.rmSync(serverDir, { recursive: true, force: true });
  });

  it("downloads missing jars into the plugins directory", async () => {
    const results = await updatePlugins(plugins, { serverDir });

    expect(results).toEqual([
      { plugin: "WorldEdit", jar: "WorldEdit-v7.2.15.jar", status: "downloaded" },
      { plugin: "WorldGuard", jar: "WorldGuard-v7.0.9.jar", status: "downloaded" },
    ]);
    expect(requested).toEqual([
      "https://plugins.invalid/WorldEdit/7.2.15/WorldEdit.jar",
      "https://plugins.invalid/WorldGuard-7.0.9.jar",
    ]);
    expect(fs.readFileSync(path.join(serverDir, "plugins", "WorldGuard-v7.0.9.jar"), "utf8")).toBe(
      "jar from https://plugins.invalid/WorldGuard-7.0.9.jar",
    );
  });

  it("leaves present jars alone unless forced", async () => {
    writeFile(serverDir, "plugins/WorldEdit-v7.2.15.jar", "local copy");
    const results = await updatePlugins(plugins, { serverDir });
    expect(results[0]).toEqual({ plugin: "WorldEdit", jar: "WorldEdit-v7.2.15.jar", status: "exists" });

    await updatePlugins(plugins, { serverDir, force: true });
    expect(fs.readFileSync(path.join(serverDir, "plugins", "WorldEdit-v7.2.15.jar"), "utf8")).toBe(
      "jar from https://plugins.invalid/WorldEdit/7.2.15/WorldEdit.jar",
    );
  });

  it("skips plugins matched by an ignore glob", async () => {
    const results = await updatePlugins(plugins, { serverDir, ignore: ["*Guard"] });
    expect(results).toEqual([
      { plugin: "WorldEdit", jar: "WorldEdit-v7.2.15.jar", status: "downloaded" },
      { plugin: "WorldGuard", jar: null, status: "skipped" },
    ]);
  });

  it("rejects an ignore pattern that matches no plugin", async () => {
    await expect(updatePlugins(plugins, { serverDir, ignore: ["Nope*"] })).rejects.toThrow(
      "Unknown plugin name: Nope*",
    );
    expect(requested).toEqual([]);
  });

  it("fails on a non-OK response", async () => {
    const failing: PluginConfig = {
      name: "Gone",
      version: "1.0",
      jarNames: null,
      strategy: new UrlPatternDownload("https://plugins.invalid/{jar_name}.jar", async () => new Response("", { status: 404 })),
    };
    await expect(updatePlugins([failing], { serverDir })).rejects.toThrow(
      "Unable to download jar: https://plugins.invalid/Gone.jar (HTTP 404)",
    );
    expect(fs.existsSync(path.join(serverDir, "plugins", "Gone-v1.0.jar"))).toBe(false);
  });

  it("refuses to force a manual download", async () => {
    const manual = parsePluginEntry("Vault", { version: "1.7.3", manual_download: true });
    writeFile(serverDir, "plugins/Vault-v1.7.3.jar", "jar");
    await expect(updatePlugins([manual], { serverDir })).resolves.toEqual([
      { plugin: "Vault", jar: "Vault-v1.7.3.jar", status: "exists" },
    ]);
    await expect(updatePlugins([manual], { serverDir, force: true })).rejects.toBeInstanceOf(PluginError);
  });
});

describe("expandUrlPattern", () => {
  it("rejects an unknown placeholder", () => {
    const plugin = parsePluginEntry("Vault", { version: "1.7.3", manual_download: true });
    const [jar] = pluginJars(plugin, "/srv");
    if (!jar) throw new Error("expected a jar");
    expect(() => expandUrlPattern("https://plugins.invalid/{build}.jar", jar)).toThrow(
      'Missing key "build" in URL pattern: https://plugins.invalid/{build}.jar',
    );
  });
});
