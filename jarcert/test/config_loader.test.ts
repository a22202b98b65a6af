import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG, envOverrides, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";
import { makeTmpDir, writeFile } from "./helpers/fakes.js";

describe("config loader", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTmpDir("config");
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it("falls back to the built-in defaults", () => {
    const config = loadConfig({ cwd, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("expands ~ in the development repository", () => {
    const config = loadConfig({ cwd, env: { HOME: "/home/tester" } });
    expect(config.development.repo).toBe(path.join("/home/tester", "git/Paper"));
  });

  it("merges jarcert.yaml from the working directory over the defaults", () => {
    writeFile(cwd, "jarcert.yaml", "cache_dir: /var/cache/jarcert\njvm:\n  memory: 4G\n");
    const config = loadConfig({ cwd, env: {} });
    expect(config.cache_dir).toBe("/var/cache/jarcert");
    expect(config.jvm).toEqual({ search_dir: "/usr/lib/jvm", memory: "4G" });
    expect(config.catalog.project).toBe("paper");
  });

  it("replaces arrays rather than concatenating them", () => {
    writeFile(cwd, "jarcert.yaml", "development:\n  build_command: [gradle, build]\n");
    expect(loadConfig({ cwd, env: {} }).development.build_command).toEqual(["gradle", "build"]);
  });

  it("reads an explicit config path relative to the working directory", () => {
    writeFile(cwd, "conf/alt.yaml", "server_dir: /srv/server\n");
    expect(loadConfig({ configPath: "conf/alt.yaml", cwd, env: {} }).server_dir).toBe("/srv/server");
  });

  it("fails when an explicit config file does not exist", () => {
    expect(() => loadConfig({ configPath: "missing.yaml", cwd, env: {} })).toThrow(
      `Config file not found: ${path.join(cwd, "missing.yaml")}`,
    );
  });

  it("treats an empty config file as no overrides", () => {
    writeFile(cwd, "jarcert.yaml", "");
    expect(loadConfig({ cwd, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("rejects a config file that is not a mapping", () => {
    writeFile(cwd, "jarcert.yaml", "- just\n- a list\n");
    expect(() => loadConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  it("applies environment overrides over the file", () => {
    writeFile(cwd, "jarcert.yaml", "jvm:\n  memory: 4G\n");
    const config = loadConfig({
      cwd,
      env: { JARCERT_JVM__MEMORY: "8G", JARCERT_CACHE_DIR: "/tmp/jarcert-cache", UNRELATED: "x" },
    });
    expect(config.jvm.memory).toBe("8G");
    expect(config.cache_dir).toBe("/tmp/jarcert-cache");
  });

  it("splits an overridden build command on whitespace", () => {
    expect(envOverrides({ JARCERT_DEVELOPMENT__BUILD_COMMAND: " gradle build  -x test " })).toEqual({
      development: { build_command: ["gradle", "build", "-x", "test"] },
    });
  });

  it("scans the server and API checkouts by default", () => {
    expect(loadConfig({ cwd, env: {} }).development.nested_repos).toEqual(["Paper-Server", "Paper-API"]);
  });

  it("splits overridden nested repositories, allowing none", () => {
    expect(envOverrides({ JARCERT_DEVELOPMENT__NESTED_REPOS: "Server  API" })).toEqual({
      development: { nested_repos: ["Server", "API"] },
    });
    expect(loadConfig({ cwd, env: { JARCERT_DEVELOPMENT__NESTED_REPOS: "" } }).development.nested_repos).toEqual([]);
  });

  it("rejects a merged config that fails validation", () => {
    expect(() => loadConfig({ cwd, env: { JARCERT_JVM__MEMORY: "lots" } })).toThrow("Invalid configuration");
  });
});

describe("config validator", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toBe(DEFAULT_CONFIG);
  });

  it("rejects a missing section", () => {
    const { jvm: _jvm, ...partial } = DEFAULT_CONFIG;
    expect(() => validateConfig(partial)).toThrow(ConfigError);
  });

  it("rejects a project name with unsupported characters", () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, catalog: { ...DEFAULT_CONFIG.catalog, project: "Paper MC" } })).toThrow(
      ConfigError,
    );
  });
});
