import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import type { JarcertConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_FILE = "jarcert.yaml";
export const ENV_PREFIX = "JARCERT_";

export const DEFAULT_CONFIG: JarcertConfig = {
  cache_dir: "cache",
  server_dir: "server",
  plugins_file: "plugins.yaml",
  catalog: {
    base_url: "https://api.papermc.io/v2",
    project: "paper",
  },
  development: {
    repo: "~/git/Paper",
    artifact_path: "Paper-Server/target/paper-{version}.jar",
    pom_file: "work/CraftBukkit/pom.xml",
    version_property: "minecraft.version",
    build_command: ["mvn", "clean", "package"],
    nested_repos: ["Paper-Server", "Paper-API"],
  },
  jvm: {
    search_dir: "/usr/lib/jvm",
    memory: "1G",
  },
};

type ConfigLayer = Record<string, unknown>;

const LIST_KEYS = new Set(["build_command", "nested_repos"]);

function splitList(value: string): string[] {
  const trimmed = value.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two layers. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping. */
function loadYaml(filePath: string): ConfigLayer {
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Unable to read config file ${filePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Collect JARCERT_ prefixed environment overrides. A double underscore
 * separates nesting levels: JARCERT_CATALOG__BASE_URL → catalog.base_url.
 * `build_command` and `nested_repos` are split on whitespace.
 */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf) continue;

    let target = layer;
    for (const segment of segments) {
      const existing = target[segment];
      const next: ConfigLayer = isRecord(existing) ? existing : {};
      target[segment] = next;
      target = next;
    }
    target[leaf] = LIST_KEYS.has(leaf) ? splitList(value) : value;
  }
  return layer;
}

function expandHome(p: string, home: string | undefined): string {
  if (home && (p === "~" || p.startsWith("~/"))) {
    return path.join(home, p.slice(1));
  }
  return p;
}

export type LoadConfigOptions = {
  /** Explicit config file; must exist. Defaults to jarcert.yaml in `cwd`, if present. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: built-in defaults ← YAML file ← environment variables.
 * The merged result is schema-validated.
 */
export function loadConfig(options: LoadConfigOptions = {}): JarcertConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  // Layer 1: defaults
  let merged: ConfigLayer = { ...DEFAULT_CONFIG };

  // Layer 2: config file
  if (options.configPath) {
    const explicit = path.resolve(cwd, options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigError(`Config file not found: ${explicit}`);
    }
    merged = deepMerge(merged, loadYaml(explicit));
  } else {
    const implicit = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(implicit)) {
      merged = deepMerge(merged, loadYaml(implicit));
    }
  }

  // Layer 3: environment variables
  merged = deepMerge(merged, envOverrides(env));

  const config = validateConfig(merged);
  return {
    ...config,
    development: { ...config.development, repo: expandHome(config.development.repo, env.HOME) },
  };
}
