import { ConfigError } from "../errors.js";
import { schemaRegistry } from "../schema/registry.js";
import type { JarcertConfig } from "../types/config.js";

/** Validate a merged config against the config schema. */
export function validateConfig(config: unknown): JarcertConfig {
  const registry = schemaRegistry();
  if (!registry.validate("config", config)) {
    throw new ConfigError("Invalid configuration", [registry.errorsText("config")]);
  }
  return config;
}
