import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { CatalogBuild, CatalogProject, CatalogVersionBuilds } from "../types/catalog.js";
import type { JarcertConfig } from "../types/config.js";
import type { PluginsFile } from "../types/plugins.js";
import type { SerializedSignature } from "../types/signature.js";
import {
  BUILD_INFO_SCHEMA,
  CONFIG_SCHEMA,
  PLUGINS_SCHEMA,
  PROJECT_SCHEMA,
  SIGNATURE_SCHEMA,
  VERSION_BUILDS_SCHEMA,
} from "./definitions.js";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

/** Document type behind each schema name. */
export type SchemaTypes = {
  signature: SerializedSignature;
  project: CatalogProject;
  "version-builds": CatalogVersionBuilds;
  "build-info": CatalogBuild;
  config: JarcertConfig;
  plugins: PluginsFile;
};

export type SchemaName = keyof SchemaTypes;

type Validators = { [N in SchemaName]: AjvValidateFn<SchemaTypes[N]> };

/** Draft 2020-12, strict, with formats. Schema ids must be unique per instance. */
function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  return ajv;
}

/**
 * Schema registry: compiles the built-in JSON Schemas once and validates
 * documents against them by name.
 */
export class SchemaRegistry {
  private readonly validators: Validators;

  constructor(private readonly ajv: AjvInstance = createAjv()) {
    this.validators = {
      signature: ajv.compile<SerializedSignature>(SIGNATURE_SCHEMA),
      project: ajv.compile<CatalogProject>(PROJECT_SCHEMA),
      "version-builds": ajv.compile<CatalogVersionBuilds>(VERSION_BUILDS_SCHEMA),
      "build-info": ajv.compile<CatalogBuild>(BUILD_INFO_SCHEMA),
      config: ajv.compile<JarcertConfig>(CONFIG_SCHEMA),
      plugins: ajv.compile<PluginsFile>(PLUGINS_SCHEMA),
    };
  }

  validate<N extends SchemaName>(name: N, data: unknown): data is SchemaTypes[N] {
    const validate: AjvValidateFn<SchemaTypes[N]> = this.validators[name];
    return validate(data);
  }

  /** Errors of the most recent failed {@link validate} call for `name`. */
  errorsText(name: SchemaName): string {
    return this.ajv.errorsText(this.validators[name].errors);
  }
}

let defaultRegistry: SchemaRegistry | null = null;

export function schemaRegistry(): SchemaRegistry {
  defaultRegistry ??= new SchemaRegistry();
  return defaultRegistry;
}
