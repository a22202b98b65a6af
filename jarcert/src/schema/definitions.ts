/** JSON Schemas for every document jarcert reads from disk or the network. */

const HEX_SHA256 = { type: "string", pattern: "^[a-f0-9]{64}$" } as const;

export const SIGNATURE_SCHEMA = {
  $id: "jarcert:build-signature@1.0.0",
  type: "object",
  required: ["artifactHash", "sourceRevision", "changedSources"],
  properties: {
    artifactHash: HEX_SHA256,
    sourceRevision: { anyOf: [{ type: "string", minLength: 1 }, { type: "null" }] },
    changedSources: {
      type: "array",
      items: {
        type: "array",
        prefixItems: [{ type: "string", minLength: 1 }, { type: "string", minLength: 1 }],
        minItems: 2,
        items: false,
      },
    },
  },
} as const;

export const PROJECT_SCHEMA = {
  $id: "jarcert:catalog-project@1.0.0",
  type: "object",
  required: ["versions"],
  properties: {
    versions: { type: "array", items: { type: "string" } },
  },
} as const;

export const VERSION_BUILDS_SCHEMA = {
  $id: "jarcert:catalog-version@1.0.0",
  type: "object",
  required: ["builds"],
  properties: {
    builds: { type: "array", items: { type: "integer", minimum: 0 } },
  },
} as const;

export const BUILD_INFO_SCHEMA = {
  $id: "jarcert:catalog-build@1.0.0",
  type: "object",
  required: ["project_id", "project_name", "version", "build", "time", "changes", "downloads"],
  properties: {
    project_id: { type: "string" },
    project_name: { type: "string" },
    version: { type: "string" },
    build: { type: "integer", minimum: 0 },
    time: { type: "string" },
    changes: {
      type: "array",
      items: {
        type: "object",
        required: ["commit", "summary", "message"],
        properties: {
          commit: { type: "string" },
          summary: { type: "string" },
          message: { type: "string" },
        },
      },
    },
    downloads: {
      type: "object",
      required: ["application"],
      properties: {
        application: {
          type: "object",
          required: ["name", "sha256"],
          properties: {
            name: { type: "string", minLength: 1 },
            sha256: HEX_SHA256,
          },
        },
      },
    },
  },
} as const;

export const CONFIG_SCHEMA = {
  $id: "jarcert:config@1.0.0",
  type: "object",
  required: ["cache_dir", "server_dir", "plugins_file", "catalog", "development", "jvm"],
  properties: {
    cache_dir: { type: "string", minLength: 1 },
    server_dir: { type: "string", minLength: 1 },
    plugins_file: { type: "string", minLength: 1 },
    catalog: {
      type: "object",
      required: ["base_url", "project"],
      properties: {
        base_url: { type: "string", format: "uri" },
        project: { type: "string", pattern: "^[a-z0-9_-]+$" },
      },
    },
    development: {
      type: "object",
      required: ["repo", "artifact_path", "pom_file", "version_property", "build_command", "nested_repos"],
      properties: {
        repo: { type: "string", minLength: 1 },
        artifact_path: { type: "string", minLength: 1 },
        pom_file: { type: "string", minLength: 1 },
        version_property: { type: "string", minLength: 1 },
        build_command: { type: "array", items: { type: "string" }, minItems: 1 },
        nested_repos: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
    jvm: {
      type: "object",
      required: ["search_dir", "memory"],
      properties: {
        search_dir: { type: "string", minLength: 1 },
        memory: { type: "string", pattern: "^[0-9]+[KMGkmg]$" },
      },
    },
  },
} as const;

export const PLUGINS_SCHEMA = {
  $id: "jarcert:plugins@1.0.0",
  type: "object",
  additionalProperties: {
    type: "object",
    required: ["version"],
    properties: {
      version: { type: "string", minLength: 1 },
      jars: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
      url: { type: "string", minLength: 1 },
      manual_download: { type: "boolean" },
    },
  },
} as const;
