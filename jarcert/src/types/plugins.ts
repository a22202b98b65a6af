/** One entry of plugins.yaml, keyed by plugin name. */
export type PluginEntry = {
  version: string;
  /** Jar names; defaults to a single jar named after the plugin. */
  jars?: string[];
  /** URL pattern with {plugin_name}, {version} and {jar_name} placeholders. */
  url?: string;
  manual_download?: boolean;
};

export type PluginsFile = Record<string, PluginEntry>;
