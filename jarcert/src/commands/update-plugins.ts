import path from "node:path";
import { loadPluginConfigs, updatePlugins, type PluginUpdateResult } from "../plugins/plugins.js";
import type { JarcertConfig } from "../types/config.js";

export type UpdatePluginsCommandOptions = {
  force?: boolean;
  ignore?: string[];
};

export function updatePluginsCommand(
  config: JarcertConfig,
  options: UpdatePluginsCommandOptions,
): Promise<PluginUpdateResult[]> {
  const plugins = loadPluginConfigs(path.resolve(config.plugins_file));
  return updatePlugins(plugins, {
    serverDir: path.resolve(config.server_dir),
    force: options.force,
    ignore: options.ignore,
  });
}
