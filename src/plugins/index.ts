/**
 * Built-in plugins
 *
 * @module
 */

import type { IPlugin } from "../core/interfaces/IPlugin.js";
import type { DocumentationConfiguration } from "../utils/validation.js";
import { createBasePlugin } from "./base/index.js";
import { createJsonPlugin } from "./json/index.js";

export * from "./base/index.js";
export * from "./json/index.js";

/**
 * Output plugins shipped with polydoc, by format
 */
export const FORMAT_PLUGINS: Readonly<Record<string, () => IPlugin>> = {
  json: createJsonPlugin,
};

/**
 * The base plugin plus the output plugin of the configured format. A format
 * without a built-in plugin contributes nothing; its renderer has to come from
 * an external plugin.
 */
export function createDefaultPlugins(configuration: DocumentationConfiguration): IPlugin[] {
  const formatPlugin = FORMAT_PLUGINS[configuration.format];
  return formatPlugin ? [createBasePlugin(), formatPlugin()] : [createBasePlugin()];
}
