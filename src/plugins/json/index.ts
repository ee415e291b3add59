/**
 * JSON Output Plugin
 *
 * @module
 */

import { CoreExtensions } from "../../core/extensions.js";
import type { IPlugin, PluginRegistrar, PluginSetup } from "../../core/interfaces/IPlugin.js";
import { BASE_PLUGIN_NAME } from "../base/index.js";
import { JsonRenderer } from "./json-renderer.js";

export {
  JsonRenderer,
  pageFileName,
  serializeContent,
  PAGES_DIR,
  PAGES_FILE,
  type SerializedContent,
  type SerializedPage,
} from "./json-renderer.js";

export const JSON_PLUGIN_NAME = "json";

export class JsonPlugin implements IPlugin {
  readonly name = JSON_PLUGIN_NAME;
  readonly after = [BASE_PLUGIN_NAME];

  install(registrar: PluginRegistrar, { configuration }: PluginSetup): void {
    registrar.register(CoreExtensions.renderer, new JsonRenderer(configuration.outputDir), { name: "jsonRenderer" });
  }
}

export function createJsonPlugin(): JsonPlugin {
  return new JsonPlugin();
}
