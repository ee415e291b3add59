/**
 * Base Plugin
 *
 * Registers the default translators, merger, transform chains and page
 * translator. Other plugins replace a default by registering with
 * `overrides: [<default name>]`.
 *
 * @module
 */

import { CoreExtensions } from "../../core/extensions.js";
import type { IPlugin, PluginRegistrar, PluginSetup } from "../../core/interfaces/IPlugin.js";
import { DefaultSymbolTranslator } from "../../core/translators/symbol-translator.js";
import { DefaultFileTranslator } from "../../core/translators/file-translator.js";
import { DefaultDocumentableMerger } from "../../core/merger/documentable-merger.js";
import { DefaultPageTranslator } from "../../core/pages/page-translator.js";
import { createDefaultDocumentableTransformers } from "../../core/transformers/documentables/index.js";
import { createDefaultPageTransformers } from "../../core/transformers/pages/index.js";

export const BASE_PLUGIN_NAME = "base";

/**
 * Registration names of the base plugin's single-valued defaults
 */
export const BaseRegistrations = {
  symbolTranslator: (frontEnd: string) => `defaultSymbolTranslator:${frontEnd}`,
  fileTranslator: "defaultFileTranslator",
  documentableMerger: "defaultDocumentableMerger",
  pageTranslator: "defaultPageTranslator",
} as const;

export class BasePlugin implements IPlugin {
  readonly name = BASE_PLUGIN_NAME;

  install(registrar: PluginRegistrar, { configuration }: PluginSetup): void {
    const frontEnds = new Set(configuration.passes.map((pass) => pass.frontEnd));
    for (const frontEnd of frontEnds) {
      registrar.register(CoreExtensions.symbolTranslator(frontEnd), new DefaultSymbolTranslator(), {
        name: BaseRegistrations.symbolTranslator(frontEnd),
      });
    }
    registrar.register(CoreExtensions.fileTranslator, new DefaultFileTranslator(), {
      name: BaseRegistrations.fileTranslator,
    });
    registrar.register(CoreExtensions.documentableMerger, new DefaultDocumentableMerger(), {
      name: BaseRegistrations.documentableMerger,
    });

    for (const transformer of createDefaultDocumentableTransformers()) {
      registrar.register(CoreExtensions.documentableTransformer, transformer, { name: transformer.name });
    }

    registrar.register(CoreExtensions.pageTranslator, new DefaultPageTranslator(), {
      name: BaseRegistrations.pageTranslator,
    });
    for (const transformer of createDefaultPageTransformers()) {
      registrar.register(CoreExtensions.pageTransformer, transformer, { name: transformer.name });
    }
  }
}

export function createBasePlugin(): BasePlugin {
  return new BasePlugin();
}
