/**
 * polydoc - plugin-extensible, multi-platform documentation pipeline
 *
 * @example
 * ```typescript
 * import { createDocumentationGenerator, loadConfiguration, PinoDocumentationLogger } from "polydoc";
 *
 * const configuration = loadConfiguration("polydoc.json");
 * const report = await createDocumentationGenerator(configuration, new PinoDocumentationLogger()).generate();
 * ```
 */

import { DocumentationGenerator, type DocumentationGeneratorOptions } from "./core/generator.js";
import type { IDocumentationLogger } from "./core/interfaces/IDocumentationLogger.js";
import { createDefaultAnalysisFactories } from "./analysis/index.js";
import { createDefaultPlugins } from "./plugins/index.js";
import type { DocumentationConfiguration } from "./utils/validation.js";

export * from "./core/index.js";
export * from "./analysis/index.js";
export * from "./plugins/index.js";
export * from "./utils/validation.js";
export { createLogger, type Logger } from "./utils/logger.js";

/**
 * Generator with the built-in plugins for the configured format and the
 * built-in analysis front ends. `options.plugins` are initialized after the
 * built-in ones.
 */
export function createDocumentationGenerator(
  configuration: DocumentationConfiguration,
  logger: IDocumentationLogger,
  options: DocumentationGeneratorOptions = {}
): DocumentationGenerator {
  return new DocumentationGenerator(configuration, logger, {
    ...options,
    plugins: [...createDefaultPlugins(configuration), ...(options.plugins ?? [])],
    analysisFactories: options.analysisFactories ?? createDefaultAnalysisFactories(),
  });
}
