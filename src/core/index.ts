/**
 * Core module - the documentation pipeline and its model
 */

// Re-export error classes
export * from "./errors.js";

export * from "./model/platform.js";
export * from "./model/documentable.js";
export * from "./pages/page-node.js";
export * from "./pages/page-translator.js";

export * from "./interfaces/IAnalysisEnvironment.js";
export * from "./interfaces/IDocumentationLogger.js";
export * from "./interfaces/IPlugin.js";

export * from "./plugability/extension-point.js";
export * from "./plugability/registry.js";
export * from "./plugability/ordering.js";
export * from "./plugability/context.js";
export * from "./extensions.js";

export * from "./analysis/diagnostic-collector.js";
export * from "./logging/documentation-logger.js";

export * from "./translators/symbol-translator.js";
export * from "./translators/file-translator.js";
export * from "./merger/documentable-merger.js";
export * from "./transformers/documentables/index.js";
export * from "./transformers/pages/index.js";

export * from "./generator.js";
