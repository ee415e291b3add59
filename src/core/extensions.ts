/**
 * Core Extension Points
 *
 * The slots the generation pipeline reads from the registry. Plugins fill
 * them; the generator resolves them once per stage.
 *
 * @module
 */

import type { DModule } from "./model/documentable.js";
import type { PlatformData } from "./model/platform.js";
import type { RootPageNode } from "./pages/page-node.js";
import type { AnalyzedSourceFile, AnalyzedSymbolGroup } from "./interfaces/IAnalysisEnvironment.js";
import type { DocumentationContext } from "./plugability/context.js";
import type { CancellationToken } from "../utils/async.js";
import { multiPoint, singlePoint, type ExtensionPoint } from "./plugability/extension-point.js";

// =============================================================================
// Contracts
// =============================================================================

export interface SymbolTranslationInput {
  moduleName: string;
  platform: PlatformData;
  groups: readonly AnalyzedSymbolGroup[];
  moduleDocumentation?: string;
  cancellation: CancellationToken;
}

export interface FileTranslationInput {
  moduleName: string;
  platform: PlatformData;
  files: readonly AnalyzedSourceFile[];
  cancellation: CancellationToken;
}

/** Turns analyzed symbol groups of one platform into a module */
export interface SymbolTranslator {
  translate(input: SymbolTranslationInput, context: DocumentationContext): Promise<DModule> | DModule;
}

/** Turns analyzed source files of one platform into a module */
export interface FileTranslator {
  translate(input: FileTranslationInput, context: DocumentationContext): Promise<DModule> | DModule;
}

/** Combines per-platform modules into one */
export interface DocumentableMerger {
  merge(modules: readonly DModule[], context: DocumentationContext): DModule;
}

/** One step of the model transform chain */
export interface DocumentableTransformer {
  readonly name: string;
  transform(module: DModule, context: DocumentationContext): Promise<DModule> | DModule;
}

export interface PageTranslator {
  translate(module: DModule, context: DocumentationContext): RootPageNode;
}

/** One step of the page transform chain */
export interface PageTransformer {
  readonly name: string;
  transform(root: RootPageNode, context: DocumentationContext): Promise<RootPageNode> | RootPageNode;
}

export interface Renderer {
  render(root: RootPageNode): Promise<void> | void;
}

// =============================================================================
// Points
// =============================================================================

const symbolTranslators = new Map<string, ExtensionPoint<SymbolTranslator, "single">>();

/**
 * Symbol-level translator for one front-end kind. The same token is returned
 * for the same front end.
 */
function symbolTranslator(frontEnd: string): ExtensionPoint<SymbolTranslator, "single"> {
  let point = symbolTranslators.get(frontEnd);
  if (!point) {
    point = singlePoint<SymbolTranslator>(
      `symbolTranslator:${frontEnd}`,
      `Translates ${frontEnd} symbol groups into documentables`
    );
    symbolTranslators.set(frontEnd, point);
  }
  return point;
}

export const CoreExtensions = {
  symbolTranslator,
  fileTranslator: singlePoint<FileTranslator>("fileTranslator", "Translates analyzed source files"),
  documentableMerger: singlePoint<DocumentableMerger>("documentableMerger", "Merges per-platform modules"),
  documentableTransformer: multiPoint<DocumentableTransformer>(
    "documentableTransformer",
    "Model transform chain, applied in registration order"
  ),
  pageTranslator: singlePoint<PageTranslator>("pageTranslator", "Builds the page tree"),
  pageTransformer: multiPoint<PageTransformer>("pageTransformer", "Page transform chain"),
  renderer: singlePoint<Renderer>("renderer", "Produces output from the page tree"),
} as const;
