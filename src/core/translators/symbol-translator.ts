/**
 * Default symbol-level translator: one package per analyzed symbol group,
 * packages in first-occurrence order.
 *
 * @module
 */

import type { SymbolTranslationInput, SymbolTranslator } from "../extensions.js";
import { createModule, createPackage, type DModule, type DPackage } from "../model/documentable.js";
import type { AnalyzedSymbolGroup } from "../interfaces/IAnalysisEnvironment.js";
import { symbolToDocumentable, uniqueByIdentity } from "./symbols.js";

export class DefaultSymbolTranslator implements SymbolTranslator {
  translate(input: SymbolTranslationInput): DModule {
    const { platform } = input;
    const byPackage = new Map<string, AnalyzedSymbolGroup[]>();
    for (const group of input.groups) {
      const groups = byPackage.get(group.packageName) ?? [];
      groups.push(group);
      byPackage.set(group.packageName, groups);
    }

    const packages: DPackage[] = [];
    for (const [packageName, groups] of byPackage) {
      input.cancellation.throwIfCancelled();
      const parent = { packageName };
      const children = groups.flatMap((group) =>
        group.symbols.map((symbol) => symbolToDocumentable(symbol, parent, platform))
      );
      const documentation = groups.find((group) => group.documentation)?.documentation;
      packages.push(createPackage(packageName, platform, uniqueByIdentity(children), documentation));
    }

    return createModule(input.moduleName, platform, packages, input.moduleDocumentation);
  }
}
