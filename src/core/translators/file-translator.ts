/**
 * Default file-based translator. Packages come from each file's explicit
 * package or, failing that, its directory relative to the source root.
 *
 * @module
 */

import * as path from "node:path";
import type { FileTranslationInput, FileTranslator } from "../extensions.js";
import { createModule, createPackage, type ContainedDocumentable, type DModule } from "../model/documentable.js";
import type { AnalyzedSourceFile } from "../interfaces/IAnalysisEnvironment.js";
import { symbolToDocumentable, uniqueByIdentity } from "./symbols.js";

/**
 * `src/a/b/File.js` under root `src` → `a.b`; files directly in the root → ""
 */
export function packageNameOf(file: AnalyzedSourceFile): string {
  if (file.packageName !== undefined) return file.packageName;
  const relative = path.relative(file.sourceRoot, path.dirname(file.path));
  if (relative === "" || relative.startsWith("..")) return "";
  return relative.split(path.sep).join(".");
}

export class DefaultFileTranslator implements FileTranslator {
  translate(input: FileTranslationInput): DModule {
    const { platform } = input;
    const byPackage = new Map<string, ContainedDocumentable[]>();

    for (const file of input.files) {
      input.cancellation.throwIfCancelled();
      const packageName = packageNameOf(file);
      const parent = { packageName };
      const nodes = byPackage.get(packageName) ?? [];
      nodes.push(...file.symbols.map((symbol) => symbolToDocumentable(symbol, parent, platform)));
      byPackage.set(packageName, nodes);
    }

    const packages = [...byPackage].map(([packageName, nodes]) =>
      createPackage(packageName, platform, uniqueByIdentity(nodes))
    );
    return createModule(input.moduleName, platform, packages);
  }
}
