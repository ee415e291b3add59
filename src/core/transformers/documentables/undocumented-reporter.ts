/**
 * Reports public declarations without documentation. Leaves the model as is.
 *
 * @module
 */

import type { DocumentableTransformer } from "../../extensions.js";
import {
  identityKey,
  isPackage,
  walkDocumentables,
  type DModule,
} from "../../model/documentable.js";
import { describePlatform } from "../../model/platform.js";
import type { DocumentationContext } from "../../plugability/context.js";
import { effectiveOptions } from "./package-options.js";

export class UndocumentedReporter implements DocumentableTransformer {
  readonly name = "undocumented-reporter";

  transform(module: DModule, context: DocumentationContext): DModule {
    walkDocumentables(module, (node) => {
      if (node.kind === "module" || isPackage(node)) return;
      for (const [platform, facts] of node.platforms) {
        if (facts.visibility !== "public" || facts.documentation?.trim()) continue;
        const options = effectiveOptions(context.passFor(platform), node.dri.packageName);
        if (options.reportUndocumented) {
          context.logger.warn(`Undocumented: ${identityKey(node)} (${describePlatform(platform)})`);
        }
      }
    });
    return module;
  }
}

export function createUndocumentedReporter(): UndocumentedReporter {
  return new UndocumentedReporter();
}
