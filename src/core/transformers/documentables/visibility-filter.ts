/**
 * Drops private and internal declarations unless the pass or package includes
 * non-public API
 *
 * @module
 */

import type { ContainedDocumentable, PlatformFacts } from "../../model/documentable.js";
import type { PlatformData } from "../../model/platform.js";
import type { PassConfiguration } from "../../../utils/validation.js";
import { effectiveOptions } from "./package-options.js";
import { PlatformFilterTransformer } from "./platform-filter.js";

export class VisibilityFilter extends PlatformFilterTransformer {
  readonly name = "visibility-filter";

  protected keep(
    node: ContainedDocumentable,
    _platform: PlatformData,
    facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean {
    if (facts.visibility === "public" || facts.visibility === "protected") return true;
    return effectiveOptions(pass, node.dri.packageName).includeNonPublic;
  }
}

export function createVisibilityFilter(): VisibilityFilter {
  return new VisibilityFilter();
}
