/**
 * Applies per-package `suppress` options
 *
 * @module
 */

import type { ContainedDocumentable, PlatformFacts } from "../../model/documentable.js";
import type { PlatformData } from "../../model/platform.js";
import type { PassConfiguration } from "../../../utils/validation.js";
import { effectiveOptions } from "./package-options.js";
import { PlatformFilterTransformer } from "./platform-filter.js";

export class PackageSuppressionFilter extends PlatformFilterTransformer {
  readonly name = "package-options";

  protected keep(
    node: ContainedDocumentable,
    _platform: PlatformData,
    _facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean {
    return !effectiveOptions(pass, node.dri.packageName).suppress;
  }
}

export function createPackageSuppressionFilter(): PackageSuppressionFilter {
  return new PackageSuppressionFilter();
}
