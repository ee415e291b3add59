/**
 * Drops declarations that belong to no package unless `includeRootPackage`
 * is set for the platform's pass
 *
 * @module
 */

import type { ContainedDocumentable, PlatformFacts } from "../../model/documentable.js";
import type { PlatformData } from "../../model/platform.js";
import type { PassConfiguration } from "../../../utils/validation.js";
import { PlatformFilterTransformer } from "./platform-filter.js";

export class RootPackageFilter extends PlatformFilterTransformer {
  readonly name = "root-package-filter";

  protected keep(
    node: ContainedDocumentable,
    _platform: PlatformData,
    _facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean {
    return pass.includeRootPackage || node.dri.packageName !== "";
  }
}

export function createRootPackageFilter(): RootPackageFilter {
  return new RootPackageFilter();
}
