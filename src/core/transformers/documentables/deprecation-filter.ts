/**
 * Drops deprecated declarations where `skipDeprecated` applies
 *
 * @module
 */

import type { ContainedDocumentable, PlatformFacts } from "../../model/documentable.js";
import type { PlatformData } from "../../model/platform.js";
import type { PassConfiguration } from "../../../utils/validation.js";
import { effectiveOptions } from "./package-options.js";
import { PlatformFilterTransformer } from "./platform-filter.js";

export class DeprecationFilter extends PlatformFilterTransformer {
  readonly name = "deprecation-filter";

  protected keep(
    node: ContainedDocumentable,
    _platform: PlatformData,
    facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean {
    return !(facts.deprecated && effectiveOptions(pass, node.dri.packageName).skipDeprecated);
  }
}

export function createDeprecationFilter(): DeprecationFilter {
  return new DeprecationFilter();
}
