/**
 * Default Documentable Transformers
 *
 * @module
 */

export { filterByPlatform, PlatformFilterTransformer, type PlatformPredicate } from "./platform-filter.js";
export { effectiveOptions, findPackageOptions, type EffectivePackageOptions } from "./package-options.js";
export { SuppressedFilesFilter, createSuppressedFilesFilter, isSuppressedFile } from "./suppressed-files.js";
export { PackageSuppressionFilter, createPackageSuppressionFilter } from "./package-suppression.js";
export { RootPackageFilter, createRootPackageFilter } from "./root-package.js";
export { VisibilityFilter, createVisibilityFilter } from "./visibility-filter.js";
export { DeprecationFilter, createDeprecationFilter } from "./deprecation-filter.js";
export { EmptyPackagesFilter, createEmptyPackagesFilter } from "./empty-packages.js";
export { UndocumentedReporter, createUndocumentedReporter } from "./undocumented-reporter.js";
export {
  SourceLinksTransformer,
  createSourceLinksTransformer,
  resolveSourceUrl,
  SOURCE_URL_EXTRA,
} from "./source-links.js";

import { createSuppressedFilesFilter } from "./suppressed-files.js";
import { createPackageSuppressionFilter } from "./package-suppression.js";
import { createRootPackageFilter } from "./root-package.js";
import { createVisibilityFilter } from "./visibility-filter.js";
import { createDeprecationFilter } from "./deprecation-filter.js";
import { createEmptyPackagesFilter } from "./empty-packages.js";
import { createUndocumentedReporter } from "./undocumented-reporter.js";
import { createSourceLinksTransformer } from "./source-links.js";
import type { DocumentableTransformer } from "../../extensions.js";

/**
 * Default model transformers, in chain order
 */
export function createDefaultDocumentableTransformers(): DocumentableTransformer[] {
  return [
    createSuppressedFilesFilter(),
    createPackageSuppressionFilter(),
    createRootPackageFilter(),
    createVisibilityFilter(),
    createDeprecationFilter(),
    createEmptyPackagesFilter(),
    createUndocumentedReporter(),
    createSourceLinksTransformer(),
  ];
}
