/**
 * Drops packages without declarations when every platform of the package
 * asks to skip empty packages
 *
 * @module
 */

import type { DocumentableTransformer } from "../../extensions.js";
import { withPackages, type DModule } from "../../model/documentable.js";
import type { DocumentationContext } from "../../plugability/context.js";

export class EmptyPackagesFilter implements DocumentableTransformer {
  readonly name = "empty-packages";

  transform(module: DModule, context: DocumentationContext): DModule {
    const packages = module.children.filter(
      (pkg) =>
        pkg.children.length > 0 ||
        !pkg.platforms.platforms().every((platform) => context.passFor(platform).skipEmptyPackages)
    );
    if (packages.length === module.children.length) return module;
    return withPackages(module, packages);
  }
}

export function createEmptyPackagesFilter(): EmptyPackagesFilter {
  return new EmptyPackagesFilter();
}
