/**
 * Effective documentation options of a package on one platform: the pass
 * defaults overridden by the per-package entry with the longest matching
 * prefix.
 *
 * @module
 */

import type { PackageOptions, PassConfiguration } from "../../../utils/validation.js";

export interface EffectivePackageOptions {
  includeNonPublic: boolean;
  reportUndocumented: boolean;
  skipDeprecated: boolean;
  suppress: boolean;
}

function matches(prefix: string, packageName: string): boolean {
  return prefix === "" || packageName === prefix || packageName.startsWith(`${prefix}.`);
}

export function findPackageOptions(pass: PassConfiguration, packageName: string): PackageOptions | undefined {
  let best: PackageOptions | undefined;
  for (const options of pass.perPackageOptions) {
    if (matches(options.prefix, packageName) && (!best || options.prefix.length > best.prefix.length)) {
      best = options;
    }
  }
  return best;
}

export function effectiveOptions(pass: PassConfiguration, packageName: string): EffectivePackageOptions {
  const options = findPackageOptions(pass, packageName);
  return {
    includeNonPublic: options?.includeNonPublic ?? pass.includeNonPublic,
    reportUndocumented: options?.reportUndocumented ?? pass.reportUndocumented,
    skipDeprecated: options?.skipDeprecated ?? pass.skipDeprecated,
    suppress: options?.suppress ?? false,
  };
}
