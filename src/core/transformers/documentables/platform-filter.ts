/**
 * Per-platform filtering of a module. A node loses only the platforms the
 * predicate rejects; it disappears once no platform is left, and children
 * never keep a platform their parent lost.
 *
 * @module
 */

import {
  isContained,
  withContents,
  withPackages,
  isPackage,
  type ContainedDocumentable,
  type DModule,
  type PlatformFacts,
} from "../../model/documentable.js";
import { platformKey, type PlatformData } from "../../model/platform.js";
import type { DocumentableTransformer } from "../../extensions.js";
import type { DocumentationContext } from "../../plugability/context.js";
import type { PassConfiguration } from "../../../utils/validation.js";

export type PlatformPredicate = (
  node: ContainedDocumentable,
  platform: PlatformData,
  facts: PlatformFacts
) => boolean;

export function filterByPlatform(module: DModule, keep: PlatformPredicate): DModule {
  const visit = (node: ContainedDocumentable, allowed: ReadonlySet<string>): ContainedDocumentable | undefined => {
    const platforms = node.platforms.filter(
      (facts, platform) => allowed.has(platformKey(platform)) && keep(node, platform, facts)
    );
    if (platforms.size === 0) return undefined;

    const remaining = new Set(platforms.platforms().map(platformKey));
    const children = node.children.filter(isContained).flatMap((child) => {
      const kept = visit(child, remaining);
      return kept ? [kept] : [];
    });
    return withContents(node, platforms, children);
  };

  const all = new Set(module.platforms.platforms().map(platformKey));
  const packages = module.children.flatMap((pkg) => {
    const kept = visit(pkg, all);
    return kept && isPackage(kept) ? [kept] : [];
  });
  return withPackages(module, packages);
}

/**
 * Base class for transformers that drop declarations per platform
 */
export abstract class PlatformFilterTransformer implements DocumentableTransformer {
  abstract readonly name: string;

  protected abstract keep(
    node: ContainedDocumentable,
    platform: PlatformData,
    facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean;

  transform(module: DModule, context: DocumentationContext): DModule {
    return filterByPlatform(module, (node, platform, facts) =>
      this.keep(node, platform, facts, context.passFor(platform))
    );
  }
}
