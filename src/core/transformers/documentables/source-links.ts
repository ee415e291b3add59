/**
 * Attaches `sourceUrl` extras to declarations whose source lies under a
 * configured source link
 *
 * @module
 */

import * as path from "node:path";
import type { DocumentableTransformer } from "../../extensions.js";
import { isContained, rebuildModule, withContents, withExtra, type DModule, type PlatformFacts } from "../../model/documentable.js";
import type { DocumentationContext } from "../../plugability/context.js";
import type { SourceLink } from "../../../utils/validation.js";

export const SOURCE_URL_EXTRA = "sourceUrl";

/**
 * URL of `filePath` under the first matching link, or undefined
 */
export function resolveSourceUrl(
  filePath: string,
  line: number | undefined,
  links: readonly SourceLink[]
): string | undefined {
  const resolved = path.resolve(filePath);
  for (const link of links) {
    const root = path.resolve(link.path);
    if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) continue;
    const relative = path.relative(root, resolved).split(path.sep).join("/");
    const base = link.url.replace(/\/+$/, "");
    const url = relative ? `${base}/${relative}` : base;
    return line !== undefined && link.lineSuffix !== undefined ? `${url}${link.lineSuffix}${line}` : url;
  }
  return undefined;
}

export class SourceLinksTransformer implements DocumentableTransformer {
  readonly name = "source-links";

  transform(module: DModule, context: DocumentationContext): DModule {
    const anyLinks = module.platforms.platforms().some((platform) => context.passFor(platform).sourceLinks.length > 0);
    if (!anyLinks) return module;

    return rebuildModule(module, (node) => {
      const platforms = node.platforms.map((facts: PlatformFacts, platform) => {
        if (!facts.location) return facts;
        const url = resolveSourceUrl(facts.location.path, facts.location.line, context.passFor(platform).sourceLinks);
        return url ? withExtra(facts, SOURCE_URL_EXTRA, url) : facts;
      });
      return withContents(node, platforms, node.children.filter(isContained));
    });
  }
}

export function createSourceLinksTransformer(): SourceLinksTransformer {
  return new SourceLinksTransformer();
}
