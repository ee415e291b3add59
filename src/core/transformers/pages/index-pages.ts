/**
 * Adds an alphabetical index of all content pages when the configuration
 * asks for index pages
 *
 * @module
 */

import type { PageTransformer } from "../../extensions.js";
import type { DocumentationContext } from "../../plugability/context.js";
import {
  group,
  header,
  link,
  walkPages,
  type ContentNode,
  type GroupedPage,
  type RootPageNode,
} from "../../pages/page-node.js";

export const INDEX_PAGE_NAME = "index";

interface IndexEntry {
  name: string;
  target: string;
}

function compareEntries(a: IndexEntry, b: IndexEntry): number {
  const byName = a.name.toLowerCase().localeCompare(b.name.toLowerCase(), "en");
  if (byName !== 0) return byName;
  return a.target < b.target ? -1 : a.target > b.target ? 1 : 0;
}

export function buildIndexPage(root: RootPageNode): GroupedPage {
  const entries: IndexEntry[] = [];
  walkPages(root, (page) => {
    if (page.kind !== "content") return;
    const [target] = page.dri;
    if (target !== undefined) entries.push({ name: page.name, target });
  });
  entries.sort(compareEntries);

  const sections = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const letter = entry.name.charAt(0).toUpperCase() || "#";
    const section = sections.get(letter) ?? [];
    section.push(entry);
    sections.set(letter, section);
  }

  const content: ContentNode[] = [header(1, "Index")];
  for (const [letter, section] of sections) {
    content.push(header(2, letter));
    content.push(group("list", section.map((entry) => link(entry.name, entry.target))));
  }

  return {
    kind: "grouped",
    name: INDEX_PAGE_NAME,
    content: group("index", content),
    children: [],
  };
}

export class IndexPagesTransformer implements PageTransformer {
  readonly name = "index-pages";

  transform(root: RootPageNode, context: DocumentationContext): RootPageNode {
    if (!context.configuration.generateIndexPages) return root;
    return { ...root, children: [...root.children, buildIndexPage(root)] };
  }
}

export function createIndexPagesTransformer(): IndexPagesTransformer {
  return new IndexPagesTransformer();
}
