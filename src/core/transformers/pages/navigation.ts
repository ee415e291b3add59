/**
 * Adds breadcrumbs to every content page and a `navigation.json` page that
 * mirrors the page hierarchy
 *
 * @module
 */

import type { PageTransformer } from "../../extensions.js";
import {
  group,
  link,
  text,
  transformPageTree,
  type AnyPage,
  type ContentNode,
  type PageNode,
  type RootPageNode,
} from "../../pages/page-node.js";

export const NAVIGATION_PAGE_NAME = "navigation";

export interface NavigationEntry {
  name: string;
  target: string | null;
  children: NavigationEntry[];
}

function targetOf(page: AnyPage): string | null {
  return "dri" in page ? (page.dri[0] ?? null) : null;
}

function breadcrumbs(ancestors: readonly AnyPage[], page: PageNode): ContentNode {
  const crumbs: ContentNode[] = ancestors.map((ancestor) => {
    const target = targetOf(ancestor);
    return target !== null ? link(ancestor.name, target) : text(ancestor.name);
  });
  crumbs.push(text(page.name));
  return group("breadcrumbs", crumbs);
}

export function navigationTree(page: AnyPage): NavigationEntry {
  return {
    name: page.name,
    target: targetOf(page),
    children: page.children.filter((child) => child.kind === "content").map(navigationTree),
  };
}

export class NavigationTransformer implements PageTransformer {
  readonly name = "navigation";

  transform(root: RootPageNode): RootPageNode {
    const withCrumbs = transformPageTree(root, (page, ancestors) => {
      if (page.kind !== "content") return page;
      return {
        ...page,
        content: { ...page.content, children: [breadcrumbs(ancestors, page), ...page.content.children] },
      };
    });

    const navigationPage: PageNode = {
      kind: "rendererSpecific",
      name: NAVIGATION_PAGE_NAME,
      strategy: {
        type: "write",
        path: "navigation.json",
        text: JSON.stringify(navigationTree(root), null, 2),
      },
      children: [],
    };
    return { ...withCrumbs, children: [...withCrumbs.children, navigationPage] };
  }
}

export function createNavigationTransformer(): NavigationTransformer {
  return new NavigationTransformer();
}
