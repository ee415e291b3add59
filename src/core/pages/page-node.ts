/**
 * Page Model
 *
 * The output-oriented tree handed to renderers. Pages own their children and
 * their content; content nodes can be tagged with the platforms they apply to,
 * which is how one page shows several platform views of one declaration.
 *
 * @module
 */

import type { PlatformData } from "../model/platform.js";
import type { DocumentableKind } from "../model/documentable.js";

// =============================================================================
// Content
// =============================================================================

export type ContentGroupKind =
  | "section"
  | "platformTabs"
  | "platformVariant"
  | "breadcrumbs"
  | "list"
  | "table"
  | "row"
  | "index";

interface ContentBase {
  /** Platforms this block applies to; empty means every platform of the page */
  readonly platforms: readonly PlatformData[];
}

export interface ContentText extends ContentBase {
  readonly type: "text";
  readonly text: string;
}

export interface ContentHeader extends ContentBase {
  readonly type: "header";
  readonly level: number;
  readonly text: string;
}

export interface ContentCode extends ContentBase {
  readonly type: "code";
  readonly code: string;
}

export interface ContentLink extends ContentBase {
  readonly type: "link";
  readonly text: string;
  /** Identity key of a documentable, or a URL when `external` */
  readonly target: string;
  readonly external: boolean;
}

export interface ContentGroup extends ContentBase {
  readonly type: "group";
  readonly kind: ContentGroupKind;
  readonly children: readonly ContentNode[];
}

export type ContentNode = ContentText | ContentHeader | ContentCode | ContentLink | ContentGroup;

export function text(value: string, platforms: readonly PlatformData[] = []): ContentText {
  return { type: "text", text: value, platforms };
}

export function header(level: number, value: string, platforms: readonly PlatformData[] = []): ContentHeader {
  return { type: "header", level, text: value, platforms };
}

export function code(value: string, platforms: readonly PlatformData[] = []): ContentCode {
  return { type: "code", code: value, platforms };
}

export function link(
  value: string,
  target: string,
  options: { external?: boolean; platforms?: readonly PlatformData[] } = {}
): ContentLink {
  return {
    type: "link",
    text: value,
    target,
    external: options.external ?? false,
    platforms: options.platforms ?? [],
  };
}

export function group(
  kind: ContentGroupKind,
  children: readonly ContentNode[],
  platforms: readonly PlatformData[] = []
): ContentGroup {
  return { type: "group", kind, children, platforms };
}

// =============================================================================
// Pages
// =============================================================================

interface PageBase {
  readonly name: string;
  readonly children: readonly PageNode[];
}

/**
 * A page describing one or more documentables
 */
export interface ContentPage extends PageBase {
  readonly kind: "content";
  /** Identity keys of the documentables shown on the page */
  readonly dri: readonly string[];
  readonly documentableKind: DocumentableKind;
  readonly content: ContentGroup;
}

export type RenderingStrategy =
  | { readonly type: "write"; readonly path: string; readonly text: string }
  | { readonly type: "copy"; readonly from: string; readonly path: string };

/**
 * A page whose output the renderer produces verbatim (assets, data files)
 */
export interface RendererSpecificPage extends PageBase {
  readonly kind: "rendererSpecific";
  readonly strategy: RenderingStrategy;
}

/**
 * A page listing several modules
 */
export interface MultiModulePage extends PageBase {
  readonly kind: "multiModule";
  readonly content: ContentGroup;
}

/**
 * A page grouping entries of other pages (indices, overviews)
 */
export interface GroupedPage extends PageBase {
  readonly kind: "grouped";
  readonly content: ContentGroup;
}

export type PageNode = ContentPage | RendererSpecificPage | MultiModulePage | GroupedPage;

/**
 * The single root of a page tree
 */
export interface RootPageNode extends PageBase {
  readonly kind: "root";
  readonly dri: readonly string[];
  readonly content: ContentGroup;
}

export type AnyPage = RootPageNode | PageNode;

// =============================================================================
// Traversal
// =============================================================================

/**
 * Depth-first, pre-order walk over a page tree
 */
export function walkPages(
  page: AnyPage,
  visit: (page: AnyPage, ancestors: readonly AnyPage[]) => void,
  ancestors: readonly AnyPage[] = []
): void {
  visit(page, ancestors);
  const path = [...ancestors, page];
  for (const child of page.children) {
    walkPages(child, visit, path);
  }
}

/**
 * Rebuilds every page below the root bottom-up with `fn`
 */
export function transformPageTree(
  root: RootPageNode,
  fn: (page: PageNode, ancestors: readonly AnyPage[]) => PageNode
): RootPageNode {
  const rebuild = (page: PageNode, ancestors: readonly AnyPage[]): PageNode => {
    const path = [...ancestors, page];
    const children = page.children.map((child) => rebuild(child, path));
    return fn({ ...page, children }, ancestors);
  };
  return { ...root, children: root.children.map((child) => rebuild(child, [root])) };
}
