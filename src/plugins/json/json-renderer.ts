/**
 * JSON Renderer
 *
 * Writes the page tree into the output directory:
 * - `pages.json`: the whole tree, content pages pointing at their files
 * - `pages/<page>.json`: one file per content page
 * - renderer-specific pages at their own paths
 *
 * @module
 */

import * as path from "node:path";
import type { Renderer } from "../../core/extensions.js";
import { ErrorCode, RenderError, getErrorMessage } from "../../core/errors.js";
import { describePlatform } from "../../core/model/platform.js";
import type { AnyPage, ContentNode, ContentPage, RootPageNode } from "../../core/pages/page-node.js";
import { copyFile, writeFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("json-renderer");

export const PAGES_FILE = "pages.json";
export const PAGES_DIR = "pages";

// =============================================================================
// Serialization
// =============================================================================

export type SerializedContent =
  | { type: "text"; text: string; platforms: string[] }
  | { type: "code"; code: string; platforms: string[] }
  | { type: "header"; level: number; text: string; platforms: string[] }
  | { type: "link"; text: string; target: string; external: boolean; platforms: string[] }
  | { type: "group"; kind: string; platforms: string[]; children: SerializedContent[] };

export interface SerializedPage {
  kind: AnyPage["kind"];
  name: string;
  dri?: string[];
  documentableKind?: string;
  /** Content page file, relative to the output directory */
  file?: string;
  /** Output path of a renderer-specific page */
  path?: string;
  content?: SerializedContent;
  children: SerializedPage[];
}

export function serializeContent(node: ContentNode): SerializedContent {
  const platforms = node.platforms.map(describePlatform);
  switch (node.type) {
    case "text":
      return { type: "text", text: node.text, platforms };
    case "code":
      return { type: "code", code: node.code, platforms };
    case "header":
      return { type: "header", level: node.level, text: node.text, platforms };
    case "link":
      return { type: "link", text: node.text, target: node.target, external: node.external, platforms };
    case "group":
      return { type: "group", kind: node.kind, platforms, children: node.children.map(serializeContent) };
  }
}

/**
 * File name of a content page, derived from its first DRI
 */
export function pageFileName(page: ContentPage): string {
  const key = page.dri[0] ?? page.name;
  const slug = key.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
  return `${slug || "page"}.json`;
}

// =============================================================================
// Renderer
// =============================================================================

export class JsonRenderer implements Renderer {
  constructor(private readonly outputDir: string) {}

  async render(root: RootPageNode): Promise<void> {
    const contentFiles = new Map<ContentPage, string>();
    const used = new Set<string>();
    const assign = (page: AnyPage): void => {
      if (page.kind === "content") {
        const base = pageFileName(page);
        let file = path.posix.join(PAGES_DIR, base);
        for (let n = 2; used.has(file); n++) {
          file = path.posix.join(PAGES_DIR, base.replace(/\.json$/, `-${n}.json`));
        }
        used.add(file);
        contentFiles.set(page, file);
      }
      page.children.forEach(assign);
    };
    assign(root);

    const serialize = (page: AnyPage): SerializedPage => {
      const children = page.children.map(serialize);
      switch (page.kind) {
        case "root":
          return { kind: page.kind, name: page.name, dri: [...page.dri], content: serializeContent(page.content), children };
        case "content":
          return {
            kind: page.kind,
            name: page.name,
            dri: [...page.dri],
            documentableKind: page.documentableKind,
            file: contentFiles.get(page),
            children,
          };
        case "multiModule":
        case "grouped":
          return { kind: page.kind, name: page.name, content: serializeContent(page.content), children };
        case "rendererSpecific":
          return { kind: page.kind, name: page.name, path: page.strategy.path, children };
      }
    };

    await this.write(PAGES_FILE, JSON.stringify(serialize(root), null, 2));

    for (const [page, file] of contentFiles) {
      const document = {
        name: page.name,
        dri: page.dri,
        documentableKind: page.documentableKind,
        content: serializeContent(page.content),
      };
      await this.write(file, JSON.stringify(document, null, 2));
    }

    await this.renderSpecificPages(root);
    logger.info({ outputDir: this.outputDir, pages: contentFiles.size }, "Rendered JSON output");
  }

  private async renderSpecificPages(page: AnyPage): Promise<void> {
    if (page.kind === "rendererSpecific") {
      const { strategy } = page;
      if (strategy.type === "write") {
        await this.write(strategy.path, strategy.text);
      } else {
        const target = this.resolve(strategy.path);
        try {
          await copyFile(strategy.from, target);
        } catch (error) {
          throw new RenderError(`Cannot copy ${strategy.from}: ${getErrorMessage(error)}`, ErrorCode.RENDER_FAILED, {
            outputPath: target,
          });
        }
      }
    }
    for (const child of page.children) {
      await this.renderSpecificPages(child);
    }
  }

  private async write(relativePath: string, text: string): Promise<void> {
    const target = this.resolve(relativePath);
    try {
      await writeFile(target, text);
    } catch (error) {
      throw new RenderError(`Cannot write ${target}: ${getErrorMessage(error)}`, ErrorCode.RENDER_FAILED, {
        outputPath: target,
      });
    }
  }

  /**
   * @throws RenderError for paths leaving the output directory
   */
  private resolve(relativePath: string): string {
    const root = path.resolve(this.outputDir);
    const target = path.resolve(root, relativePath);
    if (target !== root && !target.startsWith(`${root}${path.sep}`)) {
      throw new RenderError(`Output path ${relativePath} is outside ${this.outputDir}`, ErrorCode.RENDER_FAILED, {
        outputPath: relativePath,
      });
    }
    return target;
  }
}
