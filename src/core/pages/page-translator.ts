/**
 * Default Page Translator
 *
 * One content page per package and per classlike, nested like the model.
 * Functions, properties and other members are rendered on their owner's page.
 * A declaration merged from several platforms stays one page; its per-platform
 * facts become `platformVariant` groups inside a `platformTabs` group.
 *
 * @module
 */

import type { PageTranslator } from "../extensions.js";
import {
  identityKey,
  isClasslike,
  isMember,
  type DClasslike,
  type DModule,
  type DPackage,
  type Documentable,
} from "../model/documentable.js";
import { describePlatform } from "../model/platform.js";
import { SOURCE_URL_EXTRA } from "../transformers/documentables/source-links.js";
import { SAMPLES_EXTRA } from "../translators/symbols.js";
import {
  code,
  group,
  header,
  link,
  text,
  type ContentGroup,
  type ContentNode,
  type ContentPage,
  type RootPageNode,
} from "./page-node.js";

export const ROOT_PACKAGE_PAGE_NAME = "[root]";

function availability(node: Documentable): ContentNode {
  return text(`Available on: ${node.platforms.platforms().map(describePlatform).join(", ")}`);
}

/**
 * One variant per platform carrying that platform's signature, documentation,
 * deprecation and source link
 */
export function platformVariants(node: Documentable): ContentGroup {
  const variants = node.platforms.entries().map(([platform, facts]) => {
    const children: ContentNode[] = [];
    if (facts.signature) children.push(code(`${node.name}${facts.signature}`, [platform]));
    if (facts.documentation) children.push(text(facts.documentation, [platform]));
    for (const sample of facts.extras[SAMPLES_EXTRA] ?? []) {
      children.push(code(sample, [platform]));
    }
    if (facts.deprecated) children.push(text("Deprecated", [platform]));
    for (const url of facts.extras[SOURCE_URL_EXTRA] ?? []) {
      children.push(link("Source", url, { external: true, platforms: [platform] }));
    }
    return group("platformVariant", children, [platform]);
  });
  return group("platformTabs", variants, node.platforms.platforms());
}

function membersTable(title: string, nodes: readonly Documentable[]): ContentNode[] {
  if (nodes.length === 0) return [];
  const rows = nodes.map((node) =>
    group("row", [link(node.name, identityKey(node)), platformVariants(node)], node.platforms.platforms())
  );
  return [header(2, title), group("table", rows)];
}

function linksTable(title: string, nodes: readonly Documentable[]): ContentNode[] {
  if (nodes.length === 0) return [];
  const rows = nodes.map((node) => group("row", [link(node.name, identityKey(node))], node.platforms.platforms()));
  return [header(2, title), group("table", rows)];
}

export class DefaultPageTranslator implements PageTranslator {
  translate(module: DModule): RootPageNode {
    const content: ContentNode[] = [header(1, module.name), availability(module)];
    if (module.documentation) content.push(text(module.documentation));
    content.push(...linksTable("Packages", module.children));

    return {
      kind: "root",
      name: module.name,
      dri: [identityKey(module)],
      content: group("section", content),
      children: module.children.map((pkg) => this.packagePage(pkg)),
    };
  }

  private packagePage(pkg: DPackage): ContentPage {
    const classlikes = pkg.children.filter(isClasslike);
    const members = pkg.children.filter(isMember);
    const name = pkg.name || ROOT_PACKAGE_PAGE_NAME;

    return {
      kind: "content",
      name,
      dri: [identityKey(pkg)],
      documentableKind: "package",
      content: group("section", [
        header(1, name),
        availability(pkg),
        platformVariants(pkg),
        ...linksTable("Types", classlikes),
        ...membersTable("Functions and properties", members),
      ]),
      children: classlikes.map((classlike) => this.classlikePage(classlike)),
    };
  }

  private classlikePage(classlike: DClasslike): ContentPage {
    const nested = classlike.children.filter(isClasslike);
    const members = classlike.children.filter(isMember);

    return {
      kind: "content",
      name: classlike.name,
      dri: [identityKey(classlike)],
      documentableKind: classlike.kind,
      content: group("section", [
        header(1, classlike.name),
        text(classlike.kind),
        availability(classlike),
        platformVariants(classlike),
        ...linksTable("Nested types", nested),
        ...membersTable("Members", members),
      ]),
      children: nested.map((child) => this.classlikePage(child)),
    };
  }
}
