/**
 * Mapping from analyzed symbols to documentables, shared by both translators
 *
 * @module
 */

import type { AnalyzedSymbol } from "../interfaces/IAnalysisEnvironment.js";
import {
  createFacts,
  type ContainedDocumentable,
  type DClasslike,
  type DMember,
  type DRI,
} from "../model/documentable.js";
import { PlatformMap, type PlatformData } from "../model/platform.js";

/** Extras key holding the code of a declaration's samples */
export const SAMPLES_EXTRA = "samples";

/**
 * Classlikes extend the class path. Other members are told apart by their
 * signature, or by their kind where they have none.
 */
function childDri(parent: DRI, symbol: AnalyzedSymbol): DRI {
  switch (symbol.kind) {
    case "class":
    case "interface":
    case "object":
    case "enum":
      return {
        packageName: parent.packageName,
        classNames: parent.classNames ? `${parent.classNames}.${symbol.name}` : symbol.name,
      };
    default:
      return {
        packageName: parent.packageName,
        classNames: parent.classNames,
        callable: symbol.signature ? `${symbol.name}${symbol.signature}` : `${symbol.name}#${symbol.kind}`,
      };
  }
}

/**
 * Translate one symbol (and its members) for a single platform
 */
export function symbolToDocumentable(
  symbol: AnalyzedSymbol,
  parent: DRI,
  platform: PlatformData
): ContainedDocumentable {
  const dri = childDri(parent, symbol);
  const platforms = PlatformMap.of(
    platform,
    createFacts({
      documentation: symbol.documentation,
      visibility: symbol.visibility,
      signature: symbol.signature,
      location: symbol.location,
      annotations: symbol.annotations,
      deprecated: symbol.deprecated,
      extras: symbol.samples && symbol.samples.length > 0 ? { [SAMPLES_EXTRA]: [...symbol.samples] } : {},
    })
  );
  const children = symbol.members.map((member) => symbolToDocumentable(member, dri, platform));

  switch (symbol.kind) {
    case "class":
    case "interface":
    case "object":
    case "enum": {
      const classlike: DClasslike = { kind: symbol.kind, name: symbol.name, dri, platforms, children, parent };
      return classlike;
    }
    default: {
      const member: DMember = { kind: symbol.kind, name: symbol.name, dri, platforms, children, parent };
      return member;
    }
  }
}

/**
 * Symbols with the same identity inside one package keep their first occurrence
 */
export function uniqueByIdentity(nodes: readonly ContainedDocumentable[]): ContainedDocumentable[] {
  const seen = new Set<string>();
  return nodes.filter((node) => {
    const key = `${node.dri.classNames ?? ""}/${node.dri.callable ?? ""}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
