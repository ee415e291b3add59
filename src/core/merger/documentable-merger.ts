/**
 * Default Documentable Merger
 *
 * Walks all per-platform trees in lock step by identity key:
 * - a key seen in one input is adopted unchanged (it is already tagged with
 *   its platform by the translator)
 * - a key seen in several inputs becomes one node whose platform facts are
 *   the union of the inputs' facts and whose children are merged recursively
 *
 * Conflicting facts are never reconciled: each platform keeps its own. For
 * two inputs carrying the same platform, the earlier input wins. Children
 * follow first-occurrence order across the input sequence.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";
import type { DocumentableMerger } from "../extensions.js";
import {
  identityKey,
  isContained,
  withContents,
  type ContainedDocumentable,
  type DModule,
  type PlatformFacts,
} from "../model/documentable.js";
import { PlatformMap } from "../model/platform.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("documentable-merger");

function unionFacts(nodes: readonly { platforms: PlatformMap<PlatformFacts> }[]): PlatformMap<PlatformFacts> {
  return nodes.reduce((acc, node) => acc.union(node.platforms), PlatformMap.empty<PlatformFacts>());
}

/**
 * Merge nodes sharing one identity key, in input order
 */
function mergeNodes<T extends ContainedDocumentable>(nodes: readonly T[]): T | undefined {
  const [first, ...rest] = nodes;
  if (!first || rest.length === 0) return first;
  return withContents(
    first,
    unionFacts(nodes),
    mergeChildren(nodes.map((node) => node.children.filter(isContained)))
  );
}

/**
 * Partition children of every input by identity key and merge each partition
 */
export function mergeChildren<T extends ContainedDocumentable>(lists: readonly (readonly T[])[]): T[] {
  const partitions = new Map<string, T[]>();
  for (const list of lists) {
    for (const child of list) {
      const key = identityKey(child);
      const partition = partitions.get(key);
      if (partition) {
        partition.push(child);
      } else {
        partitions.set(key, [child]);
      }
    }
  }
  return [...partitions.values()].flatMap((partition) => {
    const merged = mergeNodes(partition);
    return merged ? [merged] : [];
  });
}

export class DefaultDocumentableMerger implements DocumentableMerger {
  /**
   * @throws ConfigurationError for an empty input sequence
   */
  merge(modules: readonly DModule[]): DModule {
    const [first] = modules;
    if (!first) {
      throw new ConfigurationError(
        "Cannot merge documentation models: no platform produced a module",
        ErrorCode.CONFIGURATION_NO_PLATFORMS
      );
    }

    const name = modules.find((module) => module.name.length > 0)?.name ?? first.name;
    const documentation = modules.find((module) => module.documentation)?.documentation;

    const merged: DModule = {
      ...first,
      name,
      documentation,
      platforms: unionFacts(modules),
      children: mergeChildren(modules.map((module) => module.children)),
    };

    logger.debug(
      { inputs: modules.length, packages: merged.children.length, platforms: merged.platforms.size },
      "Merged documentation models"
    );
    return merged;
  }
}
