/**
 * Stable topological ordering for plugins and registrations
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";

export interface OrderingConstraints {
  readonly before?: readonly string[];
  readonly after?: readonly string[];
}

/**
 * Orders `items` so that every before/after constraint holds. Among items
 * that are free to go next, the one that came first in the input goes first,
 * so without constraints the input order is returned unchanged. References to
 * unknown ids are ignored.
 *
 * @throws ConfigurationError when the constraints form a cycle
 */
export function orderTopologically<T>(
  items: readonly T[],
  idOf: (item: T) => string,
  constraintsOf: (item: T) => OrderingConstraints,
  subject: string
): T[] {
  const indexById = new Map<string, number>();
  items.forEach((item, index) => indexById.set(idOf(item), index));

  const successors: Array<Set<number>> = items.map(() => new Set<number>());
  const addEdge = (from: number | undefined, to: number | undefined): void => {
    if (from === undefined || to === undefined || from === to) return;
    successors[from]?.add(to);
  };

  items.forEach((item, index) => {
    const { before = [], after = [] } = constraintsOf(item);
    for (const id of after) addEdge(indexById.get(id), index);
    for (const id of before) addEdge(index, indexById.get(id));
  });

  const inDegree = items.map(() => 0);
  for (const targets of successors) {
    for (const target of targets) inDegree[target] = (inDegree[target] ?? 0) + 1;
  }

  const ordered: T[] = [];
  const done = new Set<number>();
  while (ordered.length < items.length) {
    const next = inDegree.findIndex((degree, index) => degree === 0 && !done.has(index));
    if (next < 0) {
      const cycle = items.filter((_, index) => !done.has(index)).map(idOf);
      throw new ConfigurationError(
        `Cyclic ordering between ${subject}: ${cycle.join(", ")}`,
        ErrorCode.PLUGIN_ORDER_CYCLE,
        { cycle }
      );
    }
    done.add(next);
    const item = items[next];
    if (item !== undefined) ordered.push(item);
    for (const target of successors[next] ?? []) {
      inDegree[target] = (inDegree[target] ?? 0) - 1;
    }
  }
  return ordered;
}
