/**
 * Platform identity
 *
 * A PlatformData names one analysis target (one configured pass). It is a
 * value type: two instances with the same name, kind and set of targets are
 * the same platform. PlatformMap is the mapping keyed by that structural identity.
 *
 * @module
 */

export const PLATFORM_KINDS = ["jvm", "js", "native", "common"] as const;

export type PlatformKind = (typeof PLATFORM_KINDS)[number];

export interface PlatformData {
  readonly name: string;
  readonly platform: PlatformKind;
  readonly targets: readonly string[];
}

/**
 * Targets are a set: duplicates are dropped and the order is normalized.
 */
export function createPlatformData(
  name: string,
  platform: PlatformKind,
  targets: readonly string[] = []
): PlatformData {
  return Object.freeze({ name, platform, targets: Object.freeze([...new Set(targets)].sort()) });
}

/**
 * Structural key of a platform, stable across instances
 */
export function platformKey(platform: PlatformData): string {
  return JSON.stringify([platform.name, platform.platform, platform.targets]);
}

export function samePlatform(a: PlatformData, b: PlatformData): boolean {
  return platformKey(a) === platformKey(b);
}

export function describePlatform(platform: PlatformData): string {
  const targets = platform.targets.length > 0 ? ` [${platform.targets.join(", ")}]` : "";
  return `${platform.name}/${platform.platform}${targets}`;
}

// =============================================================================
// PlatformMap
// =============================================================================

/**
 * Immutable, insertion-ordered map from PlatformData to V.
 * Every "modifying" operation returns a new map.
 */
export class PlatformMap<V> implements Iterable<readonly [PlatformData, V]> {
  private readonly byKey: ReadonlyMap<string, readonly [PlatformData, V]>;

  private constructor(byKey: ReadonlyMap<string, readonly [PlatformData, V]>) {
    this.byKey = byKey;
  }

  static empty<V>(): PlatformMap<V> {
    return new PlatformMap<V>(new Map());
  }

  static of<V>(platform: PlatformData, value: V): PlatformMap<V> {
    return new PlatformMap<V>(new Map([[platformKey(platform), [platform, value] as const]]));
  }

  /**
   * Builds a map from entries. When a platform occurs twice the first entry wins.
   */
  static from<V>(entries: Iterable<readonly [PlatformData, V]>): PlatformMap<V> {
    const byKey = new Map<string, readonly [PlatformData, V]>();
    for (const [platform, value] of entries) {
      const key = platformKey(platform);
      if (!byKey.has(key)) {
        byKey.set(key, [platform, value]);
      }
    }
    return new PlatformMap(byKey);
  }

  get size(): number {
    return this.byKey.size;
  }

  get(platform: PlatformData): V | undefined {
    return this.byKey.get(platformKey(platform))?.[1];
  }

  has(platform: PlatformData): boolean {
    return this.byKey.has(platformKey(platform));
  }

  /**
   * Returns a map with `platform` bound to `value`, replacing any previous binding
   * in place (insertion order is kept).
   */
  with(platform: PlatformData, value: V): PlatformMap<V> {
    const byKey = new Map(this.byKey);
    byKey.set(platformKey(platform), [platform, value]);
    return new PlatformMap(byKey);
  }

  /**
   * Union of both maps. Entries of `this` win over entries of `other` for the
   * same platform; new platforms of `other` are appended in their order.
   */
  union(other: PlatformMap<V>): PlatformMap<V> {
    return PlatformMap.from([...this.entries(), ...other.entries()]);
  }

  map<U>(fn: (value: V, platform: PlatformData) => U): PlatformMap<U> {
    return PlatformMap.from(this.entries().map(([platform, value]) => [platform, fn(value, platform)] as const));
  }

  filter(predicate: (value: V, platform: PlatformData) => boolean): PlatformMap<V> {
    return PlatformMap.from(this.entries().filter(([platform, value]) => predicate(value, platform)));
  }

  platforms(): PlatformData[] {
    return [...this.byKey.values()].map(([platform]) => platform);
  }

  values(): V[] {
    return [...this.byKey.values()].map(([, value]) => value);
  }

  entries(): Array<readonly [PlatformData, V]> {
    return [...this.byKey.values()];
  }

  [Symbol.iterator](): Iterator<readonly [PlatformData, V]> {
    return this.byKey.values();
  }

  toJSON(): Record<string, V> {
    const result: Record<string, V> = {};
    for (const [platform, value] of this.byKey.values()) {
      result[describePlatform(platform)] = value;
    }
    return result;
  }
}
