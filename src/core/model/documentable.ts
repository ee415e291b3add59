/**
 * Documentation Model
 *
 * Documentables form the documentation tree: Module → Package → declarations.
 * Every node carries its platform-specific facts in a PlatformMap, so merging
 * platforms is a map union rather than a type-hierarchy reconciliation.
 *
 * Trees are immutable. Stages never edit a node in place; they build new nodes
 * (see `withContents`) and hand the new tree forward.
 *
 * @module
 */

import { PlatformMap, type PlatformData } from "./platform.js";

// =============================================================================
// Identity
// =============================================================================

/**
 * Documentation Resource Identifier: fully-qualified path plus a signature
 * discriminator for overloaded callables.
 */
export interface DRI {
  readonly packageName: string;
  /** Dot-separated chain of enclosing classlikes, including the node itself for classlikes */
  readonly classNames?: string;
  /** Callable name and signature discriminator for functions and properties */
  readonly callable?: string;
}

export function driToString(dri: DRI): string {
  return `${dri.packageName}/${dri.classNames ?? ""}/${dri.callable ?? ""}`;
}

export function identityKey(documentable: Documentable): string {
  return driToString(documentable.dri);
}

// =============================================================================
// Platform facts
// =============================================================================

export type Visibility = "public" | "protected" | "internal" | "private";

export interface SourceLocation {
  readonly path: string;
  readonly line?: number;
  readonly column?: number;
}

/**
 * Everything one platform knows about a declaration
 */
export interface PlatformFacts {
  readonly documentation?: string;
  readonly visibility: Visibility;
  readonly signature?: string;
  readonly location?: SourceLocation;
  readonly annotations: readonly string[];
  readonly deprecated: boolean;
  /** Free-form facts added by transformers (source URLs, markers, ...) */
  readonly extras: Readonly<Record<string, readonly string[]>>;
}

export function createFacts(facts: Partial<PlatformFacts> = {}): PlatformFacts {
  return {
    visibility: "public",
    annotations: [],
    deprecated: false,
    extras: {},
    ...facts,
  };
}

/**
 * Appends values to one extras entry, returning new facts
 */
export function withExtra(facts: PlatformFacts, key: string, ...values: string[]): PlatformFacts {
  const current = facts.extras[key] ?? [];
  return { ...facts, extras: { ...facts.extras, [key]: [...current, ...values] } };
}

// =============================================================================
// Nodes
// =============================================================================

export type ClasslikeKind = "class" | "interface" | "object" | "enum";
export type MemberKind = "function" | "constructor" | "property" | "typeAlias" | "enumEntry";
export type DocumentableKind = "module" | "package" | ClasslikeKind | MemberKind;

interface DocumentableBase {
  readonly kind: DocumentableKind;
  readonly name: string;
  readonly dri: DRI;
  readonly platforms: PlatformMap<PlatformFacts>;
  readonly children: readonly Documentable[];
  /** Lookup-only back reference to the owning node */
  readonly parent?: DRI;
}

export interface DModule extends DocumentableBase {
  readonly kind: "module";
  readonly children: readonly DPackage[];
  readonly documentation?: string;
}

export interface DPackage extends DocumentableBase {
  readonly kind: "package";
}

export interface DClasslike extends DocumentableBase {
  readonly kind: ClasslikeKind;
}

export interface DMember extends DocumentableBase {
  readonly kind: MemberKind;
}

export type Documentable = DModule | DPackage | DClasslike | DMember;

/** Any node that may appear below a module */
export type ContainedDocumentable = Exclude<Documentable, DModule>;

const CLASSLIKE_KINDS: ReadonlySet<DocumentableKind> = new Set(["class", "interface", "object", "enum"]);

export function isPackage(documentable: Documentable): documentable is DPackage {
  return documentable.kind === "package";
}

export function isClasslike(documentable: Documentable): documentable is DClasslike {
  return CLASSLIKE_KINDS.has(documentable.kind);
}

export function isMember(documentable: Documentable): documentable is DMember {
  return documentable.kind !== "module" && documentable.kind !== "package" && !isClasslike(documentable);
}

export function isContained(documentable: Documentable): documentable is ContainedDocumentable {
  return documentable.kind !== "module";
}

// =============================================================================
// Construction helpers
// =============================================================================

export function createModule(
  name: string,
  platform: PlatformData,
  packages: readonly DPackage[],
  documentation?: string
): DModule {
  return {
    kind: "module",
    name,
    dri: { packageName: "" },
    platforms: PlatformMap.of(platform, createFacts({ documentation })),
    children: packages,
    documentation,
  };
}

export function createPackage(
  packageName: string,
  platform: PlatformData,
  children: readonly ContainedDocumentable[],
  documentation?: string
): DPackage {
  return {
    kind: "package",
    name: packageName,
    dri: { packageName },
    platforms: PlatformMap.of(platform, createFacts({ documentation })),
    children,
  };
}

/**
 * Returns a copy of `node` with new platform facts and children
 */
export function withContents<T extends ContainedDocumentable>(
  node: T,
  platforms: PlatformMap<PlatformFacts>,
  children: readonly ContainedDocumentable[]
): T {
  return { ...node, platforms, children };
}

export function withPackages(module: DModule, children: readonly DPackage[]): DModule {
  return { ...module, children };
}

// =============================================================================
// Traversal
// =============================================================================

/**
 * Depth-first, pre-order walk over a tree
 */
export function walkDocumentables(
  root: Documentable,
  visit: (node: Documentable, ancestors: readonly Documentable[]) => void,
  ancestors: readonly Documentable[] = []
): void {
  visit(root, ancestors);
  const path = [...ancestors, root];
  for (const child of root.children) {
    walkDocumentables(child, visit, path);
  }
}

/**
 * Rebuilds every node below the module bottom-up. `fn` receives a node whose
 * children were already rebuilt and returns the replacement, or undefined to
 * drop the node.
 */
export function rebuildModule(
  module: DModule,
  fn: (node: ContainedDocumentable) => ContainedDocumentable | undefined
): DModule {
  const rebuild = (node: ContainedDocumentable): ContainedDocumentable | undefined => {
    const children = node.children.filter(isContained).flatMap((child) => {
      const rebuilt = rebuild(child);
      return rebuilt ? [rebuilt] : [];
    });
    return fn(withContents(node, node.platforms, children));
  };
  const packages = module.children.flatMap((pkg) => {
    const rebuilt = rebuild(pkg);
    return rebuilt && isPackage(rebuilt) ? [rebuilt] : [];
  });
  return withPackages(module, packages);
}
