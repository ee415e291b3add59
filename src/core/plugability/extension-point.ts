/**
 * Extension points are typed tokens identified by a stable id. A token's type
 * parameter is the contract every implementation registered on it satisfies.
 *
 * @module
 */

export type Cardinality = "single" | "multi";

export interface RegistrationOrder {
  /** Names of registrations on the same point that must come after this one */
  readonly before?: readonly string[];
  /** Names of registrations on the same point that must come before this one */
  readonly after?: readonly string[];
}

export interface ExtensionRegistration<T> {
  readonly name: string;
  readonly plugin: string;
  readonly implementation: T;
  readonly order: RegistrationOrder;
  /** Names of registrations this one replaces */
  readonly overrides: readonly string[];
  /** Global registration counter, i.e. plugin initialization order */
  readonly sequence: number;
}

export class ExtensionPoint<T, C extends Cardinality = Cardinality> {
  /** Registrations per registry; read and written only by ExtensionRegistry */
  readonly slots = new WeakMap<object, ExtensionRegistration<T>[]>();

  constructor(
    readonly id: string,
    readonly cardinality: C,
    readonly description?: string
  ) {}

  toString(): string {
    return `${this.id} (${this.cardinality})`;
  }
}

export function singlePoint<T>(id: string, description?: string): ExtensionPoint<T, "single"> {
  return new ExtensionPoint<T, "single">(id, "single", description);
}

export function multiPoint<T>(id: string, description?: string): ExtensionPoint<T, "multi"> {
  return new ExtensionPoint<T, "multi">(id, "multi", description);
}
