/**
 * Extension Registry
 *
 * Process-wide store of extension-point implementations. Plugins register
 * into it during initialization; `freeze()` then fixes the contents and every
 * later read is side-effect free, so the parallel translation stage can read
 * it concurrently.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import type {
  ExtensionPoint,
  ExtensionRegistration,
  RegistrationOrder,
} from "./extension-point.js";
import { orderTopologically } from "./ordering.js";

const logger = createLogger("extension-registry");

export interface RegistrationOptions {
  /** Unique name of the registration within its point */
  name?: string;
  /** Plugin contributing the implementation */
  plugin?: string;
  order?: RegistrationOrder;
  /** Registrations (by name) this one replaces */
  overrides?: readonly string[];
}

export interface ExtensionPointSummary {
  id: string;
  cardinality: string;
  implementations: string[];
}

/**
 * @example
 * ```typescript
 * const registry = new ExtensionRegistry();
 * registry.register(CoreExtensions.renderer, new JsonRenderer(outDir), { plugin: "json" });
 * registry.freeze();
 *
 * const renderer = registry.resolveSingle(CoreExtensions.renderer);
 * ```
 */
export class ExtensionRegistry {
  private readonly points = new Map<string, ExtensionPoint<unknown>>();
  private sequence = 0;
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Register an implementation for a point.
   *
   * @throws ConfigurationError after `freeze()`, or for a duplicate name
   */
  register<T>(point: ExtensionPoint<T>, implementation: T, options: RegistrationOptions = {}): void {
    if (this.frozen) {
      throw new ConfigurationError(
        `Cannot register into ${point.id}: the extension registry is read-only after plugin initialization`,
        ErrorCode.REGISTRY_FROZEN,
        { point: point.id }
      );
    }

    const known = this.points.get(point.id);
    if (known && known !== point) {
      throw new ConfigurationError(
        `Two different extension points share the id "${point.id}"`,
        ErrorCode.EXTENSION_DUPLICATE,
        { point: point.id }
      );
    }

    const slot = this.slotOf(point);
    const plugin = options.plugin ?? "anonymous";
    const name = options.name ?? `${plugin}/${point.id}#${slot.length}`;
    if (slot.some((registration) => registration.name === name)) {
      throw new ConfigurationError(
        `Extension "${name}" is registered twice for ${point.id}`,
        ErrorCode.EXTENSION_DUPLICATE,
        { point: point.id, name }
      );
    }

    slot.push({
      name,
      plugin,
      implementation,
      order: options.order ?? {},
      overrides: options.overrides ?? [],
      sequence: this.sequence++,
    });
    this.points.set(point.id, point);
    logger.debug({ point: point.id, name, plugin }, "Registered extension");
  }

  /**
   * Fix the registry contents: apply overrides and before/after ordering to
   * every point, then reject further registrations.
   *
   * @throws ConfigurationError when ordering constraints form a cycle
   */
  freeze(): void {
    if (this.frozen) return;
    for (const point of this.points.values()) {
      const effective = this.effectiveRegistrations(point);
      point.slots.set(this, effective);
    }
    this.frozen = true;
  }

  /**
   * Resolve the one implementation of a single-valued point.
   *
   * @throws ConfigurationError when zero or several implementations are registered
   */
  resolveSingle<T>(point: ExtensionPoint<T, "single">): T {
    const registrations = this.registrations(point);
    const [only] = registrations;
    if (registrations.length === 1 && only) {
      return only.implementation;
    }
    if (registrations.length === 0) {
      throw new ConfigurationError(
        `No implementation registered for extension point ${point.id}`,
        ErrorCode.EXTENSION_NOT_REGISTERED,
        { point: point.id }
      );
    }
    const names = registrations.map((registration) => registration.name);
    throw new ConfigurationError(
      `Expected exactly one implementation for ${point.id}, found ${registrations.length}: ${names.join(", ")}`,
      ErrorCode.EXTENSION_AMBIGUOUS,
      { point: point.id, implementations: names }
    );
  }

  /**
   * All implementations of a multi-valued point, in effective order
   */
  resolveAll<T>(point: ExtensionPoint<T, "multi">): readonly T[] {
    return this.registrations(point).map((registration) => registration.implementation);
  }

  /**
   * Effective registrations of any point (overrides applied, ordered)
   */
  registrations<T>(point: ExtensionPoint<T>): readonly ExtensionRegistration<T>[] {
    if (this.frozen) {
      return point.slots.get(this) ?? [];
    }
    return this.effectiveRegistrations(point);
  }

  /**
   * Overview of every point that received registrations
   */
  describe(): ExtensionPointSummary[] {
    return [...this.points.values()].map((point) => ({
      id: point.id,
      cardinality: point.cardinality,
      implementations: this.registrations(point).map((registration) => registration.name),
    }));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private slotOf<T>(point: ExtensionPoint<T>): ExtensionRegistration<T>[] {
    let slot = point.slots.get(this);
    if (!slot) {
      slot = [];
      point.slots.set(this, slot);
    }
    return slot;
  }

  private effectiveRegistrations<T>(point: ExtensionPoint<T>): ExtensionRegistration<T>[] {
    const slot = point.slots.get(this) ?? [];
    const overridden = new Set(slot.flatMap((registration) => registration.overrides));
    const remaining = slot.filter((registration) => !overridden.has(registration.name));
    return orderTopologically(
      remaining,
      (registration) => registration.name,
      (registration) => registration.order,
      `extensions of ${point.id}`
    );
  }
}
