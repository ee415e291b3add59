/**
 * IPlugin - Unit contributing implementations to extension points
 *
 * @module
 */

import type { ExtensionPoint, RegistrationOrder } from "../plugability/extension-point.js";
import type { DocumentationConfiguration } from "../../utils/validation.js";
import type { IDocumentationLogger } from "./IDocumentationLogger.js";

export interface PluginRegistrationOptions {
  name?: string;
  order?: RegistrationOrder;
  overrides?: readonly string[];
}

/**
 * Registry view handed to a plugin; registrations are attributed to it
 */
export interface PluginRegistrar {
  register<T>(point: ExtensionPoint<T>, implementation: T, options?: PluginRegistrationOptions): void;
}

export interface PluginSetup {
  configuration: DocumentationConfiguration;
  logger: IDocumentationLogger;
}

/**
 * @example
 * ```typescript
 * const markersPlugin: IPlugin = {
 *   name: "markers",
 *   after: ["base"],
 *   install(registrar) {
 *     registrar.register(CoreExtensions.documentableTransformer, new MarkerTransformer(), {
 *       name: "markers",
 *     });
 *   },
 * };
 * ```
 */
export interface IPlugin {
  /** Unique plugin name, referenced by other plugins' ordering */
  readonly name: string;
  /** Plugins that must be initialized before this one */
  readonly after?: readonly string[];
  /** Plugins that must be initialized after this one */
  readonly before?: readonly string[];
  install(registrar: PluginRegistrar, setup: PluginSetup): void;
}
