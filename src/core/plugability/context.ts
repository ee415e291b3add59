/**
 * Documentation Context
 *
 * Everything a stage may read: configuration, logger, the per-platform
 * analysis contexts and the frozen extension registry.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";
import type { IDocumentationLogger } from "../interfaces/IDocumentationLogger.js";
import type { IAnalysisEnvironment } from "../interfaces/IAnalysisEnvironment.js";
import type { IPlugin, PluginRegistrar } from "../interfaces/IPlugin.js";
import type { DiagnosticCollector } from "../analysis/diagnostic-collector.js";
import { describePlatform, type PlatformData, type PlatformMap } from "../model/platform.js";
import type { DocumentationConfiguration, PassConfiguration } from "../../utils/validation.js";
import type { ExtensionPoint } from "./extension-point.js";
import { orderTopologically } from "./ordering.js";
import { ExtensionRegistry } from "./registry.js";

/**
 * One platform pass after analysis setup. Pure data holder.
 */
export interface PlatformContext {
  readonly platform: PlatformData;
  readonly pass: PassConfiguration;
  readonly environment: IAnalysisEnvironment;
  readonly collector: DiagnosticCollector;
}

export class DocumentationContext {
  constructor(
    readonly configuration: DocumentationConfiguration,
    readonly logger: IDocumentationLogger,
    readonly platforms: PlatformMap<PlatformContext>,
    readonly registry: ExtensionRegistry
  ) {}

  single<T>(point: ExtensionPoint<T, "single">): T {
    return this.registry.resolveSingle(point);
  }

  all<T>(point: ExtensionPoint<T, "multi">): readonly T[] {
    return this.registry.resolveAll(point);
  }

  platformContext(platform: PlatformData): PlatformContext {
    const context = this.platforms.get(platform);
    if (!context) {
      throw new ConfigurationError(
        `Unknown platform ${describePlatform(platform)}`,
        ErrorCode.CONFIGURATION_INVALID,
        { platform: describePlatform(platform) }
      );
    }
    return context;
  }

  passFor(platform: PlatformData): PassConfiguration {
    return this.platformContext(platform).pass;
  }
}

/**
 * Initialize plugins in dependency order into a fresh registry and freeze it.
 *
 * @throws ConfigurationError for duplicate plugin names or ordering cycles
 */
export function createDocumentationContext(
  configuration: DocumentationConfiguration,
  logger: IDocumentationLogger,
  platforms: PlatformMap<PlatformContext>,
  plugins: readonly IPlugin[]
): DocumentationContext {
  const seen = new Set<string>();
  for (const plugin of plugins) {
    if (seen.has(plugin.name)) {
      throw new ConfigurationError(`Plugin "${plugin.name}" is loaded twice`, ErrorCode.PLUGIN_DUPLICATE, {
        plugin: plugin.name,
      });
    }
    seen.add(plugin.name);
  }

  const ordered = orderTopologically(
    plugins,
    (plugin) => plugin.name,
    (plugin) => ({ before: plugin.before, after: plugin.after }),
    "plugins"
  );

  const registry = new ExtensionRegistry();
  for (const plugin of ordered) {
    const registrar: PluginRegistrar = {
      register: (point, implementation, options = {}) =>
        registry.register(point, implementation, { ...options, plugin: plugin.name }),
    };
    plugin.install(registrar, { configuration, logger });
    logger.debug(`Initialized plugin ${plugin.name}`);
  }
  registry.freeze();

  return new DocumentationContext(configuration, logger, platforms, registry);
}
