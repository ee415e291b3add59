/**
 * Documentation Generator
 *
 * Drives the pipeline: Setup → Plugins → Translate (parallel) → Merge →
 * Transform model → Pages → Transform pages → Render.
 *
 * Every stage consumes the previous stage's output and produces a new value.
 * A run either completes every stage or aborts at the first fatal error;
 * analysis diagnostics never abort it and are returned in the report.
 *
 * @module
 */

import { CoreExtensions } from "./extensions.js";
import {
  AnalysisError,
  ConfigurationError,
  ErrorCode,
  StageFailure,
  getErrorMessage,
  type PolydocError,
  isPolydocError,
  toStageFailure,
} from "./errors.js";
import { DiagnosticCollector, type AnalysisDiagnostic } from "./analysis/diagnostic-collector.js";
import type { IAnalysisEnvironmentFactory } from "./interfaces/IAnalysisEnvironment.js";
import type { IDocumentationLogger } from "./interfaces/IDocumentationLogger.js";
import type { IPlugin } from "./interfaces/IPlugin.js";
import type { DModule } from "./model/documentable.js";
import {
  PlatformMap,
  createPlatformData,
  describePlatform,
  type PlatformData,
} from "./model/platform.js";
import type { RootPageNode } from "./pages/page-node.js";
import {
  DocumentationContext,
  createDocumentationContext,
  type PlatformContext,
} from "./plugability/context.js";
import { createLogger } from "../utils/logger.js";
import { mapConcurrent } from "../utils/async.js";
import type { DocumentationConfiguration, PassConfiguration } from "../utils/validation.js";

const logger = createLogger("generator");

// =============================================================================
// Types
// =============================================================================

/**
 * Progress message of every stage, in run order
 */
export const GenerationStage = {
  setup: "Setting up analysis environments",
  plugins: "Initializing plugins",
  translation: "Creating documentation models",
  merge: "Merging documentation models",
  modelTransformation: "Transforming documentation model",
  pages: "Creating pages",
  pageTransformation: "Transforming pages",
  rendering: "Rendering",
} as const;

export type GenerationStageName = (typeof GenerationStage)[keyof typeof GenerationStage];

/**
 * Outcome of a completed run. Callers decide whether errors fail them.
 */
export interface GenerationReport {
  /** An analysis diagnostic of error severity was seen or an error was logged */
  hasErrors: boolean;
  warningsCount: number;
  errorsCount: number;
  diagnostics: AnalysisDiagnostic[];
}

export interface DocumentationGeneratorOptions {
  /** Plugins to initialize, in initialization order before before/after constraints */
  plugins?: readonly IPlugin[];
  /** Analysis front ends, selected per pass by `frontEnd` */
  analysisFactories?: readonly IAnalysisEnvironmentFactory[];
  /** Platforms translated at the same time (default: 4) */
  concurrency?: number;
}

/**
 * Platform a pass documents
 */
export function platformOf(pass: PassConfiguration): PlatformData {
  return createPlatformData(pass.displayName ?? pass.platform, pass.platform, pass.targets);
}

// =============================================================================
// Generator
// =============================================================================

/**
 * @example
 * ```typescript
 * const generator = new DocumentationGenerator(configuration, new PinoDocumentationLogger(), {
 *   plugins: [new BasePlugin(), new JsonPlugin()],
 *   analysisFactories: [new TypeScriptAnalysisEnvironmentFactory()],
 * });
 * const report = await generator.generate();
 * ```
 */
export class DocumentationGenerator {
  private readonly plugins: readonly IPlugin[];
  private readonly factories: ReadonlyMap<string, IAnalysisEnvironmentFactory>;
  private readonly concurrency: number;

  constructor(
    private readonly configuration: DocumentationConfiguration,
    private readonly logger: IDocumentationLogger,
    options: DocumentationGeneratorOptions = {}
  ) {
    this.plugins = options.plugins ?? [];
    this.factories = new Map((options.analysisFactories ?? []).map((factory) => [factory.frontEnd, factory]));
    this.concurrency = options.concurrency ?? 4;
  }

  /**
   * Run every stage in order.
   *
   * @throws ConfigurationError before any translation for an invalid setup
   * @throws StageFailure naming the stage that failed
   */
  async generate(): Promise<GenerationReport> {
    this.logger.progress(GenerationStage.setup);
    const platforms = await this.setUpAnalysis();

    try {
      this.logger.progress(GenerationStage.plugins);
      const context = this.initializePlugins(platforms);

      this.logger.progress(GenerationStage.translation);
      const modules = await this.createDocumentationModels(context);

      this.logger.progress(GenerationStage.merge);
      const merged = this.mergeDocumentationModels(modules, context);

      this.logger.progress(GenerationStage.modelTransformation);
      const transformed = await this.transformDocumentationModel(merged, context);

      this.logger.progress(GenerationStage.pages);
      const pages = this.createPages(transformed, context);

      this.logger.progress(GenerationStage.pageTransformation);
      const finalPages = await this.transformPages(pages, context);

      this.logger.progress(GenerationStage.rendering);
      await this.render(finalPages, context);

      return this.report(platforms);
    } finally {
      await this.disposeEnvironments(platforms);
    }
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  /**
   * Build one platform context per pass. Any failure is fatal; contexts built
   * before it are disposed.
   */
  async setUpAnalysis(): Promise<PlatformMap<PlatformContext>> {
    const { passes } = this.configuration;
    if (passes.length === 0) {
      throw new ConfigurationError("No platform passes configured", ErrorCode.CONFIGURATION_NO_PLATFORMS);
    }

    let platforms = PlatformMap.empty<PlatformContext>();
    try {
      for (const pass of passes) {
        const platform = platformOf(pass);
        if (platforms.has(platform)) {
          throw new ConfigurationError(
            `Platform ${describePlatform(platform)} is configured by more than one pass`,
            ErrorCode.CONFIGURATION_INVALID,
            { platform: describePlatform(platform), moduleName: pass.moduleName }
          );
        }

        const factory = this.factories.get(pass.frontEnd);
        if (!factory) {
          throw new AnalysisError(
            `No analysis front end "${pass.frontEnd}" for ${describePlatform(platform)}`,
            ErrorCode.ANALYSIS_FRONT_END_UNKNOWN,
            { moduleName: pass.moduleName, frontEnd: pass.frontEnd }
          );
        }

        const collector = new DiagnosticCollector(pass.moduleName, this.logger);
        const environment = await factory.create(pass, collector);
        platforms = platforms.with(platform, { platform, pass, environment, collector });
        logger.debug({ platform: describePlatform(platform), frontEnd: pass.frontEnd }, "Analysis environment ready");
      }
    } catch (error) {
      await this.disposeEnvironments(platforms);
      throw toStageFailure(GenerationStage.setup, error, ErrorCode.ANALYSIS_SETUP_FAILED);
    }
    return platforms;
  }

  /**
   * Initialize the configured plugins, then `extraPlugins`, into a frozen
   * registry, and check that every single-valued point the run needs has
   * exactly one implementation.
   *
   * @throws ConfigurationError for ordering cycles or missing/ambiguous implementations
   */
  initializePlugins(
    platforms: PlatformMap<PlatformContext>,
    extraPlugins: readonly IPlugin[] = []
  ): DocumentationContext {
    let context: DocumentationContext;
    try {
      context = createDocumentationContext(this.configuration, this.logger, platforms, [
        ...this.plugins,
        ...extraPlugins,
      ]);
    } catch (error) {
      throw toStageFailure(GenerationStage.plugins, error);
    }

    const frontEnds = new Set(platforms.values().map((platform) => platform.environment.frontEnd));
    for (const frontEnd of frontEnds) {
      context.single(CoreExtensions.symbolTranslator(frontEnd));
    }
    context.single(CoreExtensions.fileTranslator);
    context.single(CoreExtensions.documentableMerger);
    context.single(CoreExtensions.pageTranslator);
    context.single(CoreExtensions.renderer);

    for (const summary of context.registry.describe()) {
      logger.debug(summary, "Extension point");
    }
    return context;
  }

  /**
   * Translate every platform on a bounded pool. Returns the symbol-level
   * modules of all platforms followed by their file-based modules.
   */
  async createDocumentationModels(context: DocumentationContext): Promise<DModule[]> {
    const translated = await mapConcurrent(
      context.platforms.values(),
      async (platformContext, _index, token) => {
        const { platform, pass, environment } = platformContext;
        const symbolTranslator = context.single(CoreExtensions.symbolTranslator(environment.frontEnd));
        const fileTranslator = context.single(CoreExtensions.fileTranslator);

        try {
          const groups = await environment.symbolGroups();
          token.throwIfCancelled();
          const symbolModule = await symbolTranslator.translate(
            {
              moduleName: pass.moduleName,
              platform,
              groups,
              moduleDocumentation: environment.moduleDocumentation,
              cancellation: token,
            },
            context
          );

          const files = await environment.sourceFiles();
          token.throwIfCancelled();
          const fileModule = await fileTranslator.translate(
            { moduleName: pass.moduleName, platform, files, cancellation: token },
            context
          );
          return [symbolModule, fileModule] as const;
        } catch (error) {
          if (error instanceof ConfigurationError || error instanceof StageFailure) throw error;
          throw new StageFailure(
            GenerationStage.translation,
            `Translation of ${describePlatform(platform)} failed: ${getErrorMessage(error)}`,
            {
              code: isPolydocError(error) ? error.code : ErrorCode.TRANSLATION_FAILED,
              cause: error,
              context: { platform: describePlatform(platform) },
            }
          );
        }
      },
      { concurrency: this.concurrency }
    );

    return [...translated.map(([symbolModule]) => symbolModule), ...translated.map(([, fileModule]) => fileModule)];
  }

  mergeDocumentationModels(modules: readonly DModule[], context: DocumentationContext): DModule {
    try {
      return context.single(CoreExtensions.documentableMerger).merge(modules, context);
    } catch (error) {
      throw toStageFailure(GenerationStage.merge, error, ErrorCode.MERGE_FAILED);
    }
  }

  /**
   * Left fold of the model transformers, in registration order
   */
  async transformDocumentationModel(module: DModule, context: DocumentationContext): Promise<DModule> {
    let current = module;
    for (const transformer of context.all(CoreExtensions.documentableTransformer)) {
      try {
        current = await transformer.transform(current, context);
      } catch (error) {
        throw this.chainFailure(GenerationStage.modelTransformation, transformer.name, error);
      }
      logger.debug({ transformer: transformer.name }, "Applied documentable transformer");
    }
    return current;
  }

  createPages(module: DModule, context: DocumentationContext): RootPageNode {
    try {
      return context.single(CoreExtensions.pageTranslator).translate(module, context);
    } catch (error) {
      throw toStageFailure(GenerationStage.pages, error, ErrorCode.PAGE_CREATION_FAILED);
    }
  }

  /**
   * Left fold of the page transformers, in registration order
   */
  async transformPages(root: RootPageNode, context: DocumentationContext): Promise<RootPageNode> {
    let current = root;
    for (const transformer of context.all(CoreExtensions.pageTransformer)) {
      try {
        current = await transformer.transform(current, context);
      } catch (error) {
        throw this.chainFailure(GenerationStage.pageTransformation, transformer.name, error);
      }
      logger.debug({ transformer: transformer.name }, "Applied page transformer");
    }
    return current;
  }

  async render(root: RootPageNode, context: DocumentationContext): Promise<void> {
    try {
      await context.single(CoreExtensions.renderer).render(root);
    } catch (error) {
      throw toStageFailure(GenerationStage.rendering, error, ErrorCode.RENDER_FAILED);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private chainFailure(stage: GenerationStageName, transformer: string, error: unknown): PolydocError {
    if (error instanceof ConfigurationError || error instanceof StageFailure) return error;
    return new StageFailure(stage, `Transformer "${transformer}" failed: ${getErrorMessage(error)}`, {
      code: isPolydocError(error) ? error.code : ErrorCode.TRANSFORM_FAILED,
      cause: error,
      context: { transformer },
    });
  }

  private report(platforms: PlatformMap<PlatformContext>): GenerationReport {
    const summary = this.logger.report();
    const contexts = platforms.values();
    const analysisErrors = contexts.some((platform) => platform.collector.hasErrors());
    return {
      hasErrors: analysisErrors || summary.errorsCount > 0,
      warningsCount: summary.warningsCount,
      errorsCount: summary.errorsCount,
      diagnostics: contexts.flatMap((platform) => [...platform.collector.diagnostics]),
    };
  }

  private async disposeEnvironments(platforms: PlatformMap<PlatformContext>): Promise<void> {
    for (const { platform, environment } of platforms.values()) {
      try {
        await environment.dispose();
      } catch (error) {
        logger.warn({ platform: describePlatform(platform), error: getErrorMessage(error) }, "Failed to dispose analysis environment");
      }
    }
  }
}
