/**
 * Shared test fixtures: configurations, analyzed symbols, in-memory analysis
 * environments and small documentable trees
 */

import {
  DocumentationConfigurationSchema,
  PassConfigurationSchema,
  type DocumentationConfiguration,
  type DocumentationConfigurationInput,
  type PassConfiguration,
  type PassConfigurationInput,
} from "../../utils/validation.js";
import type {
  AnalyzedSourceFile,
  AnalyzedSymbol,
  AnalyzedSymbolGroup,
  IAnalysisEnvironment,
  IAnalysisEnvironmentFactory,
  MessageCollector,
} from "../interfaces/IAnalysisEnvironment.js";
import type { IPlugin } from "../interfaces/IPlugin.js";
import { DiagnosticCollector } from "../analysis/diagnostic-collector.js";
import { CollectingDocumentationLogger } from "../logging/documentation-logger.js";
import {
  createFacts,
  createModule,
  createPackage,
  type ContainedDocumentable,
  type DClasslike,
  type DMember,
  type DModule,
  type DRI,
  type PlatformFacts,
} from "../model/documentable.js";
import { PlatformMap, createPlatformData, type PlatformData } from "../model/platform.js";
import { createDocumentationContext, type DocumentationContext, type PlatformContext } from "../plugability/context.js";
import { platformOf } from "../generator.js";

// =============================================================================
// Configuration
// =============================================================================

export function makePass(input: Partial<PassConfigurationInput> = {}): PassConfiguration {
  return PassConfigurationSchema.parse({ moduleName: "demo", frontEnd: "fake", ...input });
}

export function makeConfiguration(
  passes: Partial<PassConfigurationInput>[],
  input: Partial<DocumentationConfigurationInput> = {}
): DocumentationConfiguration {
  return DocumentationConfigurationSchema.parse({
    outputDir: "out",
    ...input,
    passes: passes.map((pass) => ({ moduleName: "demo", frontEnd: "fake", ...pass })),
  });
}

export const JVM = createPlatformData("jvm", "jvm");
export const JS = createPlatformData("js", "js");

// =============================================================================
// Analyzed symbols
// =============================================================================

export function analyzedSymbol(
  kind: AnalyzedSymbol["kind"],
  name: string,
  details: Partial<AnalyzedSymbol> = {}
): AnalyzedSymbol {
  return {
    kind,
    name,
    visibility: "public",
    deprecated: false,
    annotations: [],
    members: [],
    ...details,
  };
}

// =============================================================================
// In-memory analysis
// =============================================================================

export interface FakeSources {
  groups?: AnalyzedSymbolGroup[];
  files?: AnalyzedSourceFile[];
  moduleDocumentation?: string;
  /** Diagnostics reported while symbol groups are read */
  diagnostics?: Array<Parameters<MessageCollector["report"]>>;
  /** Error thrown while symbol groups are read */
  failWith?: Error;
  /** Milliseconds spent reading symbol groups */
  delayMs?: number;
}

export class FakeEnvironment implements IAnalysisEnvironment {
  disposed = false;

  constructor(
    readonly frontEnd: string,
    private readonly sources: FakeSources,
    private readonly collector: MessageCollector,
    private readonly events: string[] = [],
    private readonly label: string = frontEnd
  ) {}

  get moduleDocumentation(): string | undefined {
    return this.sources.moduleDocumentation;
  }

  async symbolGroups(): Promise<readonly AnalyzedSymbolGroup[]> {
    for (const diagnostic of this.sources.diagnostics ?? []) {
      this.collector.report(...diagnostic);
    }
    if (this.sources.delayMs !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, this.sources.delayMs));
    }
    if (this.sources.failWith) throw this.sources.failWith;
    this.events.push(`${this.label} read`);
    return this.sources.groups ?? [];
  }

  async sourceFiles(): Promise<readonly AnalyzedSourceFile[]> {
    return this.sources.files ?? [];
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.events.push(`${this.label} disposed`);
  }
}

/**
 * Front end "fake" serving canned sources per platform display name
 */
export class FakeAnalysisFactory implements IAnalysisEnvironmentFactory {
  readonly frontEnd = "fake";
  readonly created: FakeEnvironment[] = [];
  /** Reads and disposals of every created environment, in order */
  readonly events: string[] = [];

  constructor(private readonly sources: Record<string, FakeSources> = {}) {}

  async create(pass: PassConfiguration, collector: MessageCollector): Promise<FakeEnvironment> {
    const name = platformOf(pass).name;
    const environment = new FakeEnvironment(this.frontEnd, this.sources[name] ?? {}, collector, this.events, name);
    this.created.push(environment);
    return environment;
  }
}

// =============================================================================
// Contexts
// =============================================================================

/**
 * Platform contexts over empty fake environments, one per pass
 */
export function makePlatforms(
  configuration: DocumentationConfiguration,
  logger = new CollectingDocumentationLogger()
): PlatformMap<PlatformContext> {
  return PlatformMap.from(
    configuration.passes.map((pass) => {
      const platform = platformOf(pass);
      const collector = new DiagnosticCollector(pass.moduleName, logger);
      const context: PlatformContext = {
        platform,
        pass,
        environment: new FakeEnvironment("fake", {}, collector),
        collector,
      };
      return [platform, context] as const;
    })
  );
}

export function makeContext(
  configuration: DocumentationConfiguration,
  plugins: readonly IPlugin[] = [],
  logger = new CollectingDocumentationLogger()
): DocumentationContext {
  return createDocumentationContext(configuration, logger, makePlatforms(configuration, logger), plugins);
}

// =============================================================================
// Documentables
// =============================================================================

export function facts(platform: PlatformData, details: Partial<PlatformFacts> = {}): PlatformMap<PlatformFacts> {
  return PlatformMap.of(platform, createFacts(details));
}

export function member(
  name: string,
  parent: DRI,
  platform: PlatformData,
  details: Partial<PlatformFacts> = {},
  kind: DMember["kind"] = "function"
): DMember {
  const callable = `${name}${details.signature ?? ""}`;
  return {
    kind,
    name,
    dri: { packageName: parent.packageName, classNames: parent.classNames, callable },
    platforms: facts(platform, details),
    children: [],
    parent,
  };
}

export function classlike(
  name: string,
  packageName: string,
  platform: PlatformData,
  children: (dri: DRI) => ContainedDocumentable[] = () => [],
  details: Partial<PlatformFacts> = {}
): DClasslike {
  const dri: DRI = { packageName, classNames: name };
  return {
    kind: "class",
    name,
    dri,
    platforms: facts(platform, details),
    children: children(dri),
    parent: { packageName },
  };
}

/**
 * Module with one package holding the given declarations
 */
export function singlePackageModule(
  platform: PlatformData,
  packageName: string,
  children: ContainedDocumentable[],
  moduleName = "demo"
): DModule {
  return createModule(moduleName, platform, [createPackage(packageName, platform, children)]);
}
