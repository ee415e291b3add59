/**
 * TypeScript Analysis Environment
 *
 * Analysis front end over the TypeScript compiler API. TypeScript sources of
 * a pass's source roots become symbol groups, one per directory-derived
 * package; JavaScript sources are analyzed file by file. Compiler diagnostics
 * go to the pass's message collector.
 *
 * @module
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fsPromises from "node:fs/promises";
import { AnalysisError, ErrorCode, getErrorMessage } from "../../core/errors.js";
import type {
  AnalyzedSourceFile,
  AnalyzedSymbol,
  AnalyzedSymbolGroup,
  DiagnosticSeverity,
  IAnalysisEnvironment,
  IAnalysisEnvironmentFactory,
  MessageCollector,
} from "../../core/interfaces/IAnalysisEnvironment.js";
import { directoryExists, fileExists, findFiles } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import type { PassConfiguration } from "../../utils/validation.js";
import { parseIncludes } from "./includes.js";
import { loadSamples } from "./samples.js";
import { SymbolExtractor } from "./symbol-extractor.js";

const logger = createLogger("typescript-analysis");

export const TYPESCRIPT_FRONT_END = "typescript";

const TYPESCRIPT_PATTERNS = ["**/*.ts", "**/*.tsx", "**/*.mts", "**/*.cts"];
const JAVASCRIPT_PATTERNS = ["**/*.js", "**/*.jsx", "**/*.mjs", "**/*.cjs"];
const IGNORED = ["**/*.d.ts"];

/**
 * `languageVersion` values understood as compilation targets. The same names
 * select the standard library for `apiVersion`.
 */
const LANGUAGE_VERSIONS: Readonly<Record<string, ts.ScriptTarget>> = {
  es2015: ts.ScriptTarget.ES2015,
  es2016: ts.ScriptTarget.ES2016,
  es2017: ts.ScriptTarget.ES2017,
  es2018: ts.ScriptTarget.ES2018,
  es2019: ts.ScriptTarget.ES2019,
  es2020: ts.ScriptTarget.ES2020,
  es2021: ts.ScriptTarget.ES2021,
  es2022: ts.ScriptTarget.ES2022,
  esnext: ts.ScriptTarget.ESNext,
};

// =============================================================================
// Helpers
// =============================================================================

interface SourceEntry {
  file: string;
  sourceRoot: string;
}

/**
 * Package of a file: its directory relative to the source root, dot-joined
 */
export function packageNameFor(file: string, sourceRoot: string): string {
  const relative = path.relative(sourceRoot, path.dirname(file));
  if (relative === "" || relative.startsWith("..")) return "";
  return relative.split(path.sep).join(".");
}

function severityOf(category: ts.DiagnosticCategory): DiagnosticSeverity {
  switch (category) {
    case ts.DiagnosticCategory.Error:
      return "error";
    case ts.DiagnosticCategory.Warning:
      return "warning";
    case ts.DiagnosticCategory.Suggestion:
      return "info";
    case ts.DiagnosticCategory.Message:
      return "logging";
  }
}

function reportDiagnostic(collector: MessageCollector, diagnostic: ts.Diagnostic): void {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    collector.report(severityOf(diagnostic.category), message, {
      path: path.resolve(diagnostic.file.fileName),
      line: line + 1,
      column: character + 1,
    });
  } else {
    collector.report(severityOf(diagnostic.category), message);
  }
}

// =============================================================================
// Environment
// =============================================================================

export class TypeScriptAnalysisEnvironment implements IAnalysisEnvironment {
  readonly frontEnd = TYPESCRIPT_FRONT_END;
  private program: ts.Program | null = null;
  private groups: AnalyzedSymbolGroup[] | null = null;
  private files: AnalyzedSourceFile[] | null = null;

  constructor(
    private readonly pass: PassConfiguration,
    private readonly collector: MessageCollector,
    private readonly sources: { typescript: SourceEntry[]; javascript: SourceEntry[] },
    private readonly options: ts.CompilerOptions,
    readonly moduleDocumentation: string | undefined,
    private readonly packageDocumentation: ReadonlyMap<string, string>,
    private readonly samples: ReadonlyMap<string, string> = new Map()
  ) {}

  async symbolGroups(): Promise<readonly AnalyzedSymbolGroup[]> {
    if (this.groups) return this.groups;

    const entries = this.sources.typescript;
    const program = this.createProgram(entries.map((entry) => entry.file));
    const extractor = new SymbolExtractor(program.getTypeChecker(), this.samples, this.collector);

    const byPackage = new Map<string, AnalyzedSymbol[]>();
    for (const entry of entries) {
      const sourceFile = program.getSourceFile(entry.file);
      if (!sourceFile) continue;
      this.reportDiagnostics(program, sourceFile, true);
      const packageName = packageNameFor(entry.file, entry.sourceRoot);
      const symbols = byPackage.get(packageName) ?? [];
      symbols.push(...extractor.extract(sourceFile));
      byPackage.set(packageName, symbols);
    }

    this.groups = [...byPackage].map(([packageName, symbols]) => ({
      packageName,
      documentation: this.packageDocumentation.get(packageName),
      symbols,
    }));
    logger.debug(
      { module: this.pass.moduleName, files: entries.length, packages: this.groups.length },
      "Analyzed TypeScript sources"
    );
    return this.groups;
  }

  async sourceFiles(): Promise<readonly AnalyzedSourceFile[]> {
    if (this.files) return this.files;

    const entries = this.sources.javascript;
    if (entries.length === 0) {
      this.files = [];
      return this.files;
    }

    const program = ts.createProgram({
      rootNames: entries.map((entry) => entry.file),
      options: { ...this.options, allowJs: true, checkJs: false },
    });
    const extractor = new SymbolExtractor(program.getTypeChecker(), this.samples, this.collector);

    this.files = entries.flatMap((entry) => {
      const sourceFile = program.getSourceFile(entry.file);
      if (!sourceFile) return [];
      this.reportDiagnostics(program, sourceFile, false);
      return [
        {
          path: path.resolve(entry.file),
          sourceRoot: entry.sourceRoot,
          language: "javascript",
          symbols: extractor.extract(sourceFile),
        },
      ];
    });
    return this.files;
  }

  async dispose(): Promise<void> {
    this.program = null;
    this.groups = null;
    this.files = null;
  }

  private createProgram(rootNames: string[]): ts.Program {
    if (!this.program) {
      this.program = ts.createProgram({
        rootNames: [...rootNames, ...this.pass.classpath],
        options: this.options,
      });
    }
    return this.program;
  }

  private reportDiagnostics(program: ts.Program, sourceFile: ts.SourceFile, semantic: boolean): void {
    const diagnostics = [
      ...program.getSyntacticDiagnostics(sourceFile),
      ...(semantic ? program.getSemanticDiagnostics(sourceFile) : []),
    ];
    for (const diagnostic of diagnostics) {
      reportDiagnostic(this.collector, diagnostic);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @example
 * ```typescript
 * const factory = new TypeScriptAnalysisEnvironmentFactory();
 * const environment = await factory.create(pass, collector);
 * const groups = await environment.symbolGroups();
 * ```
 */
export class TypeScriptAnalysisEnvironmentFactory implements IAnalysisEnvironmentFactory {
  readonly frontEnd = TYPESCRIPT_FRONT_END;

  /**
   * @throws AnalysisError for missing source roots or classpath entries
   */
  async create(pass: PassConfiguration, collector: MessageCollector): Promise<TypeScriptAnalysisEnvironment> {
    const sources: { typescript: SourceEntry[]; javascript: SourceEntry[] } = { typescript: [], javascript: [] };

    for (const root of pass.sourceRoots) {
      const sourceRoot = path.resolve(root);
      if (!(await directoryExists(sourceRoot))) {
        throw new AnalysisError(`Source root ${root} does not exist`, ErrorCode.ANALYSIS_SOURCE_ROOT_MISSING, {
          moduleName: pass.moduleName,
          sourceRoot: root,
        });
      }
      const typescriptFiles = await findFiles({ patterns: TYPESCRIPT_PATTERNS, ignore: IGNORED, cwd: sourceRoot });
      const javascriptFiles = await findFiles({ patterns: JAVASCRIPT_PATTERNS, cwd: sourceRoot });
      sources.typescript.push(...typescriptFiles.map((file) => ({ file, sourceRoot })));
      sources.javascript.push(...javascriptFiles.map((file) => ({ file, sourceRoot })));
    }

    for (const entry of pass.classpath) {
      if (!(await fileExists(entry))) {
        throw new AnalysisError(`Classpath entry ${entry} does not exist`, ErrorCode.ANALYSIS_SETUP_FAILED, {
          moduleName: pass.moduleName,
          classpathEntry: entry,
        });
      }
    }

    const includeTexts: string[] = [];
    for (const include of pass.includes) {
      try {
        includeTexts.push(await fsPromises.readFile(include, "utf-8"));
      } catch (error) {
        collector.report("error", `Cannot read include file: ${getErrorMessage(error)}`, { path: include });
      }
    }
    const includes = parseIncludes(includeTexts);
    const samples = await loadSamples(pass.samples, collector);

    return new TypeScriptAnalysisEnvironment(
      pass,
      collector,
      sources,
      this.compilerOptions(pass, collector),
      includes.module,
      includes.packages,
      samples
    );
  }

  private compilerOptions(pass: PassConfiguration, collector: MessageCollector): ts.CompilerOptions {
    const options: ts.CompilerOptions = {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.NodeNext,
      moduleResolution: ts.ModuleResolutionKind.NodeNext,
      strict: true,
      noEmit: true,
      skipLibCheck: true,
      experimentalDecorators: true,
    };
    if (pass.languageVersion !== undefined) {
      const target = LANGUAGE_VERSIONS[pass.languageVersion.toLowerCase()];
      if (target === undefined) {
        collector.report("warning", `Unknown language version ${pass.languageVersion}, using ES2022`);
      } else {
        options.target = target;
      }
    }
    if (pass.apiVersion !== undefined) {
      const version = pass.apiVersion.toLowerCase();
      if (LANGUAGE_VERSIONS[version] === undefined) {
        collector.report("warning", `Unknown API version ${pass.apiVersion}, using the default library`);
      } else {
        options.lib = [`lib.${version}.d.ts`];
      }
    }
    return options;
  }
}

export function createTypeScriptAnalysisEnvironmentFactory(): TypeScriptAnalysisEnvironmentFactory {
  return new TypeScriptAnalysisEnvironmentFactory();
}
