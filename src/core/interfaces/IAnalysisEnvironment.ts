/**
 * IAnalysisEnvironment - Contract of the external analysis collaborator
 *
 * An analysis front end turns one pass's sources into analyzed symbols. The
 * pipeline never looks inside a front end; it only consumes symbol groups and
 * analyzed source files and reads the diagnostics it reported.
 *
 * @module
 */

import type { PassConfiguration } from "../../utils/validation.js";
import type { SourceLocation, Visibility } from "../model/documentable.js";

// =============================================================================
// Analyzed symbols
// =============================================================================

export type AnalyzedSymbolKind =
  | "class"
  | "interface"
  | "object"
  | "enum"
  | "enumEntry"
  | "function"
  | "constructor"
  | "property"
  | "typeAlias";

export interface AnalyzedSymbol {
  kind: AnalyzedSymbolKind;
  name: string;
  /** Rendered signature; also discriminates overloads */
  signature?: string;
  documentation?: string;
  visibility: Visibility;
  deprecated: boolean;
  annotations: readonly string[];
  location?: SourceLocation;
  members: readonly AnalyzedSymbol[];
  /** Code of the samples the documentation refers to */
  samples?: readonly string[];
}

/**
 * All analyzed symbols of one package
 */
export interface AnalyzedSymbolGroup {
  packageName: string;
  documentation?: string;
  symbols: readonly AnalyzedSymbol[];
}

/**
 * One analyzed file, for front ends that work file by file
 */
export interface AnalyzedSourceFile {
  path: string;
  sourceRoot: string;
  /** Explicit package; derived from the path when absent */
  packageName?: string;
  language: string;
  symbols: readonly AnalyzedSymbol[];
}

// =============================================================================
// Diagnostics
// =============================================================================

export type DiagnosticSeverity = "error" | "warning" | "info" | "logging";

export interface DiagnosticLocation {
  path: string;
  line?: number;
  column?: number;
}

export interface MessageCollector {
  report(severity: DiagnosticSeverity, message: string, location?: DiagnosticLocation): void;
  /** Whether an error-severity diagnostic was reported since the last clear */
  hasErrors(): boolean;
  clear(): void;
}

// =============================================================================
// Environment
// =============================================================================

export interface IAnalysisEnvironment {
  /** Front-end kind, selects the symbol translator */
  readonly frontEnd: string;
  /** Module documentation read from the pass's include files */
  readonly moduleDocumentation?: string;
  symbolGroups(): Promise<readonly AnalyzedSymbolGroup[]>;
  sourceFiles(): Promise<readonly AnalyzedSourceFile[]>;
  dispose(): Promise<void>;
}

export interface IAnalysisEnvironmentFactory {
  readonly frontEnd: string;
  /**
   * Build the environment for one pass.
   * @throws AnalysisError when the pass cannot be analyzed (missing roots, bad classpath)
   */
  create(pass: PassConfiguration, collector: MessageCollector): Promise<IAnalysisEnvironment>;
}
