/**
 * Message collector handed to analysis front ends. Records every diagnostic,
 * remembers whether an error was seen and forwards to the documentation logger.
 *
 * @module
 */

import type { IDocumentationLogger } from "../interfaces/IDocumentationLogger.js";
import type {
  DiagnosticLocation,
  DiagnosticSeverity,
  MessageCollector,
} from "../interfaces/IAnalysisEnvironment.js";

export interface AnalysisDiagnostic {
  module: string;
  severity: DiagnosticSeverity;
  message: string;
  location?: DiagnosticLocation;
}

export function formatDiagnostic(diagnostic: AnalysisDiagnostic): string {
  const { location } = diagnostic;
  let where = "";
  if (location) {
    where = location.path;
    if (location.line !== undefined) {
      where += `:${location.line}`;
      if (location.column !== undefined) where += `:${location.column}`;
    }
    where += ": ";
  }
  return `${diagnostic.severity.toUpperCase()}: ${where}${diagnostic.message}`;
}

export class DiagnosticCollector implements MessageCollector {
  private seenErrors = false;
  private readonly recorded: AnalysisDiagnostic[] = [];

  constructor(
    private readonly moduleName: string,
    private readonly logger: IDocumentationLogger
  ) {}

  get diagnostics(): readonly AnalysisDiagnostic[] {
    return this.recorded;
  }

  report(severity: DiagnosticSeverity, message: string, location?: DiagnosticLocation): void {
    if (severity === "error") {
      this.seenErrors = true;
    }
    const diagnostic: AnalysisDiagnostic = { module: this.moduleName, severity, message, location };
    this.recorded.push(diagnostic);
    this.logger.info(formatDiagnostic(diagnostic));
  }

  hasErrors(): boolean {
    return this.seenErrors;
  }

  clear(): void {
    this.seenErrors = false;
  }
}
