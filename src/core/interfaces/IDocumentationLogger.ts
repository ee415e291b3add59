/**
 * IDocumentationLogger - Logger contract used by the generation pipeline
 *
 * The driver calls `progress` once per stage in a fixed order and `report`
 * once at the end of a completed run.
 *
 * @module
 */

export interface DiagnosticsSummary {
  warningsCount: number;
  errorsCount: number;
  /** Last stage announced through `progress` */
  lastStage: string | null;
}

export interface IDocumentationLogger {
  /** Announce the start of a pipeline stage */
  progress(stage: string): void;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;

  /** Surface aggregate diagnostics; returns the counts it reported */
  report(): DiagnosticsSummary;

  readonly warningsCount: number;
  readonly errorsCount: number;
}
