/**
 * Documentation Loggers
 *
 * Implementations of IDocumentationLogger: one backed by pino for real runs,
 * one that keeps every message in memory for embedders and tests.
 *
 * @module
 */

import type { Logger } from "../../utils/logger.js";
import { createLogger } from "../../utils/logger.js";
import type { DiagnosticsSummary, IDocumentationLogger } from "../interfaces/IDocumentationLogger.js";

export type ProgressListener = (stage: string) => void;

abstract class CountingLogger implements IDocumentationLogger {
  private warnings = 0;
  private errors = 0;
  protected lastStage: string | null = null;

  get warningsCount(): number {
    return this.warnings;
  }

  get errorsCount(): number {
    return this.errors;
  }

  progress(stage: string): void {
    this.lastStage = stage;
    this.onProgress(stage);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.warnings++;
    this.write("warn", message);
  }

  error(message: string): void {
    this.errors++;
    this.write("error", message);
  }

  report(): DiagnosticsSummary {
    const summary: DiagnosticsSummary = {
      warningsCount: this.warnings,
      errorsCount: this.errors,
      lastStage: this.lastStage,
    };
    this.onReport(summary);
    return summary;
  }

  protected abstract onProgress(stage: string): void;
  protected abstract write(level: "debug" | "info" | "warn" | "error", message: string): void;
  protected abstract onReport(summary: DiagnosticsSummary): void;
}

/**
 * Logger writing through pino
 */
export class PinoDocumentationLogger extends CountingLogger {
  private readonly logger: Logger;
  private readonly listener?: ProgressListener;

  constructor(options: { logger?: Logger; onProgress?: ProgressListener } = {}) {
    super();
    this.logger = options.logger ?? createLogger("polydoc");
    this.listener = options.onProgress;
  }

  protected onProgress(stage: string): void {
    this.logger.info({ stage }, stage);
    this.listener?.(stage);
  }

  protected write(level: "debug" | "info" | "warn" | "error", message: string): void {
    this.logger[level](message);
  }

  protected onReport(summary: DiagnosticsSummary): void {
    this.logger.info(
      { warnings: summary.warningsCount, errors: summary.errorsCount },
      `Generation completed: ${summary.warningsCount} warning(s), ${summary.errorsCount} error(s)`
    );
  }
}

export interface LoggedMessage {
  level: "progress" | "debug" | "info" | "warn" | "error" | "report";
  message: string;
}

/**
 * Logger keeping every message in order
 */
export class CollectingDocumentationLogger extends CountingLogger {
  readonly messages: LoggedMessage[] = [];

  /** Stages announced so far, in order */
  get stages(): string[] {
    return this.messages.filter((entry) => entry.level === "progress").map((entry) => entry.message);
  }

  messagesAt(level: LoggedMessage["level"]): string[] {
    return this.messages.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  protected onProgress(stage: string): void {
    this.messages.push({ level: "progress", message: stage });
  }

  protected write(level: "debug" | "info" | "warn" | "error", message: string): void {
    this.messages.push({ level, message });
  }

  protected onReport(summary: DiagnosticsSummary): void {
    this.messages.push({
      level: "report",
      message: `${summary.warningsCount} warning(s), ${summary.errorsCount} error(s)`,
    });
  }
}
