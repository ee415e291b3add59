/**
 * Error Classes for Polydoc
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIGURATION_INVALID = "E1000",
  CONFIGURATION_NO_PLATFORMS = "E1001",
  EXTENSION_NOT_REGISTERED = "E1002",
  EXTENSION_AMBIGUOUS = "E1003",
  PLUGIN_ORDER_CYCLE = "E1004",
  REGISTRY_FROZEN = "E1005",
  PLUGIN_DUPLICATE = "E1006",
  EXTENSION_DUPLICATE = "E1007",

  // Stage failures (2xxx)
  STAGE_FAILED = "E2000",
  TRANSLATION_FAILED = "E2001",
  MERGE_FAILED = "E2002",
  TRANSFORM_FAILED = "E2003",
  PAGE_CREATION_FAILED = "E2004",

  // Analysis errors (3xxx)
  ANALYSIS_SETUP_FAILED = "E3000",
  ANALYSIS_SOURCE_ROOT_MISSING = "E3001",
  ANALYSIS_FRONT_END_UNKNOWN = "E3002",

  // Rendering errors (4xxx)
  RENDER_FAILED = "E4000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all Polydoc errors
 */
export class PolydocError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PolydocError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Fatal, pre-execution problems: bad cardinality, no platforms, plugin cycles,
 * invalid configuration files.
 */
export class ConfigurationError extends PolydocError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_INVALID,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * An unhandled fault inside a pipeline stage. Aborts the remaining stages.
 */
export class StageFailure extends PolydocError {
  public readonly stage: string;

  constructor(
    stage: string,
    message: string,
    options: { code?: ErrorCode; cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? ErrorCode.STAGE_FAILED, { stage, ...options.context }, {
      cause: options.cause,
    });
    this.name = "StageFailure";
    this.stage = stage;
  }

  override toString(): string {
    return `[${this.code}] ${this.name} in "${this.stage}": ${this.message}`;
  }
}

/**
 * Failures of the analysis collaborator while building a platform context
 */
export class AnalysisError extends PolydocError {
  public readonly moduleName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ANALYSIS_SETUP_FAILED,
    context?: Record<string, unknown> & { moduleName?: string }
  ) {
    super(message, code, context);
    this.name = "AnalysisError";
    this.moduleName = context?.moduleName;
  }
}

/**
 * Renderer errors
 */
export class RenderError extends PolydocError {
  public readonly outputPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RENDER_FAILED,
    context?: Record<string, unknown> & { outputPath?: string }
  ) {
    super(message, code, context);
    this.name = "RenderError";
    this.outputPath = context?.outputPath;
  }
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Check if an error is a Polydoc error
 */
export function isPolydocError(error: unknown): error is PolydocError {
  return error instanceof PolydocError;
}

/**
 * Wrap an error raised inside a stage into a StageFailure for that stage.
 * ConfigurationErrors and StageFailures pass through unchanged; other Polydoc
 * errors keep their code on the wrapping failure.
 */
export function toStageFailure(
  stage: string,
  error: unknown,
  code: ErrorCode = ErrorCode.STAGE_FAILED
): PolydocError {
  if (error instanceof ConfigurationError || error instanceof StageFailure) {
    return error;
  }
  return new StageFailure(stage, getErrorMessage(error), {
    code: isPolydocError(error) ? error.code : code,
    cause: error,
  });
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unknown error occurred";
}
