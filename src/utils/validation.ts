/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the documentation configuration. The pipeline assumes a
 * well-formed configuration, so everything structural is checked here first.
 *
 * @module
 */

import * as fs from "node:fs";
import { z } from "zod";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { PLATFORM_KINDS } from "../core/model/platform.js";

// =============================================================================
// Pass Configuration
// =============================================================================

/**
 * Per-package documentation options. The longest matching prefix applies.
 */
export const PackageOptionsSchema = z.object({
  /** Package name prefix; "" matches every package */
  prefix: z.string(),
  includeNonPublic: z.boolean().default(false),
  reportUndocumented: z.boolean().default(true),
  skipDeprecated: z.boolean().default(false),
  suppress: z.boolean().default(false),
});

export type PackageOptions = z.infer<typeof PackageOptionsSchema>;

export const SourceLinkSchema = z.object({
  /** Local directory, Unix-style */
  path: z.string().min(1).refine((value) => !value.includes("\\"), {
    message: "Incorrect path property, only Unix based path allowed.",
  }),
  /** URL the directory is published at */
  url: z.string().url(),
  /** Appended before the line number, e.g. "#L" */
  lineSuffix: z.string().optional(),
});

export type SourceLink = z.infer<typeof SourceLinkSchema>;

/**
 * One platform pass: a single analysis run for one platform variant
 */
export const PassConfigurationSchema = z.object({
  moduleName: z.string().min(1),
  /** Name of the platform this pass documents; defaults to the platform kind */
  displayName: z.string().min(1).optional(),
  platform: z.enum(PLATFORM_KINDS).default("jvm"),
  targets: z.array(z.string()).default([]),
  /** Analysis front end that reads the sources */
  frontEnd: z.string().min(1).default("typescript"),
  sourceRoots: z.array(z.string().min(1)).default([]),
  classpath: z.array(z.string()).default([]),
  /** Files or directories whose functions `@sample` tags refer to */
  samples: z.array(z.string()).default([]),
  /** Markdown files holding module documentation */
  includes: z.array(z.string()).default([]),
  /** ECMAScript edition the sources are compiled for, e.g. "es2020" */
  languageVersion: z.string().optional(),
  /** ECMAScript edition of the standard library the sources may use */
  apiVersion: z.string().optional(),
  includeNonPublic: z.boolean().default(false),
  reportUndocumented: z.boolean().default(true),
  skipDeprecated: z.boolean().default(false),
  skipEmptyPackages: z.boolean().default(true),
  /** Keep declarations that belong to no package */
  includeRootPackage: z.boolean().default(false),
  suppressedFiles: z.array(z.string()).default([]),
  perPackageOptions: z.array(PackageOptionsSchema).default([]),
  sourceLinks: z.array(SourceLinkSchema).default([]),
});

export type PassConfiguration = z.infer<typeof PassConfigurationSchema>;
export type PassConfigurationInput = z.input<typeof PassConfigurationSchema>;

// =============================================================================
// Global Configuration
// =============================================================================

export const DocumentationConfigurationSchema = z.object({
  outputDir: z.string().min(1).default("build/docs"),
  /** Output format; selects the renderer plugin */
  format: z.string().min(1).default("json"),
  generateIndexPages: z.boolean().default(false),
  /** When true the CLI produces no output */
  skip: z.boolean().default(false),
  passes: z.array(PassConfigurationSchema).min(1, "At least one pass is required"),
});

export type DocumentationConfiguration = z.infer<typeof DocumentationConfigurationSchema>;
export type DocumentationConfigurationInput = z.input<typeof DocumentationConfigurationSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse a raw configuration object, applying defaults.
 *
 * @throws ConfigurationError when the object does not match the schema
 */
export function parseConfiguration(raw: unknown): DocumentationConfiguration {
  const result = safeValidate(DocumentationConfigurationSchema, raw);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIGURATION_INVALID, {
      issues,
    });
  }
  return result.data;
}

/**
 * Read and parse a JSON configuration file
 */
export function loadConfiguration(configPath: string): DocumentationConfiguration {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIGURATION_INVALID,
      { configPath }
    );
  }
  return parseConfiguration(raw);
}
