/**
 * generate command - Run the documentation pipeline for a configuration file
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import { createDocumentationGenerator } from "../../index.js";
import { PinoDocumentationLogger } from "../../core/logging/documentation-logger.js";
import { formatDiagnostic } from "../../core/analysis/diagnostic-collector.js";
import type { GenerationReport } from "../../core/generator.js";
import { createLogger } from "../../utils/logger.js";
import { loadConfiguration, type DocumentationConfiguration } from "../../utils/validation.js";

const logger = createLogger("generate");

export const DEFAULT_CONFIG_FILE = "polydoc.json";

export interface GenerateOptions {
  config?: string;
  output?: string;
  format?: string;
  failOnError?: boolean;
  concurrency?: number;
}

/**
 * Configuration file with command line overrides applied
 */
export function resolveConfiguration(options: GenerateOptions): DocumentationConfiguration {
  const configuration = loadConfiguration(path.resolve(options.config ?? DEFAULT_CONFIG_FILE));
  return {
    ...configuration,
    outputDir: options.output ?? configuration.outputDir,
    format: options.format ?? configuration.format,
  };
}

function printReport(report: GenerationReport): void {
  const errors = report.diagnostics.filter((diagnostic) => diagnostic.severity === "error");
  const warnings = report.diagnostics.filter((diagnostic) => diagnostic.severity === "warning");

  for (const diagnostic of [...errors, ...warnings]) {
    const line = `  ${diagnostic.module}: ${formatDiagnostic(diagnostic)}`;
    console.log(diagnostic.severity === "error" ? chalk.red(line) : chalk.yellow(line));
  }

  console.log();
  console.log(`  Warnings:     ${chalk.yellow(report.warningsCount)}`);
  console.log(`  Errors:       ${chalk.red(report.errorsCount)}`);
  console.log(`  Diagnostics:  ${report.diagnostics.length} (${errors.length} error(s), ${warnings.length} warning(s))`);
}

/**
 * Generate documentation
 */
export async function generateCommand(options: GenerateOptions): Promise<void> {
  logger.info({ options }, "Generating documentation");

  const configuration = resolveConfiguration(options);
  if (configuration.skip) {
    console.log(chalk.dim("Documentation generation is skipped by configuration; no output will be produced."));
    return;
  }

  const spinner = ora("Starting documentation generation...").start();
  const documentationLogger = new PinoDocumentationLogger({
    onProgress: (stage) => {
      spinner.text = `${stage}...`;
    },
  });

  let report: GenerationReport;
  try {
    report = await createDocumentationGenerator(configuration, documentationLogger, {
      concurrency: options.concurrency,
    }).generate();
  } catch (error) {
    spinner.fail(chalk.red("Documentation generation failed"));
    throw error;
  }

  if (report.hasErrors) {
    spinner.warn(chalk.yellow(`Documentation written to ${configuration.outputDir} with errors`));
  } else {
    spinner.succeed(chalk.green(`Documentation written to ${configuration.outputDir}`));
  }
  printReport(report);

  if (report.hasErrors && options.failOnError) {
    console.error(chalk.red("\nFailing because errors were reported (--fail-on-error)"));
    process.exitCode = 1;
  }
}
