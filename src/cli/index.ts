#!/usr/bin/env node

/**
 * polydoc CLI
 * Command line interface for documentation generation
 */

import { Command } from "commander";
import chalk from "chalk";
import { generateCommand, DEFAULT_CONFIG_FILE } from "./commands/generate.js";
import { isPolydocError, StageFailure } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("polydoc")
  .description("Multi-platform documentation generator")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

function parseConcurrency(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid concurrency: ${value}`);
  }
  return parsed;
}

program
  .command("generate")
  .description("Generate documentation for the configured platform passes")
  .option("-c, --config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
  .option("-o, --output <dir>", "Output directory (overrides outputDir)")
  .option("-f, --format <format>", "Output format (overrides format)")
  .option("--concurrency <n>", "Platforms translated at the same time", parseConcurrency)
  .option("--fail-on-error", "Exit with code 1 when errors were reported")
  .action(generateCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report a fatal error and exit
 */
function handleError(error: unknown): void {
  if (error instanceof StageFailure) {
    logger.error({ err: error, stage: error.stage }, "Generation aborted");
    console.error(chalk.red(`\nGeneration aborted while "${error.stage}": ${error.message}`));
    console.error(chalk.dim(`  [${error.code}]`));
  } else if (isPolydocError(error)) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\n${error.name}: ${error.message}`));
    console.error(chalk.dim(`  [${error.code}]`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  if (error instanceof Error && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
