#!/usr/bin/env node

/**
 * lsp-specgen CLI - meta-model driven C++ protocol code generation
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { createValidateCommand } from "./commands/validate.js";
import { pkg } from "../version.js";
import { logger } from "../utils/logger.js";

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version);

  program.addCommand(createGenerateCommand());
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(JSON.stringify({
    status: "error",
    error: {
      code: "UNEXPECTED_ERROR",
      message,
    },
  }, null, 2));
  process.exit(1);
});
