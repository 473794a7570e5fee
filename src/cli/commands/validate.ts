/**
 * Validate command - check that a model loads, normalizes and orders cleanly
 */

import { Command } from "commander";
import type { ValidateCommandOptions } from "../config/types.js";
import { applyLogLevel, exitWithError, readConfigFile } from "./shared.js";
import { CodeGenerator } from "../../lib/generator/index.js";
import type { GenerationSummary } from "../../lib/generator/types.js";
import { loadModel } from "../../lib/loader/index.js";
import { loadGeneratorConfig } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";

/**
 * Run validation without printing or exiting
 */
export async function runValidate(
  options: ValidateCommandOptions,
): Promise<GenerationSummary> {
  applyLogLevel(options.logLevel);

  const configFile = readConfigFile(options.config);
  const generatorConfig = loadGeneratorConfig({}, configFile.generator);
  const modelPath = options.model ?? configFile.validate?.model;
  if (!modelPath) {
    throw new ConfigError("Missing required model file: --model");
  }

  const generator = new CodeGenerator({ config: generatorConfig });
  const model = await loadModel(modelPath, generatorConfig);
  return generator.summarize(generator.prepare(model));
}

async function executeValidate(options: ValidateCommandOptions): Promise<void> {
  try {
    const summary = await runValidate(options);
    console.log(
      JSON.stringify({ status: "success", phase: "validation", summary }, null, 2),
    );
    process.exit(0);
  } catch (error) {
    exitWithError(error, "validation");
  }
}

/**
 * Create validate command
 */
export function createValidateCommand(): Command {
  const command = new Command("validate");

  command
    .description("Load and normalize a model document and resolve its declaration order")
    .option("--model <path>", "Model document (JSON/YAML)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeValidate);

  return command;
}
