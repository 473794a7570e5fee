/**
 * Generate command - write C++ headers for a meta-model
 */

import { Command } from "commander";
import type {
  GenerateCommandOptions,
  GenerateConfig,
  GenerateConfigSection,
} from "../config/types.js";
import { applyLogLevel, exitWithError, readConfigFile } from "./shared.js";
import { CodeGenerator } from "../../lib/generator/index.js";
import type { RunResult } from "../../lib/generator/types.js";
import { loadGeneratorConfig } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const DEFAULT_OUTPUT_DIR = "./generated";

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeGenerateConfig(
  options: GenerateCommandOptions,
  configFile: GenerateConfigSection = {},
): GenerateConfig {
  const model = options.model ?? configFile.model;
  if (!model) {
    throw new ConfigError("Missing required model file: --model");
  }

  return {
    model,
    outputDir: options.outputDir ?? configFile.outputDir ?? DEFAULT_OUTPUT_DIR,
    manifest: options.manifest ?? configFile.manifest ?? false,
  };
}

/**
 * Run generation without printing or exiting
 */
export async function runGenerate(options: GenerateCommandOptions): Promise<RunResult> {
  applyLogLevel(options.logLevel);

  const configFile = readConfigFile(options.config);
  const generatorConfig = loadGeneratorConfig(
    { namespace: options.namespace },
    configFile.generator,
  );
  const config = mergeGenerateConfig(options, configFile.generate);

  logger.info("Starting generation", { config });

  const generator = new CodeGenerator({ config: generatorConfig });
  return generator.run({
    modelPath: config.model,
    outputDir: config.outputDir,
    manifest: config.manifest,
  });
}

/**
 * Execute generate command
 */
async function executeGenerate(options: GenerateCommandOptions): Promise<void> {
  const startTime = Date.now();

  try {
    const { written, summary, manifestPath } = await runGenerate(options);

    const result = {
      status: "success",
      phase: "generation",
      artifacts: Object.fromEntries(written.map((artifact) => [artifact.kind, artifact.path])),
      ...(manifestPath ? { manifest: manifestPath } : {}),
      summary: {
        ...summary,
        durationMs: Date.now() - startTime,
      },
    };

    console.log(JSON.stringify(result, null, 2));
    process.exit(0);
  } catch (error) {
    exitWithError(error, "generation");
  }
}

/**
 * Create generate command
 */
export function createGenerateCommand(): Command {
  const command = new Command("generate");

  command
    .description(
      "Generate C++ declarations, JSON bindings, notifications and requests from a model document",
    )
    .option("--model <path>", "Model document (JSON/YAML)")
    .option("--output-dir <path>", `Directory for generated headers (default: ${DEFAULT_OUTPUT_DIR})`)
    .option("--namespace <name>", "C++ namespace wrapping the generated code")
    .option("--manifest", "Write manifest.json with artifact hashes")
    .option("--no-manifest", "Do not write manifest.json (default)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeGenerate);

  return command;
}
