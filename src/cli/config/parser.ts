/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import type { SpecGenConfigFile } from "./types.js";
import { configFileSchema } from "./schema.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const validateConfigFile = new Ajv({ strict: false, allErrors: true }).compile<SpecGenConfigFile>(
  configFileSchema,
);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SpecGenConfigFile {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let data: unknown;
  try {
    // An empty YAML file parses to null
    data = (isYaml ? parseYaml(content) : JSON.parse(content)) ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  if (!validateConfigFile(data)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      filePath,
      errors: (validateConfigFile.errors ?? []).map(
        (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
      ),
    });
  }

  logger.info("Configuration file parsed successfully", {
    hasGeneratorConfig: !!data.generator,
    hasGenerateConfig: !!data.generate,
    hasValidateConfig: !!data.validate,
  });

  return data;
}
