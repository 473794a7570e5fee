/**
 * CLI configuration types
 */

import type { GeneratorConfigSection } from "../../utils/config-loader.js";

/**
 * Generate command section of the config file
 */
export interface GenerateConfigSection {
  model?: string;
  outputDir?: string;
  manifest?: boolean;
}

/**
 * Validate command section of the config file
 */
export interface ValidateConfigSection {
  model?: string;
}

/**
 * Full config file (JSON/YAML)
 */
export interface SpecGenConfigFile {
  generator?: GeneratorConfigSection;
  generate?: GenerateConfigSection;
  validate?: ValidateConfigSection;
}

/**
 * Resolved generate command configuration
 */
export interface GenerateConfig {
  model: string;
  outputDir: string;
  manifest: boolean;
}

/**
 * Generate command CLI options
 */
export interface GenerateCommandOptions {
  model?: string;
  outputDir?: string;
  namespace?: string;
  manifest?: boolean;
  config?: string;
  logLevel?: string;
}

/**
 * Validate command CLI options
 */
export interface ValidateCommandOptions {
  model?: string;
  config?: string;
  logLevel?: string;
}
