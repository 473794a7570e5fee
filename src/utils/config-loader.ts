/**
 * Configuration loader for the generator tables and output layout
 */

import {
  ARTIFACT_KINDS,
  type ArtifactConfig,
  type ArtifactKind,
  DEFAULT_GENERATOR_CONFIG,
  type GeneratorConfig,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options that override generator configuration
 */
export interface GeneratorCliOptions {
  namespace?: string;
}

/**
 * Config file section for the generator
 */
export interface GeneratorConfigSection {
  generatorName?: string;
  namespace?: string;
  unitType?: string;
  artifacts?: Partial<Record<ArtifactKind, Partial<ArtifactConfig>>>;
  renameEnums?: Record<string, string>;
  frameworkReserved?: string[];
  builtinAliases?: string[];
  bindingExceptions?: string[];
  reservedMethodPrefixes?: string[];
}

const NAMESPACE_PATTERN = /^[A-Za-z_]\w*(::[A-Za-z_]\w*)*$/;

function mergeArtifact(
  kind: ArtifactKind,
  section: GeneratorConfigSection["artifacts"] = {},
): ArtifactConfig {
  const defaults = DEFAULT_GENERATOR_CONFIG.artifacts[kind];
  const override = section[kind] ?? {};
  return {
    fileName: override.fileName ?? defaults.fileName,
    includes: [...(override.includes ?? defaults.includes)],
  };
}

function mergeArtifacts(
  section: GeneratorConfigSection["artifacts"],
): Record<ArtifactKind, ArtifactConfig> {
  return {
    declarations: mergeArtifact("declarations", section),
    bindings: mergeArtifact("bindings", section),
    notifications: mergeArtifact("notifications", section),
    requests: mergeArtifact("requests", section),
  };
}

/**
 * Load generator configuration from CLI options and config file
 *
 * Precedence: CLI > config file > defaults. Lists and the rename table from the
 * config file replace the defaults rather than extending them.
 *
 * @example
 * const config = loadGeneratorConfig(
 *   { namespace: "Proto" },
 *   { namespace: "Lsp", bindingExceptions: [] }
 * );
 * // Returns: config with namespace "Proto" and no binding exceptions
 */
export function loadGeneratorConfig(
  cliOptions: GeneratorCliOptions = {},
  configFile: GeneratorConfigSection = {},
): GeneratorConfig {
  const config: GeneratorConfig = {
    generatorName: configFile.generatorName ?? DEFAULT_GENERATOR_CONFIG.generatorName,
    namespace:
      cliOptions.namespace ??
      configFile.namespace ??
      DEFAULT_GENERATOR_CONFIG.namespace,
    unitType: configFile.unitType ?? DEFAULT_GENERATOR_CONFIG.unitType,
    artifacts: mergeArtifacts(configFile.artifacts),
    renameEnums: { ...(configFile.renameEnums ?? DEFAULT_GENERATOR_CONFIG.renameEnums) },
    frameworkReserved: [
      ...(configFile.frameworkReserved ?? DEFAULT_GENERATOR_CONFIG.frameworkReserved),
    ],
    builtinAliases: [
      ...(configFile.builtinAliases ?? DEFAULT_GENERATOR_CONFIG.builtinAliases),
    ],
    bindingExceptions: [
      ...(configFile.bindingExceptions ?? DEFAULT_GENERATOR_CONFIG.bindingExceptions),
    ],
    reservedMethodPrefixes: [
      ...(configFile.reservedMethodPrefixes ??
        DEFAULT_GENERATOR_CONFIG.reservedMethodPrefixes),
    ],
  };

  validateGeneratorConfig(config);

  logger.debug("Generator config loaded", {
    namespace: config.namespace,
    frameworkReserved: config.frameworkReserved.length,
    bindingExceptions: config.bindingExceptions.length,
  });

  return config;
}

/**
 * Validate generator configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateGeneratorConfig(config: GeneratorConfig): void {
  if (config.generatorName.trim() === "") {
    throw new ConfigError("generatorName must not be empty");
  }

  if (!NAMESPACE_PATTERN.test(config.namespace)) {
    throw new ConfigError(`Invalid C++ namespace: ${config.namespace}`, {
      namespace: config.namespace,
    });
  }

  if (config.unitType.trim() === "") {
    throw new ConfigError("unitType must not be empty");
  }

  const fileNames = new Set<string>();
  for (const kind of ARTIFACT_KINDS) {
    const { fileName } = config.artifacts[kind];
    if (fileName.trim() === "") {
      throw new ConfigError(`Artifact file name for ${kind} must not be empty`);
    }
    if (fileNames.has(fileName)) {
      throw new ConfigError(`Duplicate artifact file name: ${fileName}`, {
        fileName,
      });
    }
    fileNames.add(fileName);
  }

  // A chained rename would make normalization non-idempotent
  for (const [from, to] of Object.entries(config.renameEnums)) {
    if (Object.hasOwn(config.renameEnums, to)) {
      throw new ConfigError(
        `Enum rename target ${to} (from ${from}) is itself renamed`,
        { from, to },
      );
    }
  }
}
