/**
 * Helpers shared by the CLI commands
 */

import { parseConfigFile } from "../config/parser.js";
import type { SpecGenConfigFile } from "../config/types.js";
import { ConfigError, ErrorCode, toSpecGenError } from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";

export function applyLogLevel(level: string | undefined): void {
  if (level === undefined) return;
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid log level: ${level}. Use error, warn, info or debug`, {
      level,
    });
  }
  logger.setLevel(level);
}

export function readConfigFile(path: string | undefined): SpecGenConfigFile {
  return path ? parseConfigFile(path) : {};
}

/**
 * Print the error response and exit; config errors exit with 2
 */
export function exitWithError(error: unknown, phase: string): never {
  const specGenError = toSpecGenError(error);
  console.error(JSON.stringify(specGenError.toResponse(phase), null, 2));
  process.exit(specGenError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
}
