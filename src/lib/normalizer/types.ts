/**
 * Normalizer module types
 */

import type { GeneratorConfig } from "../../types/config.js";

export type NormalizerOptions = Pick<
  GeneratorConfig,
  "renameEnums" | "frameworkReserved"
>;

/**
 * What a normalization pass changed, for logging
 */
export interface NormalizationReport {
  renamedEnumerations: number;
  duplicateEnumerations: number;
  reservedRemoved: number;
  shadowedAliases: number;
  prunedDependencies: number;
}
