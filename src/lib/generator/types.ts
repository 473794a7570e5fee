/**
 * Generator module types
 */

import type { GeneratorConfig } from "../../types/config.js";
import type { Artifact, WrittenArtifact } from "../emitter/types.js";

export interface GeneratorOptions {
  config?: GeneratorConfig;
}

export interface GenerationSummary {
  enumerations: number;
  typeAliases: number;
  interfaces: number;
  notifications: number;
  requests: number;
  /** Sizes of the dependency waves, in emission order */
  waves: number[];
}

export interface GenerationResult {
  artifacts: Artifact[];
  summary: GenerationSummary;
}

export interface RunOptions {
  modelPath: string;
  outputDir: string;
  /** Write a manifest.json with artifact hashes next to the artifacts */
  manifest?: boolean;
}

export interface RunResult {
  written: WrittenArtifact[];
  summary: GenerationSummary;
  manifestPath?: string;
}
