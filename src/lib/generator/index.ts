/**
 * Generator module - runs normalization, ordering and rendering for one model
 */

import type { Model } from "../../types/meta-model.js";
import type { GeneratorConfig } from "../../types/config.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../types/config.js";
import type {
  GenerationResult,
  GenerationSummary,
  GeneratorOptions,
  RunOptions,
  RunResult,
} from "./types.js";
import type { Wave } from "../resolver/types.js";
import { normalize } from "../normalizer/index.js";
import { resolveWaves } from "../resolver/index.js";
import { assembleArtifacts } from "../emitter/assembler.js";
import { writeArtifacts } from "../emitter/artifact-writer.js";
import { loadModel } from "../loader/index.js";
import { RunReporter } from "../reporter/index.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export interface PreparedModel {
  model: Model;
  waves: Wave[];
}

/**
 * Main code generator class
 */
export class CodeGenerator {
  private config: GeneratorConfig;

  constructor(options: GeneratorOptions = {}) {
    this.config = options.config ?? DEFAULT_GENERATOR_CONFIG;
  }

  /**
   * Normalize the model in place and compute the declaration waves
   */
  prepare(model: Model): PreparedModel {
    normalize(model, this.config);
    const waves = resolveWaves(model.typeAliases, model.interfaces);
    logger.info("Declaration order resolved", {
      waves: waves.length,
      declarations: model.typeAliases.length + model.interfaces.length,
    });
    return { model, waves };
  }

  summarize({ model, waves }: PreparedModel): GenerationSummary {
    return {
      enumerations: model.enumerations.length,
      typeAliases: model.typeAliases.length,
      interfaces: model.interfaces.length,
      notifications: model.notifications.length,
      requests: model.requests.length,
      waves: waves.map((wave) => wave.length),
    };
  }

  /**
   * Generate all artifacts in memory
   */
  generate(model: Model): GenerationResult {
    const prepared = this.prepare(model);
    const artifacts = assembleArtifacts(
      prepared.model,
      prepared.waves.flat(),
      this.config,
    );

    logger.info("Generation complete", {
      artifacts: artifacts.map((artifact) => artifact.fileName),
    });
    return { artifacts, summary: this.summarize(prepared) };
  }

  /**
   * Load a model file, generate and write the artifacts
   */
  async run(options: RunOptions): Promise<RunResult> {
    const model = await loadModel(options.modelPath, this.config);
    const { artifacts, summary } = this.generate(model);
    const written = await writeArtifacts(artifacts, options.outputDir);

    if (!options.manifest) {
      return { written, summary };
    }

    const reporter = new RunReporter();
    await reporter.recordModel(options.modelPath);
    for (const artifact of written) {
      await reporter.recordArtifact(artifact);
    }
    reporter.recordSummary(summary);
    const { path: manifestPath } = await reporter.save(options.outputDir);

    return { written, summary, manifestPath };
  }
}

/**
 * Convenience function for one-off generation
 */
export function generateArtifacts(
  model: Model,
  config: GeneratorConfig = DEFAULT_GENERATOR_CONFIG,
): GenerationResult {
  return new CodeGenerator({ config }).generate(model);
}
