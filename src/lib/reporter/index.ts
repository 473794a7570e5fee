/**
 * Reporter module - run manifests recording what a generation run read and wrote
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { ManifestArtifact, ReporterResult, RunManifest } from "./types.js";
import type { WrittenArtifact } from "../emitter/types.js";
import type { GenerationSummary } from "../generator/types.js";
import { pkg } from "../../version.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type { ManifestArtifact, ReporterResult, RunManifest } from "./types.js";

export const MANIFEST_FILE_NAME = "manifest.json";
export const MANIFEST_VERSION = "1.0.0";

/**
 * RunReporter collects artifact hashes for a single generation run
 */
export class RunReporter {
  private _manifest: RunManifest;

  constructor() {
    this._manifest = {
      version: MANIFEST_VERSION,
      tool: {
        name: pkg.name,
        version: pkg.version,
      },
      run: {
        id: crypto.randomBytes(8).toString("hex"),
        timestamp: new Date().toISOString(),
      },
      artifacts: [],
    };
  }

  /**
   * Calculate SHA-256 hash of a file
   */
  async calculateFileHash(filePath: string): Promise<string> {
    const fileBuffer = await fs.readFile(filePath);
    return crypto.createHash("sha256").update(fileBuffer).digest("hex");
  }

  async recordModel(modelPath: string): Promise<void> {
    const hash = await this.calculateFileHash(modelPath);
    this._manifest.model = { path: modelPath, hash };
    logger.debug("Model file recorded", { path: modelPath, hash });
  }

  async recordArtifact(artifact: WrittenArtifact): Promise<void> {
    const hash = await this.calculateFileHash(artifact.path);
    const entry: ManifestArtifact = { ...artifact, hash };
    this._manifest.artifacts.push(entry);
    logger.debug("Artifact recorded", { ...entry });
  }

  recordSummary(summary: GenerationSummary): void {
    this._manifest.summary = { ...summary };
  }

  /**
   * Get current manifest
   */
  getManifest(): RunManifest {
    return { ...this._manifest, artifacts: [...this._manifest.artifacts] };
  }

  /**
   * Save manifest to JSON file
   */
  async save(outputDir: string): Promise<ReporterResult> {
    const manifestPath = path.join(outputDir, MANIFEST_FILE_NAME);
    try {
      await fs.writeFile(manifestPath, JSON.stringify(this._manifest, null, 2) + "\n");
    } catch (error) {
      throw new FileIOError(
        `Failed to write run manifest: ${manifestPath}`,
        { path: manifestPath },
        { cause: error },
      );
    }
    logger.info("Run manifest saved", { path: manifestPath });
    return { manifest: this.getManifest(), path: manifestPath };
  }
}
