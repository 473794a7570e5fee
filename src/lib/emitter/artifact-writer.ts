/**
 * Artifact writer - writes assembled artifacts to the output directory
 */

import fs from "fs/promises";
import path from "path";
import type { Artifact, WrittenArtifact } from "./types.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Write each artifact in order. The first failure is raised as a FileIOError;
 * files already written stay on disk.
 */
export async function writeArtifacts(
  artifacts: readonly Artifact[],
  outputDir: string,
): Promise<WrittenArtifact[]> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new FileIOError(
      `Failed to create output directory: ${outputDir}`,
      { outputDir },
      { cause: error },
    );
  }

  const written: WrittenArtifact[] = [];
  for (const artifact of artifacts) {
    const filePath = path.resolve(outputDir, artifact.fileName);
    try {
      await fs.writeFile(filePath, artifact.content, "utf-8");
    } catch (error) {
      throw new FileIOError(
        `Failed to write ${artifact.kind} artifact: ${filePath}`,
        { kind: artifact.kind, path: filePath },
        { cause: error },
      );
    }

    const bytes = Buffer.byteLength(artifact.content, "utf-8");
    logger.debug("Artifact written", { kind: artifact.kind, path: filePath, bytes });
    written.push({ kind: artifact.kind, path: filePath, bytes });
  }
  return written;
}
