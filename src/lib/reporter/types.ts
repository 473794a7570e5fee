/**
 * Reporter module types
 */

import type { ArtifactKind } from "../../types/config.js";
import type { GenerationSummary } from "../generator/types.js";

export interface ManifestArtifact {
  kind: ArtifactKind;
  path: string;
  hash: string;
  bytes: number;
}

export interface RunManifest {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    timestamp: string;
  };
  model?: {
    path: string;
    hash: string;
  };
  artifacts: ManifestArtifact[];
  summary?: GenerationSummary;
}

export interface ReporterResult {
  manifest: RunManifest;
  path: string;
}
