/**
 * Emitter module types
 */

import type { ArtifactKind } from "../../types/config.js";

export interface Artifact {
  kind: ArtifactKind;
  fileName: string;
  content: string;
}

export interface WrittenArtifact {
  kind: ArtifactKind;
  path: string;
  bytes: number;
}
