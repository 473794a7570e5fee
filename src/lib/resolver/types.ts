/**
 * Resolver module types
 */

import type { Interface, TypeAlias } from "../../types/meta-model.js";

export type Declaration =
  | { kind: "alias"; declaration: TypeAlias }
  | { kind: "interface"; declaration: Interface };

/**
 * Declarations emitted together because everything they depend on was
 * emitted by an earlier wave
 */
export type Wave = Declaration[];
