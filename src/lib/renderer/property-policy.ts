/**
 * Per-property shape policy: decides how a meta-model property becomes a
 * C++ member
 */

import type { Property, UnionAlternative } from "../../types/meta-model.js";
import { ModelConsistencyError } from "../../utils/errors.js";
import {
  isQuotedLiteral,
  optionalOf,
  toCppStringLiteral,
  uniquePtrOf,
  variantOf,
} from "./cpp-syntax.js";

export type PropertyShape =
  | { shape: "indirection"; type: string }
  | { shape: "optional"; type: string }
  | { shape: "constant"; literal: string }
  | { shape: "field"; type: string };

/**
 * Compare dotted versions segment by segment; numeric segments compare as
 * numbers. A missing version sorts first.
 */
export function compareVersions(left?: string, right?: string): number {
  if (left === right) return 0;
  if (left === undefined) return -1;
  if (right === undefined) return 1;

  const leftParts = left.split(".");
  const rightParts = right.split(".");
  const length = Math.max(leftParts.length, rightParts.length);

  for (let i = 0; i < length; i++) {
    const a = leftParts[i] ?? "0";
    const b = rightParts[i] ?? "0";
    const numericA = Number(a);
    const numericB = Number(b);
    if (Number.isInteger(numericA) && Number.isInteger(numericB)) {
      if (numericA !== numericB) return numericA - numericB;
    } else if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Stable reorder of union arms: non-deprecated first, then by ascending
 * introduction version. Decoders try arms in this order and keep the first
 * that fits.
 */
export function orderAlternatives(
  alternatives: readonly UnionAlternative[],
): UnionAlternative[] {
  return [...alternatives].sort((left, right) => {
    if (left.deprecated !== right.deprecated) {
      return left.deprecated ? 1 : -1;
    }
    return compareVersions(left.since, right.since);
  });
}

function inconsistent(
  message: string,
  property: Property,
  enclosingName: string,
): ModelConsistencyError {
  return new ModelConsistencyError(message, {
    property: property.name,
    enclosing: enclosingName,
    kind: property.kind,
    type: property.type,
  });
}

/**
 * Reject properties whose kind tag contradicts the rest of the property
 */
export function assertPropertyConsistency(
  property: Property,
  enclosingName: string,
): void {
  const selfReference = property.type === enclosingName;

  switch (property.kind) {
    case "selfReferential":
      if (!selfReference) {
        throw inconsistent(
          `Property ${enclosingName}.${property.name} is tagged self-referential but has type ${property.type}`,
          property,
          enclosingName,
        );
      }
      break;
    case "literalConstant":
      if (selfReference) {
        throw inconsistent(
          `Property ${enclosingName}.${property.name} is both self-referential and a literal constant`,
          property,
          enclosingName,
        );
      }
      if (!isQuotedLiteral(property.type)) {
        throw inconsistent(
          `Literal constant ${enclosingName}.${property.name} is not a quoted string: ${property.type}`,
          property,
          enclosingName,
        );
      }
      return;
    case "union":
      if (selfReference) {
        throw inconsistent(
          `Property ${enclosingName}.${property.name} is both self-referential and a union`,
          property,
          enclosingName,
        );
      }
      if (property.alternatives.length === 0) {
        throw inconsistent(
          `Union ${enclosingName}.${property.name} has no alternatives`,
          property,
          enclosingName,
        );
      }
      return;
    case "plain":
      break;
  }

  if (property.alternatives.length > 0) {
    throw inconsistent(
      `Property ${enclosingName}.${property.name} of kind ${property.kind} cannot carry alternatives`,
      property,
      enclosingName,
    );
  }
}

/**
 * Decide the member shape for a property declared inside `enclosingName`
 */
export function propertyShape(
  property: Property,
  enclosingName: string,
): PropertyShape {
  assertPropertyConsistency(property, enclosingName);

  if (property.type === enclosingName) {
    return { shape: "indirection", type: uniquePtrOf(property.type) };
  }

  const isConstant = property.kind === "literalConstant";
  const type =
    property.kind === "union"
      ? variantOf(orderAlternatives(property.alternatives).map((alt) => alt.type))
      : isConstant
        ? "std::string"
        : property.type;

  if (property.optional) {
    return { shape: "optional", type: optionalOf(type) };
  }
  if (isConstant) {
    return { shape: "constant", literal: toCppStringLiteral(property.type) };
  }
  return { shape: "field", type };
}

/**
 * Documentation lines describing the tags a literal constant may hold
 */
export function literalDocumentation(property: Property): string[] {
  if (property.kind !== "literalConstant") {
    return [];
  }
  const lines = property.alternatives.map(
    (alternative) => `Alternative: ${toCppStringLiteral(alternative.type)}`,
  );
  if (property.optional) {
    lines.unshift(`Expected value: ${toCppStringLiteral(property.type)}`);
  }
  return lines;
}
