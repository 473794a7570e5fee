/**
 * Normalizer module - cleans the parsed meta-model before any code is derived
 * from it. Runs once, in place, and is idempotent.
 */

import type { Enumeration, Interface, Model } from "../../types/meta-model.js";
import { isInterface } from "../../types/meta-model.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../types/config.js";
import type { NormalizationReport, NormalizerOptions } from "./types.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

const READONLY_PREFIX = "readonly ";
const OPTIONAL_MARKER = "?";

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Remove one pair of matching quotes around a string literal
 */
export function stripLiteralQuotes(text: string): string {
  if (text.length >= 2) {
    const first = text[0];
    if ((first === "'" || first === '"') && text[text.length - 1] === first) {
      return text.slice(1, -1);
    }
  }
  return text;
}

function stripOptionalMarker(name: string): { name: string; optional: boolean } {
  if (name.endsWith(OPTIONAL_MARKER)) {
    return { name: name.slice(0, -OPTIONAL_MARKER.length), optional: true };
  }
  return { name, optional: false };
}

/**
 * Strip `readonly ` and `?` decorations left in member names by the parser
 */
function cleanMemberNames(iface: Interface): void {
  for (const member of iface.members) {
    if (isInterface(member)) {
      member.name = stripOptionalMarker(member.name).name;
      cleanMemberNames(member);
      continue;
    }

    let name = member.name;
    if (name.startsWith(READONLY_PREFIX)) {
      name = name.slice(READONLY_PREFIX.length);
    }
    const stripped = stripOptionalMarker(name);
    member.name = stripped.name;
    member.optional = member.optional || stripped.optional;
  }
}

function dedupeEnumerations(enumerations: Enumeration[]): Enumeration[] {
  const seen = new Set<string>();
  return enumerations.filter((enumeration) => {
    if (seen.has(enumeration.name)) {
      return false;
    }
    seen.add(enumeration.name);
    return true;
  });
}

function normalizeEnumerationValues(enumeration: Enumeration): void {
  for (const value of enumeration.values) {
    value.name = capitalize(value.name);
    value.value =
      enumeration.kind === "string"
        ? stripLiteralQuotes(value.value)
        : capitalize(value.value);
  }
}

/**
 * Normalize the model in place and report what changed
 */
export function normalizeWithReport(
  model: Model,
  options: NormalizerOptions = DEFAULT_GENERATOR_CONFIG,
): NormalizationReport {
  const report: NormalizationReport = {
    renamedEnumerations: 0,
    duplicateEnumerations: 0,
    reservedRemoved: 0,
    shadowedAliases: 0,
    prunedDependencies: 0,
  };

  for (const iface of model.interfaces) {
    cleanMemberNames(iface);
  }

  // Rename before dedup: a rename may introduce a duplicate
  const renames = new Map(Object.entries(options.renameEnums));
  for (const enumeration of model.enumerations) {
    const renamed = renames.get(enumeration.name);
    if (renamed !== undefined) {
      enumeration.name = renamed;
      report.renamedEnumerations++;
    }
  }

  const uniqueEnumerations = dedupeEnumerations(model.enumerations);
  report.duplicateEnumerations =
    model.enumerations.length - uniqueEnumerations.length;
  model.enumerations = uniqueEnumerations;

  for (const enumeration of model.enumerations) {
    normalizeEnumerationValues(enumeration);
  }

  const reserved = new Set(options.frameworkReserved);
  const interfaceCount = model.interfaces.length;
  const aliasCount = model.typeAliases.length;
  model.interfaces = model.interfaces.filter((iface) => !reserved.has(iface.name));
  model.typeAliases = model.typeAliases.filter((alias) => !reserved.has(alias.name));
  report.reservedRemoved =
    interfaceCount - model.interfaces.length + aliasCount - model.typeAliases.length;

  const enumNames = new Set(model.enumerations.map((enumeration) => enumeration.name));
  const shadowing = new Set([
    ...enumNames,
    ...model.interfaces.map((iface) => iface.name),
  ]);
  const remainingAliases = model.typeAliases.filter(
    (alias) => !shadowing.has(alias.name),
  );
  report.shadowedAliases = model.typeAliases.length - remainingAliases.length;
  model.typeAliases = remainingAliases;

  // Enumerations and runtime-supplied names are available before the first wave
  const satisfied = new Set([...enumNames, ...reserved]);
  for (const declaration of [...model.typeAliases, ...model.interfaces]) {
    for (const dependency of [...declaration.dependencies]) {
      if (satisfied.has(dependency)) {
        declaration.dependencies.delete(dependency);
        report.prunedDependencies++;
      }
    }
  }

  return report;
}

/**
 * Normalize the model in place
 */
export function normalize(
  model: Model,
  options: NormalizerOptions = DEFAULT_GENERATOR_CONFIG,
): void {
  logger.info("Normalizing model", {
    enumerations: model.enumerations.length,
    typeAliases: model.typeAliases.length,
    interfaces: model.interfaces.length,
  });

  const report = normalizeWithReport(model, options);

  logger.info("Normalization complete", report);
}

