/**
 * Binding module - JSON (de)serialization macros for the generated structs
 * and string enums
 */

import type { Enumeration, Interface } from "../../types/meta-model.js";
import { isInterface } from "../../types/meta-model.js";
import type { GeneratorConfig } from "../../types/config.js";
import { INDENT, toCppStringLiteral } from "../renderer/cpp-syntax.js";

export interface BindingContext {
  /** Top-level interfaces, used to look up `extends` bases */
  interfaces: readonly Interface[];
  /** Interfaces whose binding is written by hand */
  exceptions: ReadonlySet<string>;
}

export function createBindingContext(
  interfaces: readonly Interface[],
  config: Pick<GeneratorConfig, "bindingExceptions">,
): BindingContext {
  return { interfaces, exceptions: new Set(config.bindingExceptions) };
}

function wireName(name: string): string {
  const withoutReadonly = name.startsWith("readonly ")
    ? name.slice("readonly ".length)
    : name;
  return withoutReadonly.endsWith("?")
    ? withoutReadonly.slice(0, -1)
    : withoutReadonly;
}

/**
 * Own property names in declared order, then each base's flattened list in
 * `extends` order. Bases that are not known interfaces contribute nothing.
 */
export function flattenProperties(
  iface: Interface,
  interfaces: readonly Interface[],
  visiting: ReadonlySet<string> = new Set(),
): string[] {
  const names = iface.members
    .filter((member) => !isInterface(member))
    .map((member) => wireName(member.name));

  const path = new Set(visiting).add(iface.name);
  for (const baseName of iface.extends) {
    if (path.has(baseName)) {
      continue;
    }
    const base = interfaces.find((candidate) => candidate.name === baseName);
    if (base) {
      names.push(...flattenProperties(base, interfaces, path));
    }
  }
  return names;
}

/**
 * Binding for an interface and, before it, for each nested interface.
 * Names are scoped with `::` below the top level.
 */
export function renderBinding(
  iface: Interface,
  context: BindingContext,
  parents: readonly string[] = [],
): string {
  const scopedName = [...parents, iface.name].join("::");
  if (context.exceptions.has(iface.name)) {
    return `JSONIFY_FWD(${scopedName})\n`;
  }

  let result = "";
  for (const member of iface.members) {
    if (isInterface(member)) {
      result += renderBinding(member, context, [...parents, iface.name]);
    }
  }

  const properties = flattenProperties(iface, context.interfaces);
  result +=
    properties.length === 0
      ? `JSONIFY_EMPTY(${scopedName})\n`
      : `JSONIFY(${scopedName}, ${properties.join(", ")})\n`;
  return result;
}

/**
 * Enumerator to wire-string table; only string enums have one
 */
export function renderEnumBinding(enumeration: Enumeration): string {
  if (enumeration.kind !== "string") {
    return "";
  }
  const entries = enumeration.values
    .map(
      (value) =>
        `${INDENT}{${enumeration.name}::${value.name}, ${toCppStringLiteral(value.value)}},\n`,
    )
    .join("");
  return `JSONIFY_ENUM(${enumeration.name}, {\n${entries}})\n`;
}
