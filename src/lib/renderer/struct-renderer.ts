/**
 * Struct renderer - type aliases and interfaces as C++ declarations
 */

import type { Interface, Property, TypeAlias } from "../../types/meta-model.js";
import { isInterface } from "../../types/meta-model.js";
import type { GeneratorConfig } from "../../types/config.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../types/config.js";
import { indentation, renderDocumentation } from "./cpp-syntax.js";
import { literalDocumentation, propertyShape } from "./property-policy.js";

export type StructRenderOptions = Pick<GeneratorConfig, "builtinAliases">;

/**
 * `using Name = value;`, or nothing for aliases of built-in primitives
 */
export function renderTypeAlias(
  alias: TypeAlias,
  options: StructRenderOptions = DEFAULT_GENERATOR_CONFIG,
): string {
  if (options.builtinAliases.includes(alias.name)) {
    return "";
  }
  return `${renderDocumentation(alias.documentation)}using ${alias.name} = ${alias.value};\n`;
}

export function renderProperty(
  property: Property,
  enclosingName: string,
  depth = 1,
): string {
  const shape = propertyShape(property, enclosingName);
  const documentation = renderDocumentation(
    property.documentation,
    depth,
    literalDocumentation(property),
  );
  const prefix = indentation(depth);

  switch (shape.shape) {
    case "constant":
      return `${documentation}${prefix}static inline const std::string ${property.name} = ${shape.literal};\n`;
    case "indirection":
    case "optional":
    case "field":
      return `${documentation}${prefix}${shape.type} ${property.name};\n`;
  }
}

function renderBody(iface: Interface, depth: number): string {
  let body = "";
  // Nested structs must be complete before members use them
  for (const member of iface.members) {
    if (isInterface(member)) {
      body += renderStruct(member, depth);
    }
  }
  for (const member of iface.members) {
    if (!isInterface(member)) {
      body += renderProperty(member, iface.name, depth);
    }
  }
  return body;
}

function renderStruct(iface: Interface, depth: number): string {
  const prefix = indentation(depth);
  const bases =
    iface.extends.length > 0
      ? ` : ${iface.extends.map((base) => `public ${base}`).join(", ")}`
      : "";

  return (
    renderDocumentation(iface.documentation, depth) +
    `${prefix}struct ${iface.name}${bases}\n` +
    `${prefix}{\n` +
    renderBody(iface, depth + 1) +
    `${prefix}};\n`
  );
}

/**
 * Render a top-level interface and its nested interfaces as C++ structs
 */
export function renderInterface(iface: Interface): string {
  return renderStruct(iface, 0);
}
