/**
 * Enum renderer
 */

import type { Enumeration, EnumerationValue } from "../../types/meta-model.js";
import { INDENT, renderDocumentation } from "./cpp-syntax.js";

function renderValue(enumeration: Enumeration, value: EnumerationValue): string {
  const deprecation =
    value.deprecated === undefined
      ? []
      : [value.deprecated === "" ? "@deprecated" : `@deprecated ${value.deprecated}`];
  const documentation = renderDocumentation(value.documentation, 1, deprecation);

  // String enumerators carry no value; the wire string lives in the binding
  return enumeration.kind === "string"
    ? `${documentation}${INDENT}${value.name},\n`
    : `${documentation}${INDENT}${value.name} = ${value.value},\n`;
}

export function renderEnum(enumeration: Enumeration): string {
  const values = enumeration.values
    .map((value) => renderValue(enumeration, value))
    .join("");
  return `${renderDocumentation(enumeration.documentation)}enum class ${enumeration.name} {\n${values}};\n`;
}
