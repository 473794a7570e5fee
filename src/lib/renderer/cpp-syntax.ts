/**
 * Small C++ text helpers shared by the renderers
 */

export const INDENT = "    ";

export function indentation(depth: number): string {
  return INDENT.repeat(depth);
}

/**
 * Render documentation as a `/** ... *\/` block, one line per source line
 */
export function renderDocumentation(
  documentation: string,
  depth = 0,
  extraLines: string[] = [],
): string {
  const lines = documentation === "" ? [] : documentation.split(/\r?\n/);
  lines.push(...extraLines);
  if (lines.length === 0) {
    return "";
  }

  const prefix = indentation(depth);
  const body = lines
    .map((line) => line.replace(/\*\//g, "*\\/"))
    .map((line) => (line.trim() === "" ? `${prefix} *` : `${prefix} * ${line}`))
    .join("\n");
  return `${prefix}/**\n${body}\n${prefix} */\n`;
}

export function isQuotedLiteral(text: string): boolean {
  if (text.length < 2) {
    return false;
  }
  const first = text[0];
  return (first === "'" || first === '"') && text[text.length - 1] === first;
}

/**
 * Turn a raw or quoted literal into a C++ double-quoted string literal
 */
export function toCppStringLiteral(text: string): string {
  const raw = isQuotedLiteral(text) ? text.slice(1, -1) : text;
  const escaped = raw
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}

export function variantOf(types: string[]): string {
  return `std::variant<${types.join(", ")}>`;
}

export function optionalOf(type: string): string {
  return `std::optional<${type}>`;
}

export function uniquePtrOf(type: string): string {
  return `std::unique_ptr<${type}>`;
}
