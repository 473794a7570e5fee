/**
 * Messages module - name constants and message types for notifications and
 * requests
 */

import type { Notification, Request } from "../../types/meta-model.js";
import type { GeneratorConfig } from "../../types/config.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../types/config.js";
import { toCppStringLiteral } from "../renderer/cpp-syntax.js";
import { ModelConsistencyError } from "../../utils/errors.js";

export type MessageRenderOptions = Pick<
  GeneratorConfig,
  "unitType" | "reservedMethodPrefixes"
>;

/**
 * `window/showMessage` -> `ShowMessage`, `textDocument/didOpen` -> `TextDocumentDidOpen`
 */
export function symbolName(
  method: string,
  reservedPrefixes: readonly string[] = DEFAULT_GENERATOR_CONFIG.reservedMethodPrefixes,
): string {
  const segments = method.split("/");
  if (segments.length > 1 && reservedPrefixes.includes(segments[0])) {
    segments.shift();
  }

  const name = segments
    .filter((segment) => segment !== "")
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join("");

  if (name === "") {
    throw new ModelConsistencyError(`Cannot derive a symbol name from method ${method}`, {
      method,
    });
  }
  return name;
}

export function renderNotification(
  notification: Notification,
  options: MessageRenderOptions = DEFAULT_GENERATOR_CONFIG,
): string {
  const name = symbolName(notification.method, options.reservedMethodPrefixes);
  const params = notification.params ?? options.unitType;

  return (
    `inline constexpr char ${name}Name[] = ${toCppStringLiteral(notification.method)};\n` +
    `struct ${name}Notification : public NotificationMessage<${name}Name, ${params}>\n` +
    `{};\n`
  );
}

export function renderRequest(
  request: Request,
  options: MessageRenderOptions = DEFAULT_GENERATOR_CONFIG,
): string {
  const name = symbolName(request.method, options.reservedMethodPrefixes);
  const params = request.params ?? options.unitType;
  const result = request.result ?? options.unitType;

  return (
    `inline constexpr char ${name}Name[] = ${toCppStringLiteral(request.method)};\n` +
    `struct ${name}Request : public RequestMessage<${name}Name, ${params}, ${result}, ${request.errorData}>\n` +
    `{};\n`
  );
}

/**
 * Fail when two methods map to the same symbol
 */
export function assertUniqueSymbols(
  methods: readonly string[],
  reservedPrefixes: readonly string[],
): void {
  const seen = new Map<string, string>();
  for (const method of methods) {
    const name = symbolName(method, reservedPrefixes);
    const previous = seen.get(name);
    if (previous !== undefined) {
      throw new ModelConsistencyError(
        `Methods ${previous} and ${method} both map to symbol ${name}`,
        { symbol: name, methods: [previous, method] },
      );
    }
    seen.set(name, method);
  }
}
