/**
 * Generator configuration
 *
 * Every protocol-specific table lives here so the generator can be pointed at
 * another meta-model by configuration alone.
 */

export type ArtifactKind =
  | "declarations"
  | "bindings"
  | "notifications"
  | "requests";

export const ARTIFACT_KINDS: readonly ArtifactKind[] = [
  "declarations",
  "bindings",
  "notifications",
  "requests",
];

export interface ArtifactConfig {
  fileName: string;
  includes: string[];
}

export interface GeneratorConfig {
  /** Name written into the generated-file header */
  generatorName: string;
  namespace: string;
  /** Type used when a message has no params/result */
  unitType: string;
  artifacts: Record<ArtifactKind, ArtifactConfig>;
  /** Enumerations renamed to avoid clashing with result type names */
  renameEnums: Record<string, string>;
  /** Declarations the protocol runtime supplies itself */
  frameworkReserved: string[];
  /** Aliases of primitive types that are never emitted */
  builtinAliases: string[];
  /** Interfaces whose JSON binding is written by hand */
  bindingExceptions: string[];
  /** First method segments dropped when deriving message names */
  reservedMethodPrefixes: string[];
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  generatorName: "lsp-specgen",
  namespace: "Lsp",
  unitType: "std::nullptr_t",
  artifacts: {
    declarations: {
      fileName: "types.h",
      includes: [
        "<nlohmann/json.hpp>",
        "<memory>",
        "<optional>",
        "<string>",
        "<tuple>",
        "<unordered_map>",
        "<variant>",
      ],
    },
    bindings: {
      fileName: "types_json.h",
      includes: ['"json.h"', '"types.h"'],
    },
    notifications: {
      fileName: "notifications.h",
      includes: ['"notificationmessage.h"', '"types.h"'],
    },
    requests: {
      fileName: "requests.h",
      includes: ['"requestmessage.h"', '"types.h"'],
    },
  },
  renameEnums: { InitializeError: "InitializeErrorCodes" },
  frameworkReserved: [
    "Message",
    "RequestMessage",
    "ResponseMessage",
    "ResponseError",
    "NotificationMessage",
    "LSPObject",
    "LSPAny",
    "T",
  ],
  builtinAliases: ["integer", "uinteger", "decimal"],
  bindingExceptions: [
    "SelectionRange",
    "FormattingOptions",
    "ChangeAnnotationsType",
  ],
  reservedMethodPrefixes: ["$", "window", "client"],
};
