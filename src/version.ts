export const pkg = {
  name: "lsp-specgen",
  version: "0.1.0",
  description:
    "Generate C++ protocol types, JSON bindings and message declarations from a protocol meta-model",
} as const;
