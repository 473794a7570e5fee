/**
 * JSON Schema for config files
 */

const stringList = { type: "array", items: { type: "string", minLength: 1 } } as const;

const artifact = {
  type: "object",
  additionalProperties: false,
  properties: {
    fileName: { type: "string", minLength: 1 },
    includes: stringList,
  },
} as const;

export const configFileSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    generator: {
      type: "object",
      additionalProperties: false,
      properties: {
        generatorName: { type: "string", minLength: 1 },
        namespace: { type: "string", minLength: 1 },
        unitType: { type: "string", minLength: 1 },
        artifacts: {
          type: "object",
          additionalProperties: false,
          properties: {
            declarations: artifact,
            bindings: artifact,
            notifications: artifact,
            requests: artifact,
          },
        },
        renameEnums: {
          type: "object",
          additionalProperties: { type: "string", minLength: 1 },
        },
        frameworkReserved: stringList,
        builtinAliases: stringList,
        bindingExceptions: stringList,
        reservedMethodPrefixes: stringList,
      },
    },
    generate: {
      type: "object",
      additionalProperties: false,
      properties: {
        model: { type: "string", minLength: 1 },
        outputDir: { type: "string", minLength: 1 },
        manifest: { type: "boolean" },
      },
    },
    validate: {
      type: "object",
      additionalProperties: false,
      properties: {
        model: { type: "string", minLength: 1 },
      },
    },
  },
} as const;
