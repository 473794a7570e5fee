/**
 * JSON Schema (draft-07) for model documents
 */

const documentation = { type: "string" } as const;
const nameList = { type: "array", items: { type: "string", minLength: 1 } } as const;

export const modelDocumentSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: false,
  properties: {
    enumerations: { type: "array", items: { $ref: "#/definitions/enumeration" } },
    typeAliases: { type: "array", items: { $ref: "#/definitions/typeAlias" } },
    interfaces: { type: "array", items: { $ref: "#/definitions/interface" } },
    notifications: { type: "array", items: { $ref: "#/definitions/notification" } },
    requests: { type: "array", items: { $ref: "#/definitions/request" } },
  },
  definitions: {
    enumeration: {
      type: "object",
      additionalProperties: false,
      required: ["name", "type", "values"],
      properties: {
        name: { type: "string", minLength: 1 },
        documentation,
        type: { enum: ["numeric", "string"] },
        values: {
          type: "array",
          items: {
            type: "object",
            additionalProperties: false,
            required: ["name", "value"],
            properties: {
              name: { type: "string", minLength: 1 },
              value: { type: ["string", "number"] },
              documentation,
              deprecated: { type: ["string", "boolean"] },
            },
          },
        },
      },
    },
    typeAlias: {
      type: "object",
      additionalProperties: false,
      required: ["name", "value"],
      properties: {
        name: { type: "string", minLength: 1 },
        documentation,
        value: { type: "string", minLength: 1 },
        dependencies: nameList,
      },
    },
    alternative: {
      type: "object",
      additionalProperties: false,
      required: ["type"],
      properties: {
        type: { type: "string", minLength: 1 },
        deprecated: { type: "boolean" },
        since: { type: "string" },
        documentation,
      },
    },
    property: {
      type: "object",
      additionalProperties: false,
      required: ["name", "type"],
      properties: {
        name: { type: "string", minLength: 1 },
        type: { type: "string" },
        optional: { type: "boolean" },
        documentation,
        kind: { enum: ["plain", "selfReferential", "literalConstant", "union"] },
        alternatives: { type: "array", items: { $ref: "#/definitions/alternative" } },
      },
    },
    interface: {
      type: "object",
      additionalProperties: false,
      required: ["name"],
      properties: {
        name: { type: "string", minLength: 1 },
        documentation,
        extends: nameList,
        members: {
          type: "array",
          items: {
            oneOf: [
              { $ref: "#/definitions/property" },
              { allOf: [{ $ref: "#/definitions/interface" }, { required: ["members"] }] },
            ],
          },
        },
        dependencies: nameList,
      },
    },
    notification: {
      type: "object",
      additionalProperties: false,
      required: ["method"],
      properties: {
        method: { type: "string", minLength: 1 },
        params: { type: "string", minLength: 1 },
      },
    },
    request: {
      type: "object",
      additionalProperties: false,
      required: ["method"],
      properties: {
        method: { type: "string", minLength: 1 },
        params: { type: "string", minLength: 1 },
        result: { type: "string", minLength: 1 },
        errorData: { type: "string", minLength: 1 },
      },
    },
  },
} as const;
