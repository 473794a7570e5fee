/**
 * Loader module - reads a model document (JSON or YAML), validates it with Ajv
 * and builds the in-memory meta-model
 */

import fs from "fs/promises";
import { extname } from "path";
import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import { parse as parseYaml } from "yaml";
import type {
  Enumeration,
  Interface,
  Member,
  Model,
  Property,
  UnionAlternative,
} from "../../types/meta-model.js";
import type { GeneratorConfig } from "../../types/config.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../types/config.js";
import type {
  EnumerationDocument,
  InterfaceDocument,
  MemberDocument,
  ModelDocument,
  ModelDocumentFormat,
  PropertyDocument,
  UnionAlternativeDocument,
} from "./types.js";
import { modelDocumentSchema } from "./model-schema.js";
import { FileIOError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export { modelDocumentSchema } from "./model-schema.js";

let validateFn: ValidateFunction<ModelDocument> | null = null;

function getValidator(): ValidateFunction<ModelDocument> {
  if (!validateFn) {
    const ajv = new Ajv({ strict: false, allErrors: true });
    validateFn = ajv.compile<ModelDocument>(modelDocumentSchema);
  }
  return validateFn;
}

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
  );
}

/**
 * Determine the document format from a file extension
 */
export function detectFormat(filePath: string): ModelDocumentFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".yaml" || extension === ".yml") {
    return "yaml";
  }
  if (extension === ".json") {
    return "json";
  }
  throw new ValidationError(
    `Unsupported model file format: ${filePath}. Must be .json, .yaml, or .yml`,
    { filePath },
  );
}

/**
 * Parse and validate a model document from text
 */
export function parseModelDocument(
  content: string,
  format: ModelDocumentFormat,
): ModelDocument {
  let data: unknown;
  try {
    data = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Model document is not valid ${format.toUpperCase()}`,
      undefined,
      { cause: error },
    );
  }

  const validate = getValidator();
  if (!validate(data)) {
    const errors = formatAjvErrors(validate.errors);
    throw new ValidationError("Model document does not match the schema", {
      errors,
    });
  }
  return data;
}

/**
 * Read a model document from disk
 */
export async function loadModelDocument(filePath: string): Promise<ModelDocument> {
  const format = detectFormat(filePath);

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(
      `Failed to read model file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  const document = parseModelDocument(content, format);
  logger.info("Loaded model document", {
    filePath,
    enumerations: document.enumerations?.length ?? 0,
    typeAliases: document.typeAliases?.length ?? 0,
    interfaces: document.interfaces?.length ?? 0,
  });
  return document;
}

function buildEnumeration(doc: EnumerationDocument): Enumeration {
  return {
    name: doc.name,
    documentation: doc.documentation ?? "",
    kind: doc.type,
    values: doc.values.map((value) => ({
      name: value.name,
      value: String(value.value),
      documentation: value.documentation ?? "",
      ...(value.deprecated === undefined || value.deprecated === false
        ? {}
        : { deprecated: value.deprecated === true ? "" : value.deprecated }),
    })),
  };
}

function buildAlternative(doc: UnionAlternativeDocument): UnionAlternative {
  return {
    type: doc.type,
    deprecated: doc.deprecated ?? false,
    ...(doc.since !== undefined ? { since: doc.since } : {}),
    documentation: doc.documentation ?? "",
  };
}

function isInterfaceDocument(doc: MemberDocument): doc is InterfaceDocument {
  return "members" in doc;
}

function buildProperty(doc: PropertyDocument): Property {
  return {
    name: doc.name,
    optional: doc.optional ?? false,
    documentation: doc.documentation ?? "",
    type: doc.type,
    kind: doc.kind ?? "plain",
    alternatives: (doc.alternatives ?? []).map(buildAlternative),
  };
}

function buildInterface(doc: InterfaceDocument): Interface {
  return {
    name: doc.name,
    documentation: doc.documentation ?? "",
    extends: [...(doc.extends ?? [])],
    members: (doc.members ?? []).map(buildMember),
    dependencies: new Set(doc.dependencies ?? []),
  };
}

function buildMember(doc: MemberDocument): Member {
  return isInterfaceDocument(doc) ? buildInterface(doc) : buildProperty(doc);
}

/**
 * Convert a validated document into the in-memory model
 */
export function buildModel(
  document: ModelDocument,
  config: Pick<GeneratorConfig, "unitType"> = DEFAULT_GENERATOR_CONFIG,
): Model {
  return {
    enumerations: (document.enumerations ?? []).map(buildEnumeration),
    typeAliases: (document.typeAliases ?? []).map((alias) => ({
      name: alias.name,
      documentation: alias.documentation ?? "",
      value: alias.value,
      dependencies: new Set(alias.dependencies ?? []),
    })),
    interfaces: (document.interfaces ?? []).map(buildInterface),
    notifications: (document.notifications ?? []).map((notification) => ({
      method: notification.method,
      ...(notification.params !== undefined ? { params: notification.params } : {}),
    })),
    requests: (document.requests ?? []).map((request) => ({
      method: request.method,
      ...(request.params !== undefined ? { params: request.params } : {}),
      ...(request.result !== undefined ? { result: request.result } : {}),
      errorData: request.errorData ?? config.unitType,
    })),
  };
}

/**
 * Load, validate and build a model from a file
 */
export async function loadModel(
  filePath: string,
  config: Pick<GeneratorConfig, "unitType"> = DEFAULT_GENERATOR_CONFIG,
): Promise<Model> {
  return buildModel(await loadModelDocument(filePath), config);
}
