/**
 * Artifact assembler - turns the normalized model into the four header files
 */

import type { Model } from "../../types/meta-model.js";
import type { ArtifactKind, GeneratorConfig } from "../../types/config.js";
import type { Declaration } from "../resolver/types.js";
import type { Artifact } from "./types.js";
import { renderEnum } from "../renderer/enum-renderer.js";
import { renderInterface, renderTypeAlias } from "../renderer/struct-renderer.js";
import {
  createBindingContext,
  renderBinding,
  renderEnumBinding,
} from "../binding/index.js";
import {
  assertUniqueSymbols,
  renderNotification,
  renderRequest,
} from "../messages/index.js";

/**
 * Generated-file header, includes and the shared namespace around a body
 */
export function wrapArtifact(
  kind: ArtifactKind,
  body: string,
  config: GeneratorConfig,
): Artifact {
  const { fileName, includes } = config.artifacts[kind];
  const includeBlock =
    includes.length > 0
      ? includes.map((include) => `#include ${include}`).join("\n") + "\n\n"
      : "";

  const content =
    `// File generated by ${config.generatorName}\n` +
    `// DO NOT MAKE ANY CHANGES HERE\n` +
    `\n` +
    `#pragma once\n` +
    `\n` +
    includeBlock +
    `namespace ${config.namespace} {\n` +
    body +
    `}\n`;

  return { kind, fileName, content };
}

/**
 * Each non-empty block preceded by a blank line
 */
function joinBlocks(blocks: string[]): string {
  return blocks
    .filter((block) => block !== "")
    .map((block) => `\n${block}`)
    .join("");
}

function renderDeclaration(entry: Declaration, config: GeneratorConfig): string {
  return entry.kind === "alias"
    ? renderTypeAlias(entry.declaration, config)
    : renderInterface(entry.declaration);
}

export function assembleDeclarations(
  model: Model,
  order: readonly Declaration[],
  config: GeneratorConfig,
): Artifact {
  const body = joinBlocks([
    ...model.enumerations.map(renderEnum),
    ...order.map((entry) => renderDeclaration(entry, config)),
  ]);
  return wrapArtifact("declarations", body, config);
}

export function assembleBindings(model: Model, config: GeneratorConfig): Artifact {
  const context = createBindingContext(model.interfaces, config);
  const body = joinBlocks([
    ...model.enumerations.map(renderEnumBinding),
    ...model.interfaces.map((iface) => renderBinding(iface, context)),
  ]);
  return wrapArtifact("bindings", body, config);
}

export function assembleNotifications(model: Model, config: GeneratorConfig): Artifact {
  assertUniqueSymbols(
    model.notifications.map((notification) => notification.method),
    config.reservedMethodPrefixes,
  );
  const body = joinBlocks(
    model.notifications.map((notification) => renderNotification(notification, config)),
  );
  return wrapArtifact("notifications", body, config);
}

export function assembleRequests(model: Model, config: GeneratorConfig): Artifact {
  assertUniqueSymbols(
    model.requests.map((request) => request.method),
    config.reservedMethodPrefixes,
  );
  const body = joinBlocks(
    model.requests.map((request) => renderRequest(request, config)),
  );
  return wrapArtifact("requests", body, config);
}

/**
 * All four artifacts, in declarations/bindings/notifications/requests order
 */
export function assembleArtifacts(
  model: Model,
  order: readonly Declaration[],
  config: GeneratorConfig,
): Artifact[] {
  return [
    assembleDeclarations(model, order, config),
    assembleBindings(model, config),
    assembleNotifications(model, config),
    assembleRequests(model, config),
  ];
}
