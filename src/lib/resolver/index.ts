/**
 * Resolver module - orders type aliases and interfaces so that every
 * declaration follows everything it depends on
 */

import type { Interface, TypeAlias } from "../../types/meta-model.js";
import type { Declaration, Wave } from "./types.js";
import {
  DependencyCycleError,
  UnresolvedReferenceError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

interface Pending {
  declaration: Declaration;
  remaining: Set<string>;
}

function toPending(declaration: Declaration): Pending {
  const { name, dependencies } = declaration.declaration;
  // A self-reference is broken by the renderer, never by ordering
  return {
    declaration,
    remaining: new Set([...dependencies].filter((dependency) => dependency !== name)),
  };
}

function nameOf(pending: Pending): string {
  return pending.declaration.declaration.name;
}

/**
 * Split into [ready, blocked], preserving relative order in both
 */
function partitionReady(items: Pending[]): [Pending[], Pending[]] {
  const ready: Pending[] = [];
  const blocked: Pending[] = [];
  for (const item of items) {
    (item.remaining.size === 0 ? ready : blocked).push(item);
  }
  return [ready, blocked];
}

/**
 * Follow dependencies from the first blocked declaration until one repeats
 */
function findCycle(blocked: Pending[]): string[] {
  const byName = new Map(blocked.map((item) => [nameOf(item), item]));
  const path: string[] = [];
  let current: Pending | undefined = blocked[0];

  while (current) {
    const name = nameOf(current);
    const seenAt = path.indexOf(name);
    if (seenAt !== -1) {
      return path.slice(seenAt);
    }
    path.push(name);
    const [next]: Set<string> = current.remaining;
    current = next === undefined ? undefined : byName.get(next);
  }
  return path;
}

function explainBlocked(blocked: Pending[], known: Set<string>): Error {
  for (const item of blocked) {
    for (const dependency of item.remaining) {
      if (!known.has(dependency)) {
        return new UnresolvedReferenceError(nameOf(item), dependency);
      }
    }
  }
  return new DependencyCycleError(findCycle(blocked));
}

/**
 * Group declarations into dependency waves.
 *
 * Each iteration emits every alias with no pending dependency, then every such
 * interface, both in input order, and prunes the emitted names from the rest.
 * Inputs are not modified.
 *
 * @throws UnresolvedReferenceError when a dependency names no known declaration
 * @throws DependencyCycleError when the remaining declarations depend on each other
 */
export function resolveWaves(
  aliases: readonly TypeAlias[],
  interfaces: readonly Interface[],
): Wave[] {
  let pendingAliases = aliases.map((declaration) =>
    toPending({ kind: "alias", declaration }),
  );
  let pendingInterfaces = interfaces.map((declaration) =>
    toPending({ kind: "interface", declaration }),
  );
  const known = new Set([...aliases, ...interfaces].map((item) => item.name));
  const waves: Wave[] = [];

  while (pendingAliases.length > 0 || pendingInterfaces.length > 0) {
    const [readyAliases, blockedAliases] = partitionReady(pendingAliases);
    const [readyInterfaces, blockedInterfaces] = partitionReady(pendingInterfaces);
    const ready = [...readyAliases, ...readyInterfaces];
    const blocked = [...blockedAliases, ...blockedInterfaces];

    if (ready.length === 0) {
      throw explainBlocked(blocked, known);
    }

    const emitted = ready.map(nameOf);
    for (const item of blocked) {
      for (const name of emitted) {
        item.remaining.delete(name);
      }
    }

    waves.push(ready.map((item) => item.declaration));
    pendingAliases = blockedAliases;
    pendingInterfaces = blockedInterfaces;
  }

  logger.debug("Dependency waves resolved", {
    waves: waves.length,
    declarations: aliases.length + interfaces.length,
  });

  return waves;
}

/**
 * Emission order for aliases and interfaces, interleaved wave by wave
 */
export function resolveOrder(
  aliases: readonly TypeAlias[],
  interfaces: readonly Interface[],
): Declaration[] {
  return resolveWaves(aliases, interfaces).flat();
}
