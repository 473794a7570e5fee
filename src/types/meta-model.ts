/**
 * In-memory protocol meta-model
 *
 * Built once by the model loader, mutated once by the normalizer and read-only
 * for the rest of a generation run.
 */

export type EnumerationKind = "numeric" | "string";

export interface EnumerationValue {
  name: string;
  /** Literal text of the value: a number, a quoted string or another enumerator */
  value: string;
  documentation: string;
  /** Deprecation message; an empty string still marks the value deprecated */
  deprecated?: string;
}

export interface Enumeration {
  name: string;
  documentation: string;
  kind: EnumerationKind;
  values: EnumerationValue[];
}

export interface TypeAlias {
  name: string;
  documentation: string;
  /** Underlying C++ type expression */
  value: string;
  dependencies: Set<string>;
}

export type PropertyKind =
  | "plain"
  | "selfReferential"
  | "literalConstant"
  | "union";

export interface UnionAlternative {
  type: string;
  deprecated: boolean;
  /** Protocol version that introduced the alternative, e.g. "3.16.0" */
  since?: string;
  documentation: string;
}

export interface Property {
  name: string;
  optional: boolean;
  documentation: string;
  type: string;
  kind: PropertyKind;
  /**
   * Union arms for `union` properties; the other known tags for
   * `literalConstant` properties
   */
  alternatives: UnionAlternative[];
}

export interface Interface {
  name: string;
  documentation: string;
  extends: string[];
  members: Member[];
  dependencies: Set<string>;
}

export type Member = Property | Interface;

export interface Notification {
  method: string;
  params?: string;
}

export interface Request {
  method: string;
  params?: string;
  result?: string;
  errorData: string;
}

export interface Model {
  enumerations: Enumeration[];
  typeAliases: TypeAlias[];
  interfaces: Interface[];
  notifications: Notification[];
  requests: Request[];
}

export function isInterface(member: Member): member is Interface {
  return "members" in member;
}

export function isProperty(member: Member): member is Property {
  return !isInterface(member);
}

export function createEmptyModel(): Model {
  return {
    enumerations: [],
    typeAliases: [],
    interfaces: [],
    notifications: [],
    requests: [],
  };
}
