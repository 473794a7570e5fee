/**
 * Model document types - the on-disk shape accepted by the loader
 */

import type { EnumerationKind, PropertyKind } from "../../types/meta-model.js";

export interface EnumerationValueDocument {
  name: string;
  value: string | number;
  documentation?: string;
  deprecated?: string | boolean;
}

export interface EnumerationDocument {
  name: string;
  documentation?: string;
  type: EnumerationKind;
  values: EnumerationValueDocument[];
}

export interface TypeAliasDocument {
  name: string;
  documentation?: string;
  value: string;
  dependencies?: string[];
}

export interface UnionAlternativeDocument {
  type: string;
  deprecated?: boolean;
  since?: string;
  documentation?: string;
}

export interface PropertyDocument {
  name: string;
  type: string;
  optional?: boolean;
  documentation?: string;
  kind?: PropertyKind;
  alternatives?: UnionAlternativeDocument[];
}

export interface InterfaceDocument {
  name: string;
  documentation?: string;
  extends?: string[];
  members?: MemberDocument[];
  dependencies?: string[];
}

export type MemberDocument = PropertyDocument | InterfaceDocument;

export interface NotificationDocument {
  method: string;
  params?: string;
}

export interface RequestDocument {
  method: string;
  params?: string;
  result?: string;
  errorData?: string;
}

export interface ModelDocument {
  enumerations?: EnumerationDocument[];
  typeAliases?: TypeAliasDocument[];
  interfaces?: InterfaceDocument[];
  notifications?: NotificationDocument[];
  requests?: RequestDocument[];
}

export type ModelDocumentFormat = "json" | "yaml";
