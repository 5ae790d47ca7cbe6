/**
 * Catalog records
 *
 * Flat rows as the persistence collaborator stores them. `New*` types are the
 * inputs of the corresponding create operations (no id, no owner key).
 */

import type { HttpMethod, ParameterLocation } from '../constants.js';

export type EnvironmentType = 'development' | 'stage' | 'preprod' | 'prod';

export interface ServiceEnvironment {
  type: EnvironmentType;
  host: string;
  baseURL: string;
  description?: string;
}

export interface Service {
  id: string;
  name: string;
  version: string;
  description?: string;
  owner?: string;
  contactEmail?: string;
  environments: ServiceEnvironment[];
  createdAt: string;
  updatedAt: string;
}

export type NewService = Omit<Service, 'id' | 'createdAt' | 'updatedAt'>;

export interface CatalogSchema {
  id: string;
  serviceId: string;
  name: string;
  /** Root `type`; "reference" for a `$ref` root */
  schemaType: string;
  title?: string;
  description?: string;
  isReference: boolean;
  referencedModelName?: string;
  isRoot: boolean;
  /** The whole schema is one enum, held in a single attribute */
  isEnum?: boolean;
}

export type NewCatalogSchema = Omit<CatalogSchema, 'id' | 'serviceId'>;

export interface CatalogAttribute {
  id: string;
  schemaId: string;
  /** Position within the owning schema */
  position: number;
  name: string;
  /** Primitive name, "object", "array", "enum", or a referenced schema name */
  type: string;
  /** Element type of arrays, target of references, declared type of enums */
  ofType?: string;
  required: boolean;
  nullable: boolean;
  description?: string;
  defaultValue?: string;
  /** `defaultValue` is the joined-values marker, not a declared default */
  syntheticDefault?: boolean;
  format?: string;
  enumValues?: string[];
}

export type NewCatalogAttribute = Omit<CatalogAttribute, 'id' | 'schemaId' | 'position'>;

export interface CatalogAPICall {
  id: string;
  serviceId: string;
  path: string;
  method: HttpMethod;
  operationId?: string;
  summary?: string;
  description?: string;
  tags: string[];
}

export type NewCatalogAPICall = Omit<CatalogAPICall, 'id' | 'serviceId'>;

export interface CatalogParameter {
  id: string;
  callId: string;
  name: string;
  location: ParameterLocation;
  /** Declared primitive, "array", or a referenced schema name */
  type: string;
  /** Element type of arrays */
  ofType?: string;
  format?: string;
  enumValues?: string[];
  required: boolean;
  description?: string;
  example?: string;
}

export type NewCatalogParameter = Omit<CatalogParameter, 'id' | 'callId'>;

export interface CatalogAPIResponse {
  id: string;
  callId: string;
  /** Status key as written in the document ("200", "default", "4XX") */
  statusCode: string;
  description?: string;
  contentType: string;
}

export type NewCatalogAPIResponse = Omit<CatalogAPIResponse, 'id' | 'callId'>;

export type SchemaLinkKind = 'Items' | null;

export interface SchemaLink {
  schemaId: string;
  kind: SchemaLinkKind;
}

export interface CallSchemaLink extends SchemaLink {
  callId: string;
}

export interface ResponseSchemaLink extends SchemaLink {
  responseId: string;
}

/**
 * Counters returned by an import
 */
export interface ImportStats {
  importedEndpoints: number;
  importedParameters: number;
  importedResponses: number;
  importedSchemas: number;
  importedAttributes: number;
  linkedSchemas: number;
  skippedItems: number;
}

export type SkippedItemKind = 'decode' | 'method' | 'schema-link';

/**
 * Non-fatal problem met during import; the affected item was skipped or
 * left unlinked
 */
export interface SkippedItemWarning {
  kind: SkippedItemKind;
  pointer: string;
  message: string;
}

export interface ImportResult {
  service: Service;
  calls: CatalogAPICall[];
  stats: ImportStats;
  warnings: SkippedItemWarning[];
}

export function emptyImportStats(): ImportStats {
  return {
    importedEndpoints: 0,
    importedParameters: 0,
    importedResponses: 0,
    importedSchemas: 0,
    importedAttributes: 0,
    linkedSchemas: 0,
    skippedItems: 0,
  };
}
