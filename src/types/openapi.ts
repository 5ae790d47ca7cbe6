/**
 * Decoded OpenAPI document (schema AST)
 *
 * A deliberately narrow model: only what the catalog import needs. Shared
 * component parameters, request bodies and responses are already resolved;
 * component schemas stay as a named graph linked through `ref`.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { HttpMethod, ParameterLocation } from '../constants.js';
import type { JsonValue } from '../json-value.js';

export interface SchemaDocument {
  openapi: string;
  info: DocumentInfo;
  servers: ServerNode[];
  paths: Record<string, PathItemNode>;
  components: ComponentsNode;
  /** Malformed items dropped while decoding */
  diagnostics: DecodeDiagnostic[];
}

export interface DocumentInfo {
  title: string;
  version: string;
  description?: string;
  contact?: {
    name?: string;
    email?: string;
  };
}

export interface ServerNode {
  url: string;
  description?: string;
}

export interface ComponentsNode {
  schemas: Record<string, SchemaNode>;
}

export type PathItemNode = Partial<Record<HttpMethod, OperationNode>>;

export interface OperationNode {
  operationId?: string;
  summary?: string;
  description?: string;
  tags: string[];
  deprecated?: boolean;
  parameters: ParameterNode[];
  requestBody?: RequestBodyNode;
  responses: Record<string, ResponseNode>;
}

export interface ParameterNode {
  name: string;
  in: ParameterLocation;
  required: boolean;
  description?: string;
  schema?: SchemaNode;
  example?: JsonValue;
}

export interface RequestBodyNode {
  description?: string;
  required: boolean;
  content: Record<string, MediaTypeNode>;
}

export interface ResponseNode {
  description?: string;
  content: Record<string, MediaTypeNode>;
}

export interface MediaTypeNode {
  schema?: SchemaNode;
}

/**
 * A JSON-Schema-like node.
 *
 * Invariant: when `ref` is set no other field is.
 */
export interface SchemaNode {
  ref?: string;
  type?: string;
  format?: string;
  title?: string;
  description?: string;
  pattern?: string;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  minLength?: number;
  maxLength?: number;
  nullable?: boolean;
  enum?: string[];
  items?: SchemaNode;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  allOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  default?: JsonValue;
  example?: JsonValue;
}

export interface DecodeDiagnostic {
  /** RFC 6901 pointer into the source document */
  pointer: string;
  message: string;
}

export type DocumentFormat = 'json' | 'yaml';

/**
 * Schema node of an exported document. A reference carries nothing but
 * `$ref`.
 */
export type ExportSchemaNode = ExportReference | ExportSchemaObject;

export interface ExportReference {
  $ref: string;
}

export interface ExportSchemaObject {
  type?: string;
  format?: string;
  title?: string;
  description?: string;
  nullable?: boolean;
  enum?: string[];
  items?: ExportSchemaNode;
  properties?: Record<string, ExportSchemaNode>;
  required?: string[];
  default?: unknown;
}

export interface ExportMediaType {
  schema: ExportSchemaNode;
}

export interface ExportParameter {
  name: string;
  in: ParameterLocation;
  required: boolean;
  description?: string;
  schema: ExportSchemaNode;
  example?: unknown;
}

export interface ExportResponse {
  description: string;
  content?: Record<string, ExportMediaType>;
}

export interface ExportOperation {
  operationId?: string;
  summary?: string;
  description?: string;
  tags?: string[];
  parameters?: ExportParameter[];
  requestBody?: {
    description: string;
    content: Record<string, ExportMediaType>;
  };
  responses: Record<string, ExportResponse>;
}

export type ExportPathItem = Partial<Record<HttpMethod, ExportOperation>>;

/**
 * Document produced by the exporter; the envelope fields follow the
 * OpenAPI 3.0 object model
 */
export interface ExportDocument extends Pick<OpenAPIV3.Document, 'openapi' | 'info' | 'servers'> {
  paths: Record<string, ExportPathItem>;
  components: {
    schemas: Record<string, ExportSchemaNode>;
  };
}
