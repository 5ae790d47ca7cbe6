/**
 * OpenAPI document export
 *
 * Rebuilds paths, operations and components.schemas from catalog rows and
 * serializes them as JSON or YAML. Both formats render the same key-sorted
 * plain object, so they never disagree.
 */

import { stringify as stringifyYaml } from 'yaml';
import type { CatalogStore } from './catalog-store.js';
import {
  EXPORTED_METHODS,
  ITEMS_LINK_KIND,
  JSON_CONTENT_TYPE,
  OPENAPI_EXPORT_VERSION,
  SCHEMA_REF_PREFIX,
  isPrimitiveType,
  type HttpMethod,
} from './constants.js';
import { ValidationError, getErrorDetails, toError } from './errors.js';
import { mapBounded } from './fan-out.js';
import { fromStorageString, toPlain } from './json-value.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { VALUE_ATTRIBUTE_NAME } from './relational-projector.js';
import type {
  CatalogAPICall,
  CatalogAttribute,
  CatalogParameter,
  CatalogSchema,
  SchemaLink,
  Service,
} from './types/catalog.js';
import type {
  ExportDocument,
  ExportMediaType,
  ExportOperation,
  ExportParameter,
  ExportResponse,
  ExportSchemaNode,
  ExportSchemaObject,
} from './types/openapi.js';

export const EXPORT_FORMATS = ['json', 'yaml'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export function parseExportFormat(value: string): ExportFormat {
  const format = EXPORT_FORMATS.find(candidate => candidate === value.toLowerCase());
  if (!format) {
    throw new ValidationError(`Unknown export format "${value}"`, { format: value, allowed: EXPORT_FORMATS });
  }
  return format;
}

export interface DocumentExporterOptions {
  /** Maximum concurrent row loads; default 8 */
  concurrency?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface SchemaRows {
  schema: CatalogSchema;
  attributes: CatalogAttribute[];
}

/** Root types exported from a single synthetic "value" attribute */
const VALUE_ROOT_TYPES = new Set(['array', 'string', 'integer', 'number', 'boolean']);

function schemaRef(name: string): ExportSchemaNode {
  return { $ref: `${SCHEMA_REF_PREFIX}${name}` };
}

function isExportedMethod(method: HttpMethod): boolean {
  return EXPORTED_METHODS.includes(method);
}

/**
 * Copy plain data with object keys in code-unit order, dropping undefined
 * members
 */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, member] of entries) {
      if (member !== undefined) sorted[key] = sortKeys(member);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize an export document; JSON uses two-space indentation
 */
export function serialize(document: ExportDocument, format: ExportFormat): string {
  const sorted = sortKeys(document);
  return format === 'json'
    ? JSON.stringify(sorted, null, 2)
    : stringifyYaml(sorted);
}

function storedValue(stored: string | undefined): unknown {
  return stored === undefined ? undefined : toPlain(fromStorageString(stored));
}

export class DocumentExporter {
  private concurrency: number;
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(
    private store: CatalogStore,
    options: DocumentExporterOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 8;
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
  }

  /**
   * Export a service with the given calls
   */
  async export(service: Service, endpoints: CatalogAPICall[], format: ExportFormat): Promise<Uint8Array> {
    try {
      const document = await this.buildDocument(service, endpoints);
      const text = serialize(document, format);

      this.metrics?.recordExport(format, 'success');
      this.logger.info('Export finished', {
        service: service.name,
        format,
        paths: Object.keys(document.paths).length,
        schemas: Object.keys(document.components.schemas).length,
      });
      return new TextEncoder().encode(text);
    } catch (error) {
      this.metrics?.recordExport(format, 'error');
      this.logger.error('Export failed', toError(error), getErrorDetails(error));
      throw error;
    }
  }

  /**
   * Load a service and every call it owns, then export
   */
  async exportService(serviceId: string, format: ExportFormat): Promise<Uint8Array> {
    const service = await this.store.getService(serviceId);
    const calls = await this.store.listAPICalls(service.id);
    return this.export(service, calls, format);
  }

  async buildDocument(service: Service, endpoints: CatalogAPICall[]): Promise<ExportDocument> {
    const schemaRows = await mapBounded(
      await this.store.listSchemas(service.id),
      this.concurrency,
      async (schema): Promise<SchemaRows> => ({ schema, attributes: await this.store.listAttributes(schema.id) })
    );
    const schemaNames = new Set(schemaRows.map(rows => rows.schema.name));

    const document: ExportDocument = {
      openapi: OPENAPI_EXPORT_VERSION,
      info: {
        title: service.name,
        version: service.version,
        description: service.description,
        contact: service.owner !== undefined || service.contactEmail !== undefined
          ? { name: service.owner, email: service.contactEmail }
          : undefined,
      },
      servers: service.environments.length > 0
        ? service.environments.map(environment => ({ url: environment.baseURL, description: environment.description }))
        : undefined,
      paths: {},
      components: { schemas: {} },
    };

    for (const call of endpoints) {
      if (!isExportedMethod(call.method)) {
        this.logger.warn('Skipping call with a method that cannot be exported', { path: call.path, method: call.method });
        continue;
      }
      const pathItem = document.paths[call.path] ?? {};
      pathItem[call.method] = await this.buildOperation(call, schemaNames);
      document.paths[call.path] = pathItem;
    }

    for (const rows of schemaRows) {
      document.components.schemas[rows.schema.name] = buildComponentSchema(rows, schemaNames);
    }

    return document;
  }

  private async buildOperation(call: CatalogAPICall, schemaNames: Set<string>): Promise<ExportOperation> {
    const parameters = await this.store.listParameters(call.id);
    const responses = await this.store.listResponses(call.id);

    const requestLink = await this.store.getCallSchemaLink(call.id);
    const requestContent = requestLink ? await this.linkedContent(requestLink, JSON_CONTENT_TYPE) : undefined;

    const builtResponses = await mapBounded(responses, this.concurrency, async (response): Promise<[string, ExportResponse]> => {
      const link = await this.store.getResponseSchemaLink(response.id);
      return [response.statusCode, {
        description: response.description ?? 'Response',
        // Links are resolved from the JSON body, so they are written back there
        content: link ? await this.linkedContent(link, JSON_CONTENT_TYPE) : undefined,
      }];
    });

    return {
      operationId: call.operationId,
      summary: call.summary,
      description: call.description,
      tags: call.tags.length > 0 ? call.tags : undefined,
      parameters: parameters.length > 0
        ? parameters.map(parameter => buildParameter(parameter, schemaNames))
        : undefined,
      requestBody: requestContent ? { description: 'Request body', content: requestContent } : undefined,
      responses: Object.fromEntries(builtResponses),
    };
  }

  private async linkedContent(link: SchemaLink, contentType: string): Promise<Record<string, ExportMediaType>> {
    const schema = await this.store.getSchema(link.schemaId);
    const node: ExportSchemaNode = link.kind === ITEMS_LINK_KIND
      ? { type: 'array', items: schemaRef(schema.name) }
      : schemaRef(schema.name);
    return { [contentType]: { schema: node } };
  }
}

function buildParameter(parameter: CatalogParameter, schemaNames: Set<string>): ExportParameter {
  return {
    name: parameter.name,
    in: parameter.location,
    required: parameter.required,
    description: parameter.description,
    schema: parameterSchema(parameter, schemaNames),
    example: storedValue(parameter.example),
  };
}

function parameterSchema(parameter: CatalogParameter, schemaNames: Set<string>): ExportSchemaNode {
  if (parameter.type === 'array') {
    return { type: 'array', items: itemsNode(parameter, schemaNames) };
  }
  if (parameter.enumValues) {
    return { type: parameter.type, format: parameter.format, enum: parameter.enumValues };
  }
  if (!isPrimitiveType(parameter.type) && schemaNames.has(parameter.type)) {
    return schemaRef(parameter.type);
  }
  return { type: parameter.type, format: parameter.format };
}

/**
 * A bare type name: primitives as `{type}`, schema names as a reference
 */
function typeNode(type: string, schemaNames: Set<string>): ExportSchemaNode {
  if (!isPrimitiveType(type) && schemaNames.has(type)) {
    return schemaRef(type);
  }
  return { type };
}

function isReferenceAttribute(attribute: CatalogAttribute, schemaNames: Set<string>): boolean {
  if (attribute.type === 'array' || attribute.type === 'enum' || isPrimitiveType(attribute.type)) {
    return false;
  }
  return attribute.ofType === attribute.type || schemaNames.has(attribute.type);
}

function itemsNode(
  { ofType, enumValues }: Pick<CatalogAttribute, 'ofType' | 'enumValues'>,
  schemaNames: Set<string>
): ExportSchemaNode {
  if (enumValues) {
    return { type: ofType, enum: enumValues };
  }
  return ofType !== undefined ? typeNode(ofType, schemaNames) : {};
}

/**
 * Inverse of attribute projection
 */
export function attributeToSchema(attribute: CatalogAttribute, schemaNames: Set<string>): ExportSchemaNode {
  if (isReferenceAttribute(attribute, schemaNames)) {
    return schemaRef(attribute.type);
  }

  const node: ExportSchemaObject = {};
  if (attribute.type === 'array') {
    node.type = 'array';
    node.items = itemsNode(attribute, schemaNames);
  } else if (attribute.type === 'enum') {
    node.type = attribute.ofType;
    node.enum = attribute.enumValues ?? [];
  } else {
    node.type = attribute.type;
  }

  node.format = attribute.format;
  node.description = attribute.description;
  if (attribute.nullable) node.nullable = true;
  node.default = storedValue(attribute.defaultValue);
  return node;
}

function isBareEnum({ schema, attributes }: SchemaRows): boolean {
  return schema.isEnum === true && attributes.length === 1 && attributes[0].type === 'enum';
}

function isValueRoot({ schema, attributes }: SchemaRows): boolean {
  const [only] = attributes;
  return attributes.length === 1 && only.name === VALUE_ATTRIBUTE_NAME && VALUE_ROOT_TYPES.has(schema.schemaType);
}

/**
 * Inverse of schema projection
 */
export function buildComponentSchema(rows: SchemaRows, schemaNames: Set<string>): ExportSchemaNode {
  const { schema, attributes } = rows;

  if (schema.isReference) {
    return schemaRef(schema.referencedModelName ?? schema.name);
  }

  if (isBareEnum(rows)) {
    const [attribute] = attributes;
    const values = attribute.enumValues ?? [];
    const node: ExportSchemaObject = {
      type: attribute.ofType,
      title: schema.title,
      description: schema.description,
      format: attribute.format,
      enum: values,
    };
    if (attribute.nullable) node.nullable = true;
    if (!attribute.syntheticDefault) node.default = storedValue(attribute.defaultValue);
    return node;
  }

  if (isValueRoot(rows)) {
    const [attribute] = attributes;
    const node: ExportSchemaObject = {
      type: schema.schemaType,
      title: schema.title,
      description: schema.description ?? attribute.description,
      format: attribute.format,
      default: storedValue(attribute.defaultValue),
    };
    if (attribute.nullable) node.nullable = true;
    if (schema.schemaType === 'array') node.items = itemsNode(attribute, schemaNames);
    return node;
  }

  const node: ExportSchemaObject = {
    type: schema.schemaType,
    title: schema.title,
    description: schema.description,
  };

  if (attributes.length > 0) {
    node.properties = {};
    for (const attribute of attributes) {
      node.properties[attribute.name] = attributeToSchema(attribute, schemaNames);
    }
    const required = attributes.filter(attribute => attribute.required).map(attribute => attribute.name);
    if (required.length > 0) node.required = required;
  }

  return node;
}
