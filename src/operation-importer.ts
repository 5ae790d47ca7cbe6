/**
 * Endpoint/operation import
 *
 * Turns every (path, method) pair of a decoded document into a catalog API
 * call with its parameters and responses, and links request/response bodies
 * to schemas that were already imported for the service. Linking is by exact
 * schema name only.
 */

import {
  HTTP_METHODS,
  IMPORTED_METHODS,
  IMPORTED_PARAMETER_LOCATIONS,
  ITEMS_LINK_KIND,
  JSON_CONTENT_TYPE,
  type HttpMethod,
} from './constants.js';
import type { CatalogStore } from './catalog-store.js';
import { pointer } from './document-decoder.js';
import { toStorageString } from './json-value.js';
import type { Logger } from './logger.js';
import { synthesize } from './name-synthesizer.js';
import { resolveType } from './relational-projector.js';
import { refName } from './schema-extractor.js';
import type {
  CatalogAPICall,
  ImportStats,
  NewCatalogParameter,
  SchemaLinkKind,
  Service,
  SkippedItemWarning,
} from './types/catalog.js';
import type {
  MediaTypeNode,
  OperationNode,
  ParameterNode,
  PathItemNode,
  SchemaDocument,
  SchemaNode,
} from './types/openapi.js';

export interface OperationImportContext {
  stats: ImportStats;
  warnings: SkippedItemWarning[];
  logger: Logger;
}

/**
 * Name of the schema a body refers to, and how it was reached
 */
export interface BodySchemaTarget {
  name: string;
  kind: SchemaLinkKind;
}

function isImportedMethod(method: HttpMethod): boolean {
  return IMPORTED_METHODS.includes(method);
}

/**
 * Resolve the schema name of a request or response body
 *
 * A direct `$ref` wins, then an array whose `items` is a `$ref` (linked with
 * kind "Items"); any other body gets a synthesized name.
 */
export function resolveBodyTarget(
  content: Record<string, MediaTypeNode> | undefined,
  synthesizedName: () => string
): BodySchemaTarget | undefined {
  const schema = content?.[JSON_CONTENT_TYPE]?.schema;
  if (!schema) return undefined;

  if (schema.ref !== undefined) {
    return { name: refName(schema.ref), kind: null };
  }
  if (schema.items?.ref !== undefined) {
    return { name: refName(schema.items.ref), kind: ITEMS_LINK_KIND };
  }
  return { name: synthesizedName(), kind: null };
}

export async function importPaths(
  document: SchemaDocument,
  store: CatalogStore,
  service: Service,
  context: OperationImportContext
): Promise<CatalogAPICall[]> {
  const calls: CatalogAPICall[] = [];

  for (const [path, item] of Object.entries(document.paths)) {
    for (const [method, operation] of methodEntries(item)) {
      const operationPointer = pointer('/paths', path, method);

      if (!isImportedMethod(method)) {
        skip(context, {
          kind: 'method',
          pointer: operationPointer,
          message: `Method ${method.toUpperCase()} is not imported`,
        });
        continue;
      }

      calls.push(await importOperation(store, service, path, method, operation, operationPointer, context));
    }
  }

  return calls;
}

function methodEntries(item: PathItemNode): Array<[HttpMethod, OperationNode]> {
  const entries: Array<[HttpMethod, OperationNode]> = [];
  for (const [key, operation] of Object.entries(item)) {
    const method = HTTP_METHODS.find(candidate => candidate === key);
    if (method && operation) entries.push([method, operation]);
  }
  return entries;
}

async function importOperation(
  store: CatalogStore,
  service: Service,
  path: string,
  method: HttpMethod,
  operation: OperationNode,
  operationPointer: string,
  context: OperationImportContext
): Promise<CatalogAPICall> {
  const existing = await store.findAPICall(service.id, path, method);
  if (existing) {
    context.logger.debug('Replacing existing API call', { path, method, callId: existing.id });
    await store.deleteAPICall(existing.id);
  }

  const call = await store.createAPICall(service.id, {
    path,
    method,
    operationId: operation.operationId,
    summary: operation.summary,
    description: operation.description,
    tags: operation.tags,
  });
  context.stats.importedEndpoints++;

  await importParameters(store, call, operation.parameters, context);

  const requestTarget = resolveBodyTarget(operation.requestBody?.content, () =>
    synthesize(operation.operationId, path, method.toUpperCase(), false)
  );
  if (requestTarget) {
    const schema = await store.findSchemaByName(service.id, requestTarget.name);
    if (schema) {
      if (await store.attachSchemaToCall(schema.id, call.id, requestTarget.kind)) {
        context.stats.linkedSchemas++;
      }
    } else {
      skip(context, {
        kind: 'schema-link',
        pointer: pointer(operationPointer, 'requestBody'),
        message: `No schema named "${requestTarget.name}" for the request body`,
      });
    }
  }

  for (const [statusCode, responseNode] of Object.entries(operation.responses)) {
    const contentTypes = Object.keys(responseNode.content);
    const response = await store.createResponse(call.id, {
      statusCode,
      description: responseNode.description,
      contentType: contentTypes[0] ?? JSON_CONTENT_TYPE,
    });
    context.stats.importedResponses++;

    const responseTarget = resolveBodyTarget(responseNode.content, () =>
      synthesize(operation.operationId, path, method.toUpperCase(), true, statusCode)
    );
    if (!responseTarget) continue;

    const schema = await store.findSchemaByName(service.id, responseTarget.name);
    if (schema) {
      if (await store.attachSchemaToResponse(schema.id, response.id, responseTarget.kind)) {
        context.stats.linkedSchemas++;
      }
    } else {
      skip(context, {
        kind: 'schema-link',
        pointer: pointer(operationPointer, 'responses', statusCode),
        message: `No schema named "${responseTarget.name}" for response ${statusCode}`,
      });
    }
  }

  return call;
}

async function importParameters(
  store: CatalogStore,
  call: CatalogAPICall,
  parameters: ParameterNode[],
  context: OperationImportContext
): Promise<void> {
  for (const parameter of parameters) {
    if (!IMPORTED_PARAMETER_LOCATIONS.includes(parameter.in)) {
      context.logger.debug('Dropping parameter', {
        path: call.path,
        method: call.method,
        name: parameter.name,
        in: parameter.in,
      });
      continue;
    }

    const example = parameter.example ?? parameter.schema?.example;
    await store.createParameter(call.id, {
      name: parameter.name,
      location: parameter.in,
      ...parameterType(parameter.schema),
      required: parameter.required,
      description: parameter.description,
      example: example !== undefined ? toStorageString(example) : undefined,
    });
    context.stats.importedParameters++;
  }
}

type ParameterType = Pick<NewCatalogParameter, 'type' | 'ofType' | 'format' | 'enumValues'>;

/**
 * Declared type of a parameter schema, "string" when absent
 *
 * Enums keep their primitive type and values; arrays record their element
 * type the way array attributes do.
 */
export function parameterType(schema: SchemaNode | undefined): ParameterType {
  if (!schema) return { type: 'string' };
  if (schema.ref !== undefined) return { type: refName(schema.ref) };

  if (schema.type === 'array') {
    const items = schema.items;
    if (!items) return { type: 'array', ofType: 'string' };
    if (items.ref !== undefined) return { type: 'array', ofType: refName(items.ref) };
    if (resolveType(items) === 'enum') {
      return { type: 'array', ofType: items.type ?? 'string', enumValues: items.enum };
    }
    return { type: 'array', ofType: items.type ?? 'string' };
  }

  const type = schema.type ?? 'string';
  if (schema.enum && schema.enum.length > 0) {
    return { type, format: schema.format, enumValues: schema.enum };
  }
  return { type, format: schema.format };
}

function skip(context: OperationImportContext, warning: SkippedItemWarning): void {
  context.warnings.push(warning);
  context.stats.skippedItems++;
  context.logger.warn(warning.message, { kind: warning.kind, pointer: warning.pointer });
}
