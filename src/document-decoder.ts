/**
 * OpenAPI document decoder
 *
 * Turns raw JSON or YAML into the schema AST. YAML is parsed into a plain
 * tree and re-serialized as JSON, so both formats go through one decoding
 * routine. Structural problems (syntax errors, missing info.title /
 * info.version / paths) throw DecodeError; malformed individual items are
 * dropped and recorded as diagnostics.
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DecodeError, toError } from './errors.js';
import { HTTP_METHODS, PARAMETER_LOCATIONS, type HttpMethod, type ParameterLocation } from './constants.js';
import { fromUnknown, toStorageString } from './json-value.js';
import type {
  DecodeDiagnostic,
  DocumentFormat,
  DocumentInfo,
  MediaTypeNode,
  OperationNode,
  ParameterNode,
  PathItemNode,
  RequestBodyNode,
  ResponseNode,
  SchemaDocument,
  SchemaNode,
  ServerNode,
} from './types/openapi.js';

export interface DecodeOptions {
  /** Explicit format; wins over the filename hint and content sniffing */
  format?: DocumentFormat;
  /** File name or URL used as an extension hint */
  filename?: string;
}

type RawRecord = Record<string, unknown>;

interface DecodeContext {
  components: RawRecord;
  diagnostics: DecodeDiagnostic[];
}

const versionField = z.union([z.string(), z.number()]).transform(value => String(value));

const envelopeSchema = z.object({
  openapi: versionField.optional(),
  info: z.object({
    title: z.string(),
    version: versionField,
  }).passthrough(),
  paths: z.record(z.unknown()),
}).passthrough();

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`);
}

/**
 * Read a field by its OpenAPI name, falling back to its snake_case spelling
 */
function field(record: RawRecord, name: string): unknown {
  if (Object.hasOwn(record, name)) return record[name];
  const snake = toSnakeCase(name);
  return snake !== name && Object.hasOwn(record, snake) ? record[snake] : undefined;
}

function hasField(record: RawRecord, name: string): boolean {
  return Object.hasOwn(record, name) || Object.hasOwn(record, toSnakeCase(name));
}

function readString(record: RawRecord, name: string): string | undefined {
  const value = field(record, name);
  return typeof value === 'string' ? value : undefined;
}

function readNumber(record: RawRecord, name: string): number | undefined {
  const value = field(record, name);
  return typeof value === 'number' ? value : undefined;
}

function readBoolean(record: RawRecord, name: string): boolean | undefined {
  const value = field(record, name);
  return typeof value === 'boolean' ? value : undefined;
}

function readRecord(record: RawRecord, name: string): RawRecord | undefined {
  const value = field(record, name);
  return isRecord(value) ? value : undefined;
}

function readArray(record: RawRecord, name: string): unknown[] | undefined {
  const value = field(record, name);
  return Array.isArray(value) ? value : undefined;
}

function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function unescapePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function pointer(base: string, ...segments: Array<string | number>): string {
  return segments.reduce<string>((acc, segment) => `${acc}/${escapePointerSegment(String(segment))}`, base);
}

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

function isParameterLocation(value: string): value is ParameterLocation {
  return PARAMETER_LOCATIONS.some(location => location === value);
}

/**
 * Pick the document format: explicit, then file extension, then content
 */
export function detectFormat(text: string, filename?: string): DocumentFormat {
  if (filename) {
    const lower = filename.toLowerCase().split(/[?#]/)[0];
    if (lower.endsWith('.json')) return 'json';
    if (lower.endsWith('.yaml') || lower.endsWith('.yml')) return 'yaml';
  }

  const first = text.trimStart().charAt(0);
  return first === '{' || first === '[' ? 'json' : 'yaml';
}

export class DocumentDecoder {
  decode(input: string | Uint8Array, options: DecodeOptions = {}): SchemaDocument {
    const text = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
    if (text.trim().length === 0) {
      throw new DecodeError('Document is empty');
    }

    const format = options.format ?? detectFormat(text, options.filename);
    const jsonText = format === 'yaml' ? this.yamlToJson(text) : text;
    return this.decodeJson(jsonText);
  }

  private yamlToJson(text: string): string {
    let tree: unknown;
    try {
      tree = parseYaml(text);
    } catch (error) {
      throw new DecodeError(`Invalid YAML: ${toError(error).message}`, { format: 'yaml' });
    }

    try {
      return JSON.stringify(tree ?? null);
    } catch (error) {
      throw new DecodeError(`YAML document cannot be represented as JSON: ${toError(error).message}`, { format: 'yaml' });
    }
  }

  private decodeJson(text: string): SchemaDocument {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`Invalid JSON: ${toError(error).message}`, { format: 'json' });
    }

    if (!isRecord(raw)) {
      throw new DecodeError('Document root must be an object');
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      const issues = envelope.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const first = issues[0];
      throw new DecodeError(
        `Invalid OpenAPI document: ${first ? `${first.path}: ${first.message}` : 'unknown problem'}`,
        { issues }
      );
    }

    const ctx: DecodeContext = {
      components: readRecord(raw, 'components') ?? {},
      diagnostics: [],
    };

    const document: SchemaDocument = {
      openapi: envelope.data.openapi ?? '3.0.0',
      info: this.decodeInfo(raw, envelope.data.info.title, envelope.data.info.version),
      servers: this.decodeServers(readArray(raw, 'servers') ?? []),
      paths: {},
      components: { schemas: this.decodeComponentSchemas(ctx) },
      diagnostics: ctx.diagnostics,
    };

    for (const [path, rawItem] of Object.entries(envelope.data.paths)) {
      const itemPointer = pointer('/paths', path);
      if (!isRecord(rawItem)) {
        ctx.diagnostics.push({ pointer: itemPointer, message: 'Path item is not an object' });
        continue;
      }
      document.paths[path] = this.decodePathItem(rawItem, itemPointer, ctx);
    }

    return document;
  }

  private decodeInfo(raw: RawRecord, title: string, version: string): DocumentInfo {
    const info: DocumentInfo = { title, version };
    const rawInfo = readRecord(raw, 'info');
    if (!rawInfo) return info;

    const description = readString(rawInfo, 'description');
    if (description !== undefined) info.description = description;

    const contact = readRecord(rawInfo, 'contact');
    if (contact) {
      info.contact = {
        name: readString(contact, 'name'),
        email: readString(contact, 'email'),
      };
    }

    return info;
  }

  private decodeServers(rawServers: unknown[]): ServerNode[] {
    const servers: ServerNode[] = [];
    for (const rawServer of rawServers) {
      if (!isRecord(rawServer)) continue;
      const url = readString(rawServer, 'url');
      if (!url) continue;
      servers.push({ url, description: readString(rawServer, 'description') });
    }
    return servers;
  }

  private decodeComponentSchemas(ctx: DecodeContext): Record<string, SchemaNode> {
    const schemas: Record<string, SchemaNode> = {};
    const rawSchemas = readRecord(ctx.components, 'schemas') ?? {};

    for (const [name, rawSchema] of Object.entries(rawSchemas)) {
      const schema = this.decodeSchema(rawSchema, pointer('/components/schemas', name), ctx);
      if (schema) schemas[name] = schema;
    }

    return schemas;
  }

  private decodePathItem(rawItem: RawRecord, itemPointer: string, ctx: DecodeContext): PathItemNode {
    const item: PathItemNode = {};
    const sharedParameters = this.decodeParameters(readArray(rawItem, 'parameters') ?? [], pointer(itemPointer, 'parameters'), ctx);

    for (const [key, rawOperation] of Object.entries(rawItem)) {
      const method = key.toLowerCase();
      if (!isHttpMethod(method)) continue;

      const operationPointer = pointer(itemPointer, key);
      if (!isRecord(rawOperation)) {
        ctx.diagnostics.push({ pointer: operationPointer, message: 'Operation is not an object' });
        continue;
      }

      item[method] = this.decodeOperation(rawOperation, operationPointer, sharedParameters, ctx);
    }

    return item;
  }

  private decodeOperation(
    rawOperation: RawRecord,
    operationPointer: string,
    sharedParameters: ParameterNode[],
    ctx: DecodeContext
  ): OperationNode {
    const ownParameters = this.decodeParameters(
      readArray(rawOperation, 'parameters') ?? [],
      pointer(operationPointer, 'parameters'),
      ctx
    );

    // Operation-level parameters override path-level ones with the same name and location
    const parameters = [
      ...sharedParameters.filter(shared => !ownParameters.some(own => own.name === shared.name && own.in === shared.in)),
      ...ownParameters,
    ];

    const operation: OperationNode = {
      operationId: readString(rawOperation, 'operationId'),
      summary: readString(rawOperation, 'summary'),
      description: readString(rawOperation, 'description'),
      tags: this.decodeTags(readArray(rawOperation, 'tags') ?? []),
      deprecated: readBoolean(rawOperation, 'deprecated'),
      parameters,
      responses: this.decodeResponses(readRecord(rawOperation, 'responses') ?? {}, pointer(operationPointer, 'responses'), ctx),
    };

    if (hasField(rawOperation, 'requestBody')) {
      operation.requestBody = this.decodeRequestBody(
        field(rawOperation, 'requestBody'),
        pointer(operationPointer, 'requestBody'),
        ctx
      );
    }

    return operation;
  }

  /**
   * Tags may be plain strings or tag objects with a name
   */
  private decodeTags(rawTags: unknown[]): string[] {
    const tags: string[] = [];
    for (const tag of rawTags) {
      if (typeof tag === 'string') {
        tags.push(tag);
      } else if (isRecord(tag)) {
        const name = readString(tag, 'name');
        if (name) tags.push(name);
      }
    }
    return tags;
  }

  private decodeParameters(rawParameters: unknown[], listPointer: string, ctx: DecodeContext): ParameterNode[] {
    const parameters: ParameterNode[] = [];

    rawParameters.forEach((rawParameter, index) => {
      const parameterPointer = pointer(listPointer, index);
      const resolved = this.resolveComponent(rawParameter, 'parameters', parameterPointer, ctx);
      if (!resolved) return;

      const name = readString(resolved, 'name');
      const location = readString(resolved, 'in');
      if (!name || !location) {
        ctx.diagnostics.push({ pointer: parameterPointer, message: 'Parameter is missing "name" or "in"' });
        return;
      }
      if (!isParameterLocation(location)) {
        ctx.diagnostics.push({ pointer: parameterPointer, message: `Unsupported parameter location "${location}"` });
        return;
      }

      const parameter: ParameterNode = {
        name,
        in: location,
        required: readBoolean(resolved, 'required') ?? false,
        description: readString(resolved, 'description'),
      };

      if (hasField(resolved, 'schema')) {
        parameter.schema = this.decodeSchema(field(resolved, 'schema'), pointer(parameterPointer, 'schema'), ctx);
      }
      if (hasField(resolved, 'example')) {
        parameter.example = fromUnknown(field(resolved, 'example'));
      }

      parameters.push(parameter);
    });

    return parameters;
  }

  private decodeRequestBody(rawBody: unknown, bodyPointer: string, ctx: DecodeContext): RequestBodyNode | undefined {
    const resolved = this.resolveComponent(rawBody, 'requestBodies', bodyPointer, ctx);
    if (!resolved) return undefined;

    return {
      description: readString(resolved, 'description'),
      required: readBoolean(resolved, 'required') ?? false,
      content: this.decodeContent(readRecord(resolved, 'content') ?? {}, pointer(bodyPointer, 'content'), ctx),
    };
  }

  private decodeResponses(rawResponses: RawRecord, responsesPointer: string, ctx: DecodeContext): Record<string, ResponseNode> {
    const responses: Record<string, ResponseNode> = {};

    for (const [statusCode, rawResponse] of Object.entries(rawResponses)) {
      const responsePointer = pointer(responsesPointer, statusCode);
      const resolved = this.resolveComponent(rawResponse, 'responses', responsePointer, ctx);
      if (!resolved) continue;

      responses[statusCode] = {
        description: readString(resolved, 'description'),
        content: this.decodeContent(readRecord(resolved, 'content') ?? {}, pointer(responsePointer, 'content'), ctx),
      };
    }

    return responses;
  }

  private decodeContent(rawContent: RawRecord, contentPointer: string, ctx: DecodeContext): Record<string, MediaTypeNode> {
    const content: Record<string, MediaTypeNode> = {};

    for (const [mediaType, rawMedia] of Object.entries(rawContent)) {
      if (!isRecord(rawMedia)) continue;
      const media: MediaTypeNode = {};
      if (hasField(rawMedia, 'schema')) {
        media.schema = this.decodeSchema(field(rawMedia, 'schema'), pointer(contentPointer, mediaType, 'schema'), ctx);
      }
      content[mediaType] = media;
    }

    return content;
  }

  /**
   * Resolve `$ref` to a shared component object
   *
   * Chains of references are followed; a chain that loops or leaves the
   * document is reported and yields undefined.
   */
  private resolveComponent(
    raw: unknown,
    section: 'parameters' | 'requestBodies' | 'responses',
    itemPointer: string,
    ctx: DecodeContext,
    visited = new Set<string>()
  ): RawRecord | undefined {
    if (!isRecord(raw)) {
      ctx.diagnostics.push({ pointer: itemPointer, message: 'Entry is not an object' });
      return undefined;
    }

    const ref = readString(raw, '$ref');
    if (ref === undefined) return raw;

    const prefix = `#/components/${section}/`;
    if (!ref.startsWith(prefix) || visited.has(ref)) {
      ctx.diagnostics.push({ pointer: itemPointer, message: `Unresolvable reference "${ref}"` });
      return undefined;
    }
    visited.add(ref);

    const name = unescapePointerSegment(ref.slice(prefix.length));
    const target = readRecord(ctx.components, section)?.[name];
    if (target === undefined) {
      ctx.diagnostics.push({ pointer: itemPointer, message: `Unresolvable reference "${ref}"` });
      return undefined;
    }

    return this.resolveComponent(target, section, itemPointer, ctx, visited);
  }

  private decodeSchema(raw: unknown, schemaPointer: string, ctx: DecodeContext): SchemaNode | undefined {
    if (!isRecord(raw)) {
      ctx.diagnostics.push({ pointer: schemaPointer, message: 'Schema is not an object' });
      return undefined;
    }

    const ref = readString(raw, '$ref');
    if (ref !== undefined) {
      return { ref };
    }

    const schema: SchemaNode = {};

    const rawType = field(raw, 'type');
    if (typeof rawType === 'string') {
      schema.type = rawType;
    } else if (Array.isArray(rawType)) {
      // OpenAPI 3.1 type arrays: ["string", "null"]
      const types = rawType.filter((entry): entry is string => typeof entry === 'string');
      const concrete = types.find(entry => entry !== 'null');
      if (concrete) schema.type = concrete;
      if (types.includes('null')) schema.nullable = true;
    }

    const format = readString(raw, 'format');
    if (format !== undefined) schema.format = format;
    const title = readString(raw, 'title');
    if (title !== undefined) schema.title = title;
    const description = readString(raw, 'description');
    if (description !== undefined) schema.description = description;
    const pattern = readString(raw, 'pattern');
    if (pattern !== undefined) schema.pattern = pattern;

    for (const bound of ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum', 'minLength', 'maxLength'] as const) {
      const value = readNumber(raw, bound);
      if (value !== undefined) schema[bound] = value;
    }

    const nullable = readBoolean(raw, 'nullable');
    if (nullable !== undefined) schema.nullable = nullable;

    const rawEnum = readArray(raw, 'enum');
    if (rawEnum) {
      schema.enum = rawEnum.map(member => toStorageString(fromUnknown(member)));
    }

    if (hasField(raw, 'items')) {
      const items = this.decodeSchema(field(raw, 'items'), pointer(schemaPointer, 'items'), ctx);
      if (items) schema.items = items;
    }

    const rawProperties = readRecord(raw, 'properties');
    if (rawProperties) {
      schema.properties = {};
      for (const [name, rawProperty] of Object.entries(rawProperties)) {
        const property = this.decodeSchema(rawProperty, pointer(schemaPointer, 'properties', name), ctx);
        if (property) schema.properties[name] = property;
      }
    }

    const required = readArray(raw, 'required');
    if (required) {
      schema.required = required.filter((entry): entry is string => typeof entry === 'string');
    }

    for (const keyword of ['allOf', 'anyOf', 'oneOf'] as const) {
      const members = readArray(raw, keyword);
      if (!members) continue;
      schema[keyword] = members
        .map((member, index) => this.decodeSchema(member, pointer(schemaPointer, keyword, index), ctx))
        .filter((member): member is SchemaNode => member !== undefined);
    }

    if (hasField(raw, 'default')) {
      schema.default = fromUnknown(field(raw, 'default'));
    }
    if (hasField(raw, 'example')) {
      schema.example = fromUnknown(field(raw, 'example'));
    }

    return schema;
  }
}

/**
 * Decode a raw document with a fresh decoder
 */
export function decode(input: string | Uint8Array, options?: DecodeOptions): SchemaDocument {
  return new DocumentDecoder().decode(input, options);
}
