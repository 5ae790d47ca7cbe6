/**
 * Relational projection of component schemas
 *
 * Converts one named SchemaNode into a catalog schema row plus its ordered
 * attribute rows. Nested inline schemas never become schemas of their own:
 * they collapse into an attribute whose `type` / `ofType` describe them.
 */

import { ENUM_DEFAULT_SEPARATOR } from './constants.js';
import { toStorageString } from './json-value.js';
import { refName } from './schema-extractor.js';
import type { NewCatalogAttribute, NewCatalogSchema } from './types/catalog.js';
import type { SchemaNode } from './types/openapi.js';

export interface ProjectionContext {
  /** Component schemas by name, used to resolve `allOf` members */
  schemas: Record<string, SchemaNode>;
}

export interface Projection {
  schema: NewCatalogSchema;
  attributes: NewCatalogAttribute[];
}

/** Root types that project to a single synthetic "value" attribute */
const VALUE_ROOT_TYPES = new Set(['array', 'string', 'integer', 'number', 'boolean']);

export const VALUE_ATTRIBUTE_NAME = 'value';

/**
 * Resolve the attribute type of a nested node
 *
 * Priority: `$ref` name, then "enum", then the declared type, then "object".
 */
export function resolveType(node: SchemaNode): string {
  if (node.ref !== undefined) return refName(node.ref);
  if (node.enum && node.enum.length > 0) return 'enum';
  if (node.type !== undefined) return node.type;
  return 'object';
}

export function project(name: string, node: SchemaNode, context: ProjectionContext = { schemas: {} }): Projection {
  if (node.ref !== undefined) {
    return {
      schema: {
        name,
        schemaType: 'reference',
        isReference: true,
        referencedModelName: refName(node.ref),
        isRoot: true,
        isEnum: false,
      },
      attributes: [],
    };
  }

  const schema: NewCatalogSchema = {
    name,
    schemaType: node.type ?? 'object',
    title: node.title,
    description: node.description,
    isReference: false,
    isRoot: true,
    isEnum: false,
  };

  if (node.allOf && node.allOf.length > 0) {
    const merged = mergeAllOf(node, context, new Set([name]));
    return { schema, attributes: projectProperties(merged.properties, merged.required) };
  }

  if (node.properties) {
    return { schema, attributes: projectProperties(node.properties, new Set(node.required ?? [])) };
  }

  if (node.enum && node.enum.length > 0) {
    return { schema: { ...schema, isEnum: true }, attributes: [projectBareEnum(node)] };
  }

  if (node.type !== undefined && VALUE_ROOT_TYPES.has(node.type)) {
    return { schema, attributes: [projectValue(node)] };
  }

  return { schema, attributes: [] };
}

function projectProperties(properties: Record<string, SchemaNode>, required: Set<string>): NewCatalogAttribute[] {
  return Object.entries(properties).map(([propertyName, property]) =>
    projectAttribute(propertyName, property, required.has(propertyName))
  );
}

function projectAttribute(name: string, node: SchemaNode, required: boolean): NewCatalogAttribute {
  const attribute: NewCatalogAttribute = {
    name,
    type: resolveType(node),
    required,
    nullable: node.nullable ?? false,
    description: node.description,
    format: node.format,
  };

  if (node.default !== undefined) {
    attribute.defaultValue = toStorageString(node.default);
  }

  if (node.ref !== undefined) {
    attribute.ofType = refName(node.ref);
  } else if (attribute.type === 'enum') {
    attribute.ofType = node.type;
    attribute.enumValues = node.enum;
  } else if (attribute.type === 'array' && node.items) {
    applyItems(attribute, node.items);
  }

  return attribute;
}

/**
 * Record an array's element type; item enums keep their values and their
 * declared primitive type
 */
function applyItems(attribute: NewCatalogAttribute, items: SchemaNode): void {
  const itemType = resolveType(items);
  if (itemType === 'enum') {
    attribute.ofType = items.type ?? 'string';
    attribute.enumValues = items.enum;
  } else {
    attribute.ofType = itemType;
  }
}

/**
 * A schema that is nothing but an enum becomes a single "enum" attribute.
 * Without a declared default the joined values are stored as a marker.
 */
function projectBareEnum(node: SchemaNode): NewCatalogAttribute {
  const values = node.enum ?? [];
  const attribute: NewCatalogAttribute = {
    name: node.title ?? 'unknown',
    type: 'enum',
    ofType: node.type,
    required: false,
    nullable: node.nullable ?? false,
    description: node.description,
    format: node.format,
    enumValues: values,
  };

  if (node.default !== undefined) {
    attribute.defaultValue = toStorageString(node.default);
  } else {
    attribute.defaultValue = values.join(ENUM_DEFAULT_SEPARATOR);
    attribute.syntheticDefault = true;
  }
  return attribute;
}

function projectValue(node: SchemaNode): NewCatalogAttribute {
  const attribute: NewCatalogAttribute = {
    name: VALUE_ATTRIBUTE_NAME,
    type: node.type ?? 'object',
    required: true,
    nullable: node.nullable ?? false,
    description: node.description,
    format: node.format,
  };

  if (node.default !== undefined) {
    attribute.defaultValue = toStorageString(node.default);
  }
  if (node.type === 'array' && node.items) {
    applyItems(attribute, node.items);
  }

  return attribute;
}

interface MergedObject {
  properties: Record<string, SchemaNode>;
  required: Set<string>;
}

/**
 * Merge the properties of `allOf` members in declaration order
 *
 * Referenced members are looked up by name; a name already on the current
 * chain is skipped so that self-referential compositions terminate. Later
 * members win on conflicting property names.
 */
function mergeAllOf(node: SchemaNode, context: ProjectionContext, visiting: Set<string>): MergedObject {
  const merged: MergedObject = {
    properties: { ...(node.properties ?? {}) },
    required: new Set(node.required ?? []),
  };

  for (const member of node.allOf ?? []) {
    let target = member;
    let targetName: string | undefined;

    if (member.ref !== undefined) {
      targetName = refName(member.ref);
      const resolved = context.schemas[targetName];
      if (!resolved || visiting.has(targetName)) continue;
      target = resolved;
      visiting.add(targetName);
    }

    const nested = target.allOf && target.allOf.length > 0
      ? mergeAllOf(target, context, visiting)
      : { properties: target.properties ?? {}, required: new Set(target.required ?? []) };

    Object.assign(merged.properties, nested.properties);
    for (const requiredName of nested.required) merged.required.add(requiredName);

    if (targetName !== undefined) visiting.delete(targetName);
  }

  return merged;
}
