/**
 * Schema graph extraction
 *
 * Flattens `components.schemas` into a deduplicated, name-ordered list.
 * Only root schemas become catalog schemas: inline nested schemas are
 * projected as attributes, and nested `$ref`s are resolved by name later.
 */

import { SCHEMA_REF_PREFIX } from './constants.js';
import type { SchemaNode } from './types/openapi.js';

export interface ExtractedSchema {
  name: string;
  schema: SchemaNode;
  /** Declared directly under components.schemas */
  isRoot: boolean;
}

/**
 * Last path segment of a `$ref` ("#/components/schemas/User" -> "User")
 */
export function refName(ref: string): string {
  const segments = ref.split('/');
  return segments[segments.length - 1] || ref;
}

/**
 * Extract every root schema, sorted by name (code-unit order)
 */
export function extractAll(schemas: Record<string, SchemaNode>): ExtractedSchema[] {
  const extracted: ExtractedSchema[] = [];
  const processed = new Set<string>();

  const names = Object.keys(schemas).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const name of names) {
    if (processed.has(name)) continue;
    processed.add(name);
    extracted.push({ name, schema: schemas[name], isRoot: true });
  }

  return extracted;
}

/**
 * Names of the component schemas a node reaches through `$ref`
 *
 * Follows references into `schemas` so that transitive targets are listed
 * too; each name is visited once, which keeps self- and mutually-referential
 * graphs finite. External or non-schema references are ignored.
 */
export function referencedNames(
  node: SchemaNode,
  schemas: Record<string, SchemaNode>,
  visited = new Set<string>()
): string[] {
  const found: string[] = [];

  const walk = (current: SchemaNode): void => {
    if (current.ref !== undefined) {
      if (!current.ref.startsWith(SCHEMA_REF_PREFIX)) return;
      const name = refName(current.ref);
      if (visited.has(name)) return;
      visited.add(name);
      found.push(name);
      const target = schemas[name];
      if (target) walk(target);
      return;
    }

    if (current.items) walk(current.items);
    for (const property of Object.values(current.properties ?? {})) walk(property);
    for (const member of [...(current.allOf ?? []), ...(current.anyOf ?? []), ...(current.oneOf ?? [])]) {
      walk(member);
    }
  };

  walk(node);
  return found;
}

/**
 * `$ref` targets under components.schemas that do not exist
 */
export function danglingReferences(schemas: Record<string, SchemaNode>): Array<{ from: string; target: string }> {
  const dangling: Array<{ from: string; target: string }> = [];

  for (const { name, schema } of extractAll(schemas)) {
    for (const target of referencedNames(schema, schemas)) {
      if (!Object.hasOwn(schemas, target)) {
        dangling.push({ from: name, target });
      }
    }
  }

  return dangling;
}
