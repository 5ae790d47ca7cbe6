/**
 * Application constants
 */

/**
 * HTTP methods, lower-case as they appear as path item keys
 */
export const HTTP_METHODS = ['get', 'post', 'put', 'delete', 'patch', 'head', 'options', 'trace'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

/**
 * Methods the operation importer turns into catalog calls.
 * HEAD and OPTIONS are still written back by the exporter.
 */
export const IMPORTED_METHODS: readonly HttpMethod[] = ['get', 'post', 'put', 'delete', 'patch'];

export const EXPORTED_METHODS: readonly HttpMethod[] = ['get', 'post', 'put', 'delete', 'patch', 'head', 'options'];

export const PARAMETER_LOCATIONS = ['query', 'path', 'header', 'cookie'] as const;

export type ParameterLocation = typeof PARAMETER_LOCATIONS[number];

/**
 * Locations kept on import; header and cookie parameters are dropped
 */
export const IMPORTED_PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['query', 'path'];

export const JSON_CONTENT_TYPE = 'application/json';

export const SCHEMA_REF_PREFIX = '#/components/schemas/';

export const OPENAPI_EXPORT_VERSION = '3.0.3';

/**
 * Primitive schema type names (everything else on an attribute is a
 * reference name, "array", "enum" or a forward-compatible custom tag)
 */
export const PRIMITIVE_TYPES = ['string', 'number', 'integer', 'boolean', 'object'] as const;

export function isPrimitiveType(type: string): boolean {
  return PRIMITIVE_TYPES.some(primitive => primitive === type);
}

/**
 * Link tag recorded when a schema was reached through an array's items.$ref
 */
export const ITEMS_LINK_KIND = 'Items';

/**
 * Separator of the enum fallback default written for bare enum schemas
 */
export const ENUM_DEFAULT_SEPARATOR = ' ||';
