/**
 * Tagged representation of the polymorphic `default` / `example` fields.
 *
 * Source documents may carry any JSON type there, while the catalog stores a
 * single string column. Values are decoded into a closed union, written as a
 * canonical string, and re-inferred on export.
 */

export type JsonValue =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; entries: Record<string, JsonValue> };

const INTEGER_LITERAL = /^-?\d+$/;
const FLOAT_LITERAL = /^-?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a parsed JSON value into the tagged union.
 * Anything JSON cannot carry (functions, symbols, undefined) becomes null.
 */
export function fromUnknown(raw: unknown): JsonValue {
  if (typeof raw === 'string') return { kind: 'string', value: raw };
  if (typeof raw === 'boolean') return { kind: 'bool', value: raw };
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? { kind: 'int', value: raw } : { kind: 'float', value: raw };
  }
  if (Array.isArray(raw)) {
    return { kind: 'array', items: raw.map(fromUnknown) };
  }
  if (typeof raw === 'object' && raw !== null) {
    const entries: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(raw)) {
      entries[key] = fromUnknown(value);
    }
    return { kind: 'object', entries };
  }
  return { kind: 'null' };
}

/**
 * Convert back into a plain JSON value
 */
export function toPlain(value: JsonValue): unknown {
  switch (value.kind) {
    case 'string':
    case 'int':
    case 'float':
    case 'bool':
      return value.value;
    case 'null':
      return null;
    case 'array':
      return value.items.map(toPlain);
    case 'object': {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value.entries)) {
        result[key] = toPlain(entry);
      }
      return result;
    }
  }
}

/**
 * Format a floating value like C's `%g`: six significant digits, exponent
 * notation when the exponent is below -4 or at least 6, no trailing zeros.
 */
export function formatCompactFloat(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return '0';

  const [mantissa, exponentText] = value.toExponential(5).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 6) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }

  return stripTrailingZeros(value.toFixed(5 - exponent));
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Canonical storage string
 */
export function toStorageString(value: JsonValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'int':
      return String(value.value);
    case 'float':
      return formatCompactFloat(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'array':
    case 'object':
      return JSON.stringify(toPlain(value));
  }
}

/**
 * Best-effort re-inference of the original type from a storage string.
 *
 * Order: integer, float, boolean, null, JSON array/object, string.
 * A string default that looks like a number comes back as a number.
 */
export function fromStorageString(stored: string): JsonValue {
  if (INTEGER_LITERAL.test(stored)) {
    const parsed = Number(stored);
    if (Number.isSafeInteger(parsed)) return { kind: 'int', value: parsed };
  }

  if (FLOAT_LITERAL.test(stored)) {
    const parsed = Number(stored);
    if (Number.isFinite(parsed)) {
      return Number.isInteger(parsed) && !INTEGER_LITERAL.test(stored)
        ? { kind: 'float', value: parsed }
        : fromUnknown(parsed);
    }
  }

  if (stored === 'true') return { kind: 'bool', value: true };
  if (stored === 'false') return { kind: 'bool', value: false };
  if (stored.toLowerCase() === 'null') return { kind: 'null' };

  if (stored.startsWith('[') || stored.startsWith('{')) {
    try {
      return fromUnknown(JSON.parse(stored));
    } catch {
      return { kind: 'string', value: stored };
    }
  }

  return { kind: 'string', value: stored };
}
