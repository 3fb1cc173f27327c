/**
 * Value coercion for flat telemetry fields (span attributes, metric tags).
 */

export type AttributeValue = string | number | boolean | null;

/**
 * Coerce an arbitrary value into a span attribute.
 * Primitives pass through; collections collapse to a size marker such as
 * `[list:3]` or `[dict:2]`; anything else becomes `[TypeName]`.
 */
export function toAttributeValue(value: unknown): AttributeValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return value.toString();
    default:
      break;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) return `[list:${value.length}]`;
  if (value instanceof Set) return `[list:${value.size}]`;
  if (value instanceof Map) return `[dict:${value.size}]`;
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return `[dict:${Object.keys(value).length}]`;
  }
  return `[${typeName(value)}]`;
}

export function toAttributes(values: Record<string, unknown> | undefined): Record<string, AttributeValue> {
  const result: Record<string, AttributeValue> = {};
  if (!values) return result;
  for (const [key, value] of Object.entries(values)) {
    result[key] = toAttributeValue(value);
  }
  return result;
}

/**
 * Metric tag values are strings on the wire
 */
export function toTagValues(values: Record<string, unknown> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!values) return result;
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue;
    const attr = toAttributeValue(value);
    result[key] = attr === null ? 'null' : String(attr);
  }
  return result;
}

/**
 * Unique tags in first-seen order
 */
export function uniqueTags(...groups: ReadonlyArray<readonly string[] | undefined>): string[] {
  const seen = new Set<string>();
  for (const group of groups) {
    for (const tag of group ?? []) {
      if (tag.length > 0) seen.add(tag);
    }
  }
  return [...seen];
}

function typeName(value: unknown): string {
  if (typeof value === 'function') return 'Function';
  if (typeof value === 'symbol') return 'Symbol';
  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'Object';
  }
  return typeof value;
}
