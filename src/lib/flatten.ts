/**
 * Flattening of arbitrary JSON documents into the flat field/value records
 * the host platform consumes.
 *
 * - nested objects become dotted paths (`customer.address.city`)
 * - array elements become bracketed paths (`tags[0]`, `items[1].sku`)
 * - booleans become `"true"`/`"false"`, `null` becomes `""`
 * - empty objects and arrays are kept as `"{}"` and `"[]"`
 * - a subtree below {@link MAX_FLATTEN_DEPTH} is kept as its JSON text
 *
 * When two paths collide (a literal `"a.b"` key next to `a: { b }`), the
 * value written last wins.
 *
 * @module
 */

export type FlatValue = string | number;
export type FlatRecord = Record<string, FlatValue>;

export const MAX_FLATTEN_DEPTH = 16;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function scalar(value: unknown): FlatValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (value === null || value === undefined) return '';
  return String(value);
}

function flattenInto(
  value: unknown,
  path: string,
  depth: number,
  maxDepth: number,
  result: Map<string, FlatValue>,
): void {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      result.set(path, '[]');
    } else if (depth >= maxDepth) {
      result.set(path, JSON.stringify(value));
    } else {
      value.forEach((item, i) => flattenInto(item, `${path}[${i}]`, depth + 1, maxDepth, result));
    }
    return;
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      result.set(path, '{}');
    } else if (depth >= maxDepth) {
      result.set(path, JSON.stringify(value));
    } else {
      for (const [key, child] of entries) {
        flattenInto(child, `${path}.${key}`, depth + 1, maxDepth, result);
      }
    }
    return;
  }

  result.set(path, scalar(value));
}

/**
 * Flattens a document source into a flat record.
 *
 * `maxDepth` counts nesting levels below the document root: with the default
 * of 16, a value nested 16 levels deep is kept as JSON text.
 */
export function flattenDocument(
  source: Record<string, unknown>,
  options: { maxDepth?: number } = {},
): FlatRecord {
  const result = new Map<string, FlatValue>();
  const maxDepth = options.maxDepth ?? MAX_FLATTEN_DEPTH;

  for (const [key, value] of Object.entries(source)) {
    flattenInto(value, key, 1, maxDepth, result);
  }
  return Object.fromEntries(result);
}
