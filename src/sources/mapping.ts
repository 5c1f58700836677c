/**
 * Field mapping tables
 *
 * Each structured source describes how its raw items map onto job fields:
 * a dotted path into the item, a fallback for missing or empty values, and an
 * optional formatter for values that are not plain strings.
 */

export interface FieldRule {
  /** null when the origin has no such field; the fallback is always used */
  path: string | null;
  fallback?: string;
  format?: (value: unknown) => string | undefined;
}

export type FieldTable<K extends string> = Readonly<Record<K, FieldRule>>;

/**
 * Lookup over one raw item, resolved through a field table.
 */
export type FieldLookup<K extends string> = (field: K) => string;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readPath(raw: unknown, path: string): unknown {
  let current: unknown = raw;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Strings are trimmed, numbers and booleans stringified,
 * arrays of strings joined with ", ".
 */
export function formatValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string')
      .map(item => item.trim())
      .filter(item => item.length > 0)
      .join(', ');
  }
  return undefined;
}

/**
 * Epoch seconds (or milliseconds) to an ISO timestamp; strings pass through.
 */
export function epochToIso(unit: 'seconds' | 'milliseconds') {
  return (value: unknown): string | undefined => {
    if (typeof value === 'string') return value.trim();
    if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
    const date = new Date(unit === 'seconds' ? value * 1000 : value);
    return isNaN(date.getTime()) ? undefined : date.toISOString();
  };
}

export function applyFieldTable<K extends string>(
  raw: unknown,
  table: FieldTable<K>
): FieldLookup<K> {
  return (field: K): string => {
    const rule = table[field];
    const format = rule.format ?? formatValue;
    const value = rule.path === null ? undefined : format(readPath(raw, rule.path));
    return value ? value : rule.fallback ?? '';
  };
}
