/**
 * Utilities for formatting log data into dense, diff-oriented strings.
 */

type Plain = Record<string, unknown>;

function isPlainObject(value: unknown): value is Plain {
  return typeof value === 'object' && value !== null;
}

export const formatters = {
  /**
   * Compares two values and returns a string of ONLY the differences.
   * Returns null if they are identical.
   */
  diff(prev: unknown, next: unknown, path = ''): string | null {
    if (prev === next) return null;

    if (!isPlainObject(prev) || !isPlainObject(next)) {
      return `${path || '$'}: ${stringify(prev)} -> ${stringify(next)}`;
    }

    const keys = new Set([...Object.keys(prev), ...Object.keys(next)]);
    const changes: Array<string> = [];

    for (const key of keys) {
      const newPath = path ? `${path}.${key}` : key;
      const change = formatters.diff(prev[key], next[key], newPath);
      if (change) changes.push(change);
    }

    if (changes.length === 0) return null;
    return changes.join(', ');
  },

  /**
   * Minifies SQL by collapsing whitespace.
   */
  sql(query: string): string {
    if (!query) return '';
    return query.replace(/\s+/g, ' ').trim();
  },

  /**
   * Relative timestamp (e.g. +150ms).
   */
  timeDelta(startTime: number, currentTime: number = Date.now()): string {
    const diff = currentTime - startTime;
    return diff > 0 ? `+${diff}ms` : '0ms';
  },
};

/**
 * JSON replacer that tolerates sets, dates, bigints and cycles,
 * and summarizes long arrays.
 */
export function compactReplacer() {
  const seen = new WeakSet<object>();
  return (_key: string, value: unknown): unknown => {
    if (typeof value === 'bigint') {
      return `${value.toString()}n`;
    }
    if (value instanceof Set) {
      return compactArray([...value]);
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Reference]';
      }
      seen.add(value);
      if (Array.isArray(value)) {
        return compactArray(value);
      }
    }
    return value;
  };
}

function compactArray(values: Array<unknown>): unknown {
  if (values.length > 5) {
    const preview = JSON.stringify(values.slice(0, 3)).replace(/^\[|\]$/g, '');
    return `[Array(${values.length}): ${preview}, ...]`;
  }
  return values;
}

function stringify(value: unknown): string {
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value, compactReplacer()) ?? String(value);
  } catch {
    return '[Unserializable]';
  }
}
