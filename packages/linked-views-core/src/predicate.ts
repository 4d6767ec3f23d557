import { InvalidPredicate } from './errors';
import { cellEquals, toComparable } from './validation';
import type {
  CellValue,
  ColumnRef,
  ColumnType,
  Predicate,
  RangeBound,
  Row,
  RowKey,
  TabularSource,
} from './types';

/**
 * A column reference resolved against a dataset.
 */
export interface ColumnAccessor {
  id: string;
  /** Undefined for derived columns, whose type is not declared. */
  type: ColumnType | undefined;
  read: (row: Row) => CellValue;
  derived: boolean;
}

export function columnRefId(ref: ColumnRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}

/**
 * Resolves a plain or derived column against a dataset.
 * Throws InvalidPredicate when a referenced column does not exist.
 */
export function resolveColumn(
  ref: ColumnRef,
  source: TabularSource,
): ColumnAccessor {
  if (typeof ref === 'string') {
    const def = source.getColumnDef(ref);
    if (!def) {
      throw new InvalidPredicate(
        `[Predicate] Unknown column "${ref}" in dataset "${source.name}".`,
        { column: ref },
      );
    }
    return {
      id: ref,
      type: def.type,
      read: (row) => row[ref] ?? null,
      derived: false,
    };
  }

  const missing = ref.dependsOn.filter((name) => !source.hasColumn(name));
  if (missing.length > 0) {
    throw new InvalidPredicate(
      `[Predicate] Derived column "${ref.id}" depends on unknown column(s) ${missing
        .map((m) => `"${m}"`)
        .join(', ')} in dataset "${source.name}".`,
      { column: ref.id },
    );
  }
  return { id: ref.id, type: undefined, read: ref.compute, derived: true };
}

/**
 * Validates a predicate and compiles it into a row test.
 * Throws InvalidPredicate for unknown columns and malformed values.
 */
export function compilePredicate(
  predicate: Predicate,
  source: TabularSource,
): (row: Row) => boolean {
  const accessor = resolveColumn(predicate.column, source);
  const column = accessor.id;

  switch (predicate.type) {
    case 'membership': {
      if (!Array.isArray(predicate.values)) {
        throw new InvalidPredicate(
          `[Predicate] Membership filter on "${column}" needs a list of values.`,
          { column },
        );
      }
      const values = predicate.values;
      return (row) => {
        const value = accessor.read(row);
        return values.some((v) => cellEquals(v, value));
      };
    }

    case 'range': {
      if (accessor.type === 'categorical' || accessor.type === 'key') {
        throw new InvalidPredicate(
          `[Predicate] Range filter on ${accessor.type} column "${column}" is not supported.`,
          { column },
        );
      }
      const min = checkBound(predicate.min, column, 'min');
      const max = checkBound(predicate.max, column, 'max');
      if (min === null && max === null) {
        throw new InvalidPredicate(
          `[Predicate] Range filter on "${column}" has no bounds.`,
          { column },
        );
      }
      if (min !== null && max !== null && min > max) {
        throw new InvalidPredicate(
          `[Predicate] Range filter on "${column}" has min greater than max.`,
          { column },
        );
      }
      return (row) => {
        const value = toComparable(accessor.read(row));
        if (value === null) {
          return false;
        }
        return (min === null || value >= min) && (max === null || value <= max);
      };
    }

    case 'equals': {
      const expected = predicate.value;
      return (row) => cellEquals(accessor.read(row), expected);
    }

    case 'text': {
      if (typeof predicate.query !== 'string' || predicate.query.length === 0) {
        throw new InvalidPredicate(
          `[Predicate] Text filter on "${column}" needs a non-empty query.`,
          { column },
        );
      }
      const caseSensitive = predicate.caseSensitive ?? false;
      const query = caseSensitive
        ? predicate.query
        : predicate.query.toLowerCase();
      return (row) => {
        const value = accessor.read(row);
        if (value === null) {
          return false;
        }
        const text = value instanceof Date ? value.toISOString() : String(value);
        return (caseSensitive ? text : text.toLowerCase()).includes(query);
      };
    }
  }
}

/**
 * Keys of the rows a predicate accepts, in row order.
 */
export function evaluatePredicate(
  predicate: Predicate,
  source: TabularSource,
): Set<RowKey> {
  const test = compilePredicate(predicate, source);
  const keys = new Set<RowKey>();
  for (const row of source.getRows()) {
    if (test(row)) {
      keys.add(source.keyOf(row));
    }
  }
  return keys;
}

/**
 * Frozen copy of a predicate, detached from the caller's arrays and objects.
 */
export function freezePredicate(predicate: Predicate): Predicate {
  const column = freezeColumnRef(predicate.column);
  switch (predicate.type) {
    case 'membership':
      return Object.freeze({
        ...predicate,
        column,
        values: Object.freeze([...predicate.values]),
      });
    case 'range':
    case 'equals':
    case 'text':
      return Object.freeze({ ...predicate, column });
  }
}

function freezeColumnRef(ref: ColumnRef): ColumnRef {
  if (typeof ref === 'string') {
    return ref;
  }
  return Object.freeze({ ...ref, dependsOn: [...ref.dependsOn] });
}

/**
 * Human-readable form of a predicate's value, for active filter lists.
 */
export function describePredicate(predicate: Predicate): string {
  switch (predicate.type) {
    case 'membership':
      return predicate.values.map(formatCell).join(', ');
    case 'range': {
      const { min, max } = predicate;
      if (min !== null && max !== null) {
        return `${formatCell(min)} - ${formatCell(max)}`;
      }
      return min !== null ? `>= ${formatCell(min)}` : `<= ${formatCell(max)}`;
    }
    case 'equals':
      return formatCell(predicate.value);
    case 'text':
      return `"${predicate.query}"`;
  }
}

export function formatCell(value: CellValue): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return String(value);
}

function checkBound(
  bound: RangeBound,
  column: string,
  side: 'min' | 'max',
): number | null {
  if (bound === null) {
    return null;
  }
  const value = toComparable(bound);
  if (value === null) {
    throw new InvalidPredicate(
      `[Predicate] Range filter on "${column}" has an invalid ${side} bound.`,
      { column },
    );
  }
  return value;
}
