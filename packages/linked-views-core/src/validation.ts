/**
 * Lightweight runtime validation and coercion utilities.
 * Used where selection inputs cross from UI state into predicates.
 */

import type { CellValue, RangeBound } from './types';

/**
 * Type guard to check if a value is a numeric range tuple [number, number].
 */
export function isRangeTuple(val: unknown): val is [number, number] {
  return (
    Array.isArray(val) &&
    val.length === 2 &&
    typeof val[0] === 'number' &&
    typeof val[1] === 'number'
  );
}

/**
 * Coerces a raw value (string, bigint, number, Date) to a range bound.
 * Returns null for empty or non-finite input.
 */
export function toRangeValue(value: unknown): RangeBound {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    const num = Number(trimmed);
    if (!isNaN(num) && isFinite(num)) {
      return num;
    }
    const date = new Date(trimmed);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  return null;
}

/**
 * Projects a cell value onto the number line for interval comparisons.
 * Dates become epoch milliseconds. Anything else non-numeric is null.
 */
export function toComparable(value: CellValue | RangeBound): number | null {
  if (typeof value === 'number') {
    return isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return isNaN(time) ? null : time;
  }
  return null;
}

/**
 * Coerces Date-like values (epoch ms, ISO strings, bigint) to a Date.
 * Returns null if the value is invalid or empty.
 */
export function coerceDate(value: unknown): Date | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'bigint') {
    return new Date(Number(value));
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Equality over cell values. Dates compare by timestamp.
 */
export function cellEquals(a: CellValue, b: CellValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

/**
 * An "empty" widget value clears the widget's contribution.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0 || value.every((v) => v === null);
  }
  return false;
}
