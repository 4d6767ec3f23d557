import { formatCell } from './predicate';
import { toComparable } from './validation';
import type { ColumnAccessor } from './predicate';
import type { CellValue, RowKey, TabularSource } from './types';

export type FacetSortMode = 'alpha' | 'count';

export interface FacetOption {
  value: CellValue;
  label: string;
  count: number;
}

/**
 * Distinct values of a column over the whole dataset, with counts taken over
 * `keys` (rows passing the other widgets' filters). Values absent from `keys`
 * stay listed with a count of 0 so options do not vanish while filtering.
 */
export function uniqueValues(
  source: TabularSource,
  accessor: ColumnAccessor,
  keys: ReadonlySet<RowKey> | null,
  sortMode: FacetSortMode = 'alpha',
): Array<FacetOption> {
  const counts = new Map<string, FacetOption>();

  for (const row of source.getRows()) {
    const value = accessor.read(row);
    const id = facetId(value);
    let option = counts.get(id);
    if (!option) {
      option = { value, label: formatCell(value), count: 0 };
      counts.set(id, option);
    }
    if (keys === null || keys.has(source.keyOf(row))) {
      option.count++;
    }
  }

  const options = [...counts.values()];
  if (sortMode === 'count') {
    return options.sort(
      (a, b) => b.count - a.count || compareCells(a.value, b.value),
    );
  }
  return options.sort((a, b) => compareCells(a.value, b.value));
}

/**
 * Min/max of a numeric or temporal column over `keys` (or every row).
 * Undefined when no row has a comparable value.
 */
export function extent(
  source: TabularSource,
  accessor: ColumnAccessor,
  keys: ReadonlySet<RowKey> | null,
): [number | Date, number | Date] | undefined {
  let min: { raw: number | Date; at: number } | null = null;
  let max: { raw: number | Date; at: number } | null = null;

  for (const row of source.getRows()) {
    if (keys !== null && !keys.has(source.keyOf(row))) {
      continue;
    }
    const value = accessor.read(row);
    if (typeof value !== 'number' && !(value instanceof Date)) {
      continue;
    }
    const at = toComparable(value);
    if (at === null) {
      continue;
    }
    if (min === null || at < min.at) {
      min = { raw: value, at };
    }
    if (max === null || at > max.at) {
      max = { raw: value, at };
    }
  }

  return min && max ? [min.raw, max.raw] : undefined;
}

/**
 * Total order over cell values: nulls last, numbers and dates numerically,
 * everything else by string form.
 */
export function compareCells(a: CellValue, b: CellValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  const na = toComparable(a);
  const nb = toComparable(b);
  if (na !== null && nb !== null) {
    return na - nb;
  }
  const sa = formatCell(a);
  const sb = formatCell(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function facetId(value: CellValue): string {
  if (value instanceof Date) {
    return `date:${value.getTime()}`;
  }
  return `${typeof value}:${String(value)}`;
}
