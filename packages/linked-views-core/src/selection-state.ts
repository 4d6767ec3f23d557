import { Store } from '@tanstack/store';
import { compilePredicate } from './predicate';
import type {
  FilterClause,
  HighlightClause,
  Row,
  RowKey,
  SelectionSnapshot,
  TabularSource,
} from './types';

export interface SelectionClauses {
  filters: ReadonlyArray<FilterClause>;
  highlights: ReadonlyArray<HighlightClause>;
  lastSourceId: string | null;
}

/**
 * Keys of the rows passing every filter clause (logical AND).
 * With no clauses, every row passes.
 */
export function computeFilteredKeys(
  source: TabularSource,
  filters: ReadonlyArray<FilterClause>,
): Set<RowKey> {
  const tests = filters.map((f) => compilePredicate(f.predicate, source));
  const keys = new Set<RowKey>();
  for (const row of source.getRows()) {
    if (passesAll(row, tests)) {
      keys.add(source.keyOf(row));
    }
  }
  return keys;
}

/**
 * Union of every highlight clause. Null when there are none.
 */
export function computeHighlightedKeys(
  highlights: ReadonlyArray<HighlightClause>,
): Set<RowKey> | null {
  if (highlights.length === 0) {
    return null;
  }
  const keys = new Set<RowKey>();
  for (const clause of highlights) {
    for (const key of clause.keys) {
      keys.add(key);
    }
  }
  return keys;
}

function passesAll(
  row: Row,
  tests: ReadonlyArray<(row: Row) => boolean>,
): boolean {
  for (const test of tests) {
    if (!test(row)) {
      return false;
    }
  }
  return true;
}

/**
 * Observable selection state of one link group.
 *
 * Holds the filter and highlight clauses plus the derived key sets.
 * Writes go through `commit`, which only the owning LinkGroup calls.
 */
export class SelectionState {
  public readonly store: Store<SelectionSnapshot>;

  constructor(private readonly source: TabularSource) {
    this.store = new Store<SelectionSnapshot>({
      version: 0,
      filters: [],
      highlights: [],
      filteredKeys: computeFilteredKeys(source, []),
      highlightedKeys: null,
      lastSourceId: null,
    });
  }

  get snapshot(): SelectionSnapshot {
    return this.store.state;
  }

  /**
   * Replaces the clauses, recomputes the effective selection and bumps the
   * version. Predicates are assumed validated by the caller.
   */
  commit(next: SelectionClauses): SelectionSnapshot {
    const prev = this.store.state;
    const snapshot: SelectionSnapshot = Object.freeze({
      version: prev.version + 1,
      filters:
        next.filters === prev.filters
          ? prev.filters
          : Object.freeze([...next.filters]),
      highlights:
        next.highlights === prev.highlights
          ? prev.highlights
          : Object.freeze([...next.highlights]),
      filteredKeys:
        next.filters === prev.filters
          ? prev.filteredKeys
          : computeFilteredKeys(this.source, next.filters),
      highlightedKeys:
        next.highlights === prev.highlights
          ? prev.highlightedKeys
          : computeHighlightedKeys(next.highlights),
      lastSourceId: next.lastSourceId,
    });
    this.store.setState(() => snapshot);
    return snapshot;
  }

  /**
   * Keys passing every filter except those contributed by `sourceId`.
   * Used for crossfilter facets, where a widget must not narrow itself.
   */
  keysExcluding(sourceId: string): Set<RowKey> {
    const others = this.snapshot.filters.filter((f) => f.sourceId !== sourceId);
    return computeFilteredKeys(this.source, others);
  }
}
