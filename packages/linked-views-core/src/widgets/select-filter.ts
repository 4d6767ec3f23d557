import { uniqueValues } from '../facets';
import { FilterWidget } from './base';
import type { FacetOption, FacetSortMode } from '../facets';
import type { FilterWidgetConfig } from './base';
import type { CellValue, EqualsPredicate, SelectionPort } from '../types';

export interface SelectFilterConfig extends FilterWidgetConfig {
  sortMode?: FacetSortMode;
}

export interface SelectControl {
  kind: 'select';
  id: string;
  label: string;
  column: string;
  options: Array<FacetOption>;
  value: CellValue;
}

/**
 * Single-select equality filter. The column may be derived, e.g. a
 * "decade" computed from a year.
 */
export class SelectFilter extends FilterWidget<CellValue, SelectControl> {
  private readonly sortMode: FacetSortMode;

  constructor(selection: SelectionPort, config: SelectFilterConfig) {
    super(selection, config, ['categorical', 'numeric', 'temporal', 'key']);
    this.sortMode = config.sortMode ?? 'alpha';
  }

  toPredicate(value: CellValue): EqualsPredicate {
    return { type: 'equals', column: this.columnRef, value };
  }

  renderControl(): SelectControl {
    return {
      kind: 'select',
      id: this.id,
      label: this.label,
      column: this.column,
      options: uniqueValues(
        this.dataset,
        this.accessor,
        this.crossfilterKeys(),
        this.sortMode,
      ),
      value: this.value,
    };
  }
}
