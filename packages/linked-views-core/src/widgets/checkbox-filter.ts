import { uniqueValues } from '../facets';
import { cellEquals } from '../validation';
import { FilterWidget } from './base';
import type { FacetOption, FacetSortMode } from '../facets';
import type { FilterWidgetConfig } from './base';
import type { CellValue, MembershipPredicate, SelectionPort } from '../types';

export interface CheckboxFilterConfig extends FilterWidgetConfig {
  sortMode?: FacetSortMode;
}

export interface CheckboxControl {
  kind: 'checkbox';
  id: string;
  label: string;
  column: string;
  options: Array<FacetOption & { checked: boolean }>;
}

/**
 * Checkbox set over a categorical column: keeps rows whose value is checked.
 */
export class CheckboxFilter extends FilterWidget<
  ReadonlyArray<CellValue>,
  CheckboxControl
> {
  private readonly sortMode: FacetSortMode;

  constructor(selection: SelectionPort, config: CheckboxFilterConfig) {
    super(selection, config, ['categorical', 'numeric', 'key']);
    this.sortMode = config.sortMode ?? 'alpha';
  }

  toPredicate(values: ReadonlyArray<CellValue>): MembershipPredicate {
    return { type: 'membership', column: this.columnRef, values: [...values] };
  }

  /**
   * Checks a value if unchecked, unchecks it otherwise.
   * Unchecking the last value removes the filter.
   */
  toggle(value: CellValue): void {
    const current = [...(this.value ?? [])];
    const idx = current.findIndex((v) => cellEquals(v, value));

    if (idx >= 0) {
      current.splice(idx, 1);
    } else {
      current.push(value);
    }

    this.apply(current.length > 0 ? current : null);
  }

  isChecked(value: CellValue): boolean {
    return (this.value ?? []).some((v) => cellEquals(v, value));
  }

  renderControl(): CheckboxControl {
    const options = uniqueValues(
      this.dataset,
      this.accessor,
      this.crossfilterKeys(),
      this.sortMode,
    );
    return {
      kind: 'checkbox',
      id: this.id,
      label: this.label,
      column: this.column,
      options: options.map((option) => ({
        ...option,
        checked: this.isChecked(option.value),
      })),
    };
  }
}
