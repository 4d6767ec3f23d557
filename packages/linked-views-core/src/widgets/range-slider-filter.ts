import { extent } from '../facets';
import { toComparable, toRangeValue } from '../validation';
import { FilterWidget } from './base';
import type { FilterWidgetConfig } from './base';
import type { RangeBound, RangePredicate, SelectionPort } from '../types';

export type RangeValue = readonly [RangeBound, RangeBound];

export interface RangeSliderControl {
  kind: 'range';
  id: string;
  label: string;
  column: string;
  /** Extent over the whole dataset. */
  domain: [number | Date, number | Date] | undefined;
  /** Extent over rows passing the other filters. */
  available: [number | Date, number | Date] | undefined;
  value: RangeValue | null;
}

/**
 * Tolerance for matching a clicked bin against the active range.
 */
const BIN_EPSILON = 0.0001;

/**
 * Closed-interval filter over a numeric or temporal column.
 * Either bound may be null for an open side; [null, null] clears.
 */
export class RangeSliderFilter extends FilterWidget<
  RangeValue,
  RangeSliderControl
> {
  constructor(selection: SelectionPort, config: FilterWidgetConfig) {
    super(selection, config, ['numeric', 'temporal']);
  }

  toPredicate(value: RangeValue): RangePredicate {
    return {
      type: 'range',
      column: this.columnRef,
      min: toRangeValue(value[0]),
      max: toRangeValue(value[1]),
    };
  }

  /**
   * Histogram interaction: clicking the bin that matches the active range
   * clears it; any other bin becomes the range.
   */
  toggleBin(binStart: number, binEnd: number): void {
    const current = this.value;
    const activeMin = current ? toComparable(current[0]) : null;
    const activeMax = current ? toComparable(current[1]) : null;

    const isSameMin =
      activeMin !== null && Math.abs(activeMin - binStart) < BIN_EPSILON;
    const isSameMax =
      activeMax !== null && Math.abs(activeMax - binEnd) < BIN_EPSILON;

    this.setValue(isSameMin && isSameMax ? [null, null] : [binStart, binEnd]);
  }

  renderControl(): RangeSliderControl {
    return {
      kind: 'range',
      id: this.id,
      label: this.label,
      column: this.column,
      domain: extent(this.dataset, this.accessor, null),
      available: extent(this.dataset, this.accessor, this.crossfilterKeys()),
      value: this.value,
    };
  }
}
