import { compilePredicate } from '../predicate';
import { FilterWidget } from './base';
import type { FilterWidgetConfig } from './base';
import type { SelectionPort, TextPredicate } from '../types';

export interface TextFilterConfig extends FilterWidgetConfig {
  caseSensitive?: boolean;
}

export interface TextControl {
  kind: 'text';
  id: string;
  label: string;
  column: string;
  value: string;
  /** Rows matching the query among rows passing the other filters. */
  matches: number;
}

/**
 * Substring search over a text column.
 */
export class TextFilter extends FilterWidget<string, TextControl> {
  private readonly caseSensitive: boolean;

  constructor(selection: SelectionPort, config: TextFilterConfig) {
    super(selection, config, ['categorical', 'key']);
    this.caseSensitive = config.caseSensitive ?? false;
  }

  toPredicate(query: string): TextPredicate {
    return {
      type: 'text',
      column: this.columnRef,
      query,
      caseSensitive: this.caseSensitive,
    };
  }

  renderControl(): TextControl {
    const keys = this.crossfilterKeys();
    let matches = 0;
    if (this.value) {
      const test = compilePredicate(this.toPredicate(this.value), this.dataset);
      for (const row of this.dataset.getRows()) {
        if (keys.has(this.dataset.keyOf(row)) && test(row)) {
          matches++;
        }
      }
    } else {
      matches = keys.size;
    }
    return {
      kind: 'text',
      id: this.id,
      label: this.label,
      column: this.column,
      value: this.value ?? '',
      matches,
    };
  }
}
