import { GLOBAL_RESET_ID } from '../constants';
import { logger } from '../logger';
import { columnRefId, resolveColumn } from '../predicate';
import { filterWidgetOptionsSchema } from '../schema';
import { InvalidPredicate } from '../errors';
import { isEmptyValue } from '../validation';
import type { ColumnAccessor } from '../predicate';
import type { FilterWidgetOptions } from '../schema';
import type {
  ColumnRef,
  ColumnType,
  Predicate,
  SelectionParticipant,
  SelectionPort,
  SelectionSnapshot,
  TabularSource,
} from '../types';

export interface FilterWidgetConfig extends FilterWidgetOptions {
  column: ColumnRef;
}

/**
 * A headless filter control.
 *
 * Widgets write predicates into their link group and never talk to views.
 * `setValue` is debounced by `debounceTime`; `apply` writes immediately.
 * An empty value (null, '', [], [null, null]) removes the widget's filter.
 */
export abstract class FilterWidget<TValue, TControl>
  implements SelectionParticipant
{
  public readonly id: string;
  public readonly label: string;
  public readonly dataset: TabularSource;
  public readonly debounceTime: number;

  protected readonly selection: SelectionPort;
  protected readonly accessor: ColumnAccessor;
  protected readonly columnRef: ColumnRef;
  protected value: TValue | null = null;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private listeners = new Set<() => void>();
  private disposed = false;

  protected constructor(
    selection: SelectionPort,
    config: FilterWidgetConfig,
    allowedTypes: ReadonlyArray<ColumnType>,
  ) {
    const options = filterWidgetOptionsSchema.parse({
      id: config.id,
      label: config.label,
      debounceTime: config.debounceTime,
    });
    const columnId = columnRefId(config.column);

    this.selection = selection;
    this.dataset = selection.dataset;
    this.columnRef = config.column;
    this.accessor = resolveColumn(config.column, selection.dataset);
    this.id = options.id ?? `filter-${columnId}`;
    this.label =
      options.label ??
      (typeof config.column === 'string'
        ? selection.dataset.getColumnDef(config.column)?.label
        : undefined) ??
      columnId;
    this.debounceTime = options.debounceTime;

    const type = this.accessor.type;
    if (type !== undefined && !allowedTypes.includes(type)) {
      throw new InvalidPredicate(
        `[${this.constructor.name}] Column "${columnId}" is ${type}; expected ${allowedTypes.join(' or ')}.`,
        { column: columnId },
      );
    }
  }

  get column(): string {
    return this.accessor.id;
  }

  getValue(): TValue | null {
    return this.value;
  }

  /**
   * Sets the value after the debounce delay. With no delay, applies now.
   */
  setValue(value: TValue | null): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.debounceTime === 0) {
      this.apply(value);
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      try {
        this.apply(value);
      } catch (error) {
        logger.error(
          'Widget',
          `[${this.constructor.name}] "${this.id}" rejected a debounced value`,
          { error: String(error) },
        );
      }
    }, this.debounceTime);
  }

  /**
   * Writes the value's predicate to the link group immediately.
   * Throws InvalidPredicate and keeps the previous value when rejected.
   */
  apply(value: TValue | null): void {
    if (this.disposed) {
      return;
    }
    const previous = this.value;

    if (value === null || isEmptyValue(value)) {
      this.value = null;
      this.selection.reset(this.id);
      this.emit();
      return;
    }

    const predicate = this.toPredicate(value);
    this.value = value;
    try {
      this.selection.update(this.id, { predicate });
    } catch (error) {
      this.value = previous;
      throw error;
    }
    logger.debug('Widget', `[${this.constructor.name}] "${this.id}" applied`, {
      predicate: predicate.type,
    });
    this.emit();
  }

  /**
   * Clears the value and the widget's filter.
   */
  clear(): void {
    this.setValue(null);
  }

  /**
   * Whether a debounced value is waiting to be applied.
   */
  get isPending(): boolean {
    return this.timer !== null;
  }

  abstract toPredicate(value: TValue): Predicate;

  /**
   * Control model for an external UI toolkit.
   */
  abstract renderControl(): TControl;

  handleSelectionChange(snapshot: SelectionSnapshot): void {
    const ownClause = snapshot.filters.some((f) => f.sourceId === this.id);
    if (
      this.value !== null &&
      (snapshot.lastSourceId === GLOBAL_RESET_ID || !ownClause)
    ) {
      this.value = null;
      if (this.timer) {
        clearTimeout(this.timer);
        this.timer = null;
      }
    }
    this.emit();
  }

  /**
   * Notifies on value changes and on every selection change (facet counts
   * depend on the other widgets).
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancels a pending value, removes the widget's filter and stops its
   * notifications. The value is kept and the widget can be attached again.
   */
  detach(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    // Released first so the reset does not clear the kept value
    this.selection.release(this);
    this.selection.reset(this.id);
  }

  /**
   * Detaches the widget for good and drops its listeners.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.detach();
    this.disposed = true;
    this.listeners.clear();
  }

  /**
   * Keys passing every other widget's filter (crossfilter).
   */
  protected crossfilterKeys() {
    return this.selection.keysExcluding(this.id);
  }

  private emit() {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
