import { GLOBAL_RESET_ID } from './constants';
import { InvalidPredicate, LinkedViewsError } from './errors';
import { logger } from './logger';
import { compilePredicate, freezePredicate } from './predicate';
import { linkGroupOptionsSchema } from './schema';
import { SelectionState } from './selection-state';
import { combineSqlFilters } from './sql';
import { View } from './view';
import type { FilterExpr } from '@uwdata/mosaic-sql';
import type { Store } from '@tanstack/store';
import type { Dataset } from './dataset';
import type { LinkGroupOptions } from './schema';
import type { ViewOptions } from './view';
import type {
  ChartSpec,
  FilterClause,
  HighlightClause,
  HighlightResolution,
  RowKey,
  SelectionInput,
  SelectionListener,
  SelectionParticipant,
  SelectionPort,
  SelectionSnapshot,
} from './types';

let groupCounter = 0;

/**
 * Owns one dataset reference and one SelectionState, and keeps every attached
 * view and widget in sync with it.
 *
 * Only `update`, `reset` and `resetAll` mutate the selection. Notifications
 * are synchronous: views first, then widgets, then external subscribers,
 * each in attach order.
 */
export class LinkGroup implements SelectionPort {
  public readonly id: string;
  public readonly dataset: Dataset;
  public readonly highlightResolution: HighlightResolution;

  private readonly state: SelectionState;
  private readonly views = new Map<string, SelectionParticipant>();
  private readonly widgets = new Map<string, SelectionParticipant>();
  private readonly listeners = new Set<SelectionListener>();
  private disposed = false;

  constructor(dataset: Dataset, options: LinkGroupOptions = {}) {
    const resolved = linkGroupOptionsSchema.parse(options);
    this.id = resolved.id ?? `link-group-${++groupCounter}`;
    this.dataset = dataset;
    this.highlightResolution = resolved.highlightResolution;
    this.state = new SelectionState(dataset);
  }

  /**
   * Observable snapshot store, for framework bindings.
   */
  get store(): Store<SelectionSnapshot> {
    return this.state.store;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getSnapshot(): SelectionSnapshot {
    return this.state.snapshot;
  }

  keysExcluding(sourceId: string): ReadonlySet<RowKey> {
    return this.state.keysExcluding(sourceId);
  }

  /**
   * Records one source's contribution and notifies every participant.
   *
   * - `{ predicate }` narrows the rows (filter).
   * - `{ keys }` emphasizes rows (highlight).
   * - `null` removes the source's contribution.
   *
   * Throws InvalidPredicate for unknown columns, malformed ranges or unknown
   * keys; the previous state is kept.
   */
  update(sourceId: string, input: SelectionInput | null): void {
    if (this.disposed) {
      logger.warn(
        'Selection',
        `[LinkGroup] "${this.id}" is disposed. Ignoring update from "${sourceId}".`,
      );
      return;
    }
    if (input === null) {
      this.reset(sourceId);
      return;
    }

    const prev = this.state.snapshot;

    if ('predicate' in input) {
      try {
        compilePredicate(input.predicate, this.dataset);
      } catch (error) {
        logger.warn(
          'Selection',
          `[LinkGroup] Rejected update from "${sourceId}"`,
          { error: String(error) },
        );
        if (error instanceof InvalidPredicate) {
          throw new InvalidPredicate(error.message, {
            column: error.column,
            sourceId,
          });
        }
        throw error;
      }

      const clause: FilterClause = {
        sourceId,
        predicate: freezePredicate(input.predicate),
      };
      this.commit(sourceId, {
        filters: upsert(prev.filters, clause),
        highlights: without(prev.highlights, sourceId),
      });
      return;
    }

    const keys = this.validateKeys(sourceId, input.keys);
    const clause: HighlightClause = { sourceId, keys };
    this.commit(sourceId, {
      filters: without(prev.filters, sourceId),
      highlights:
        this.highlightResolution === 'single'
          ? [clause]
          : upsert(prev.highlights, clause),
    });
  }

  /**
   * Removes one source's contribution. No-op when it has none.
   */
  reset(sourceId: string): void {
    if (this.disposed) {
      return;
    }
    const prev = this.state.snapshot;
    const hasFilter = prev.filters.some((f) => f.sourceId === sourceId);
    const hasHighlight = prev.highlights.some((h) => h.sourceId === sourceId);
    if (!hasFilter && !hasHighlight) {
      return;
    }
    this.commit(sourceId, {
      filters: hasFilter ? without(prev.filters, sourceId) : prev.filters,
      highlights: hasHighlight
        ? without(prev.highlights, sourceId)
        : prev.highlights,
    });
  }

  /**
   * Clears every contribution in one change. Widgets see the global reset
   * marker as `lastSourceId` and clear their local values.
   */
  resetAll(): void {
    if (this.disposed) {
      return;
    }
    this.commit(GLOBAL_RESET_ID, { filters: [], highlights: [] });
  }

  /**
   * Creates a view over this group's dataset and attaches it.
   */
  createView(spec: ChartSpec, options: ViewOptions = {}): View {
    const view = new View(spec, this.dataset, this, options);
    this.attachView(view);
    return view;
  }

  attachView<T extends SelectionParticipant & { dataset: unknown }>(
    view: T,
  ): T {
    this.assertAttachable(view);
    this.views.set(view.id, view);
    logger.debug('Core', `[LinkGroup] Attached view "${view.id}"`);
    return view;
  }

  attachWidget<T extends SelectionParticipant & { dataset: unknown }>(
    widget: T,
  ): T {
    this.assertAttachable(widget);
    this.widgets.set(widget.id, widget);
    logger.debug('Core', `[LinkGroup] Attached widget "${widget.id}"`);
    return widget;
  }

  /**
   * Detaches a view and drops its highlight. It receives no further
   * notifications.
   */
  removeView(viewId: string): boolean {
    if (!this.views.delete(viewId)) {
      return false;
    }
    this.reset(viewId);
    return true;
  }

  /**
   * Detaches a widget and drops its filter.
   */
  removeWidget(widgetId: string): boolean {
    if (!this.widgets.delete(widgetId)) {
      return false;
    }
    this.reset(widgetId);
    return true;
  }

  release(participant: SelectionParticipant): void {
    if (this.views.get(participant.id) === participant) {
      this.removeView(participant.id);
    } else if (this.widgets.get(participant.id) === participant) {
      this.removeWidget(participant.id);
    }
  }

  getViewIds(): Array<string> {
    return [...this.views.keys()];
  }

  getWidgetIds(): Array<string> {
    return [...this.widgets.keys()];
  }

  /**
   * Subscribes an external observer, notified after views and widgets.
   */
  subscribe(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * The current filters as one Mosaic SQL expression, for external engines.
   */
  toSqlFilter(): FilterExpr | undefined {
    return combineSqlFilters(this.state.snapshot.filters);
  }

  /**
   * Releases every widget and view (most recent first) and all subscribers.
   * The dataset is not owned and stays usable.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    // Participants release themselves on dispose; the flag makes that a no-op.
    this.disposed = true;
    const participants = [...this.views.values(), ...this.widgets.values()];
    for (let i = participants.length - 1; i >= 0; i--) {
      const participant = participants[i];
      if (participant && hasDispose(participant)) {
        participant.dispose();
      }
    }
    this.views.clear();
    this.widgets.clear();
    this.listeners.clear();
    logger.debug('Core', `[LinkGroup] Disposed "${this.id}"`);
  }

  private commit(
    sourceId: string,
    next: {
      filters: ReadonlyArray<FilterClause>;
      highlights: ReadonlyArray<HighlightClause>;
    },
  ) {
    const snapshot = this.state.commit({ ...next, lastSourceId: sourceId });

    logger.debug('Selection', 'StateChange', {
      filters: snapshot.filters.map((f) => f.sourceId),
      highlights: snapshot.highlights.map((h) => h.sourceId),
      filtered: snapshot.filteredKeys.size,
      highlighted: snapshot.highlightedKeys?.size ?? null,
    });

    this.notify(snapshot);
  }

  private notify(snapshot: SelectionSnapshot) {
    const participants = [...this.views.values(), ...this.widgets.values()];
    for (const participant of participants) {
      // Removed by an earlier participant during this notification
      if (!this.isAttached(participant)) {
        continue;
      }
      try {
        participant.handleSelectionChange(snapshot);
      } catch (error) {
        logger.error(
          'Selection',
          `[LinkGroup] Participant "${participant.id}" failed to handle version ${snapshot.version}`,
          { error: String(error) },
        );
      }
    }
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Selection', '[LinkGroup] Subscriber failed', {
          error: String(error),
        });
      }
    }
  }

  private isAttached(participant: SelectionParticipant) {
    return (
      this.views.get(participant.id) === participant ||
      this.widgets.get(participant.id) === participant
    );
  }

  private validateKeys(sourceId: string, keys: Iterable<RowKey>) {
    const unique = [...new Set(keys)];
    const unknown = unique.filter((key) => !this.dataset.hasKey(key));
    if (unknown.length > 0) {
      throw new InvalidPredicate(
        `[LinkGroup] Unknown row key(s) ${unknown
          .slice(0, 3)
          .map((k) => `"${String(k)}"`)
          .join(', ')} from "${sourceId}".`,
        { sourceId },
      );
    }
    return unique;
  }

  private assertAttachable(
    participant: SelectionParticipant & { dataset: unknown },
  ) {
    if (this.disposed) {
      throw new LinkedViewsError(
        `[LinkGroup] "${this.id}" is disposed. Cannot attach "${participant.id}".`,
      );
    }
    if (participant.dataset !== this.dataset) {
      throw new LinkedViewsError(
        `[LinkGroup] "${participant.id}" is bound to a different dataset than group "${this.id}".`,
      );
    }
    if (this.views.has(participant.id) || this.widgets.has(participant.id)) {
      throw new LinkedViewsError(
        `[LinkGroup] Duplicate participant id "${participant.id}" in group "${this.id}".`,
      );
    }
  }
}

function upsert<T extends { sourceId: string }>(
  clauses: ReadonlyArray<T>,
  clause: T,
): Array<T> {
  const index = clauses.findIndex((c) => c.sourceId === clause.sourceId);
  if (index < 0) {
    return [...clauses, clause];
  }
  const next = [...clauses];
  next[index] = clause;
  return next;
}

function without<T extends { sourceId: string }>(
  clauses: ReadonlyArray<T>,
  sourceId: string,
): ReadonlyArray<T> {
  return clauses.some((c) => c.sourceId === sourceId)
    ? clauses.filter((c) => c.sourceId !== sourceId)
    : clauses;
}

function hasDispose(
  value: SelectionParticipant,
): value is SelectionParticipant & { dispose: () => void } {
  return 'dispose' in value && typeof value.dispose === 'function';
}
