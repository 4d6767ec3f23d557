import { Store } from '@tanstack/store';
import { columnRefId, describePredicate } from './predicate';
import type { LinkGroup } from './link-group';
import type { Predicate, PredicateType } from './types';

/**
 * Configuration for a logical group of filters.
 * Used to sort the display of active filters.
 */
export interface FilterGroupConfig {
  id: string;
  label: string;
  priority: number; // Lower number = higher in the list
}

export interface LinkGroupRegistration {
  groupId: string;
  /** Overrides labels per source id or column name; '*' applies to all */
  labelMap?: Record<string, string>;
  /** Formats the predicate for a source id or column name */
  formatterMap?: Record<string, (predicate: Predicate) => string>;
}

/**
 * A single active filter, ready for display.
 */
export interface ActiveFilter {
  id: string;
  groupId: string;
  sourceId: string;
  column: string;
  label: string;
  kind: PredicateType;
  formattedValue: string;
  linkGroup: LinkGroup;
}

/**
 * Tracks active filters across one or more link groups and normalizes them
 * into one sorted list for "active filter bar" UIs.
 */
export class ActiveFilterRegistry {
  private groups = new Map<string, FilterGroupConfig>();
  private registrations = new Map<
    LinkGroup,
    { config: LinkGroupRegistration; unsubscribe: () => void }
  >();

  public store = new Store<{ filters: Array<ActiveFilter> }>({ filters: [] });

  registerGroup(config: FilterGroupConfig) {
    this.groups.set(config.id, config);
    this.handleUpdate();
  }

  register(linkGroup: LinkGroup, config: LinkGroupRegistration) {
    this.unregister(linkGroup);
    const unsubscribe = linkGroup.subscribe(this.handleUpdate);
    this.registrations.set(linkGroup, { config, unsubscribe });
    this.handleUpdate();
  }

  unregister(linkGroup: LinkGroup) {
    const existing = this.registrations.get(linkGroup);
    if (!existing) {
      return;
    }
    existing.unsubscribe();
    this.registrations.delete(linkGroup);
    this.handleUpdate();
  }

  /**
   * Removes one filter from its link group.
   */
  removeFilter(filter: ActiveFilter) {
    filter.linkGroup.reset(filter.sourceId);
  }

  /**
   * Removes every filter of one display group.
   */
  clearGroup(groupId: string) {
    const filters = this.store.state.filters.filter(
      (f) => f.groupId === groupId,
    );
    filters.forEach((f) => this.removeFilter(f));
  }

  private handleUpdate = () => {
    const filters: Array<ActiveFilter> = [];

    for (const [linkGroup, { config }] of this.registrations.entries()) {
      for (const clause of linkGroup.getSnapshot().filters) {
        const column = columnRefId(clause.predicate.column);
        const label =
          config.labelMap?.[clause.sourceId] ??
          config.labelMap?.[column] ??
          config.labelMap?.['*'] ??
          linkGroup.dataset.getColumnDef(column)?.label ??
          column;
        const formatter =
          config.formatterMap?.[clause.sourceId] ??
          config.formatterMap?.[column];

        filters.push({
          id: `${config.groupId}-${clause.sourceId}`,
          groupId: config.groupId,
          sourceId: clause.sourceId,
          column,
          label,
          kind: clause.predicate.type,
          formattedValue: formatter
            ? formatter(clause.predicate)
            : describePredicate(clause.predicate),
          linkGroup,
        });
      }
    }

    // Stable sort keeps clause order within a group
    filters.sort((a, b) => {
      const pA = this.groups.get(a.groupId)?.priority ?? 999;
      const pB = this.groups.get(b.groupId)?.priority ?? 999;
      return pA - pB;
    });

    this.store.setState(() => ({ filters }));
  };
}
