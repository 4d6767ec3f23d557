import { describe, expect, test } from 'vitest';
import { ActiveFilterRegistry } from '../src/filter-registry';
import { LinkGroup } from '../src/link-group';
import { CheckboxFilter, RangeSliderFilter } from '../src/widgets';
import { createCars } from './fixtures';

function setup() {
  const cars = createCars();
  const main = new LinkGroup(cars, { id: 'main' });
  const side = new LinkGroup(cars, { id: 'side' });
  const registry = new ActiveFilterRegistry();
  registry.registerGroup({ id: 'charts', label: 'Charts', priority: 2 });
  registry.registerGroup({ id: 'sidebar', label: 'Sidebar', priority: 1 });
  registry.register(main, { groupId: 'charts' });
  registry.register(side, {
    groupId: 'sidebar',
    labelMap: { 'filter-mpg': 'Fuel economy' },
  });
  return { main, side, registry };
}

describe('ActiveFilterRegistry', () => {
  test('lists filters from every link group, sorted by group priority', () => {
    const { main, side, registry } = setup();
    main.attachWidget(new CheckboxFilter(main, { column: 'cyl' })).toggle(4);
    side
      .attachWidget(new RangeSliderFilter(side, { column: 'mpg' }))
      .apply([20, 30]);

    const filters = registry.store.state.filters;
    expect(
      filters.map(({ id, label, kind, formattedValue }) => ({
        id,
        label,
        kind,
        formattedValue,
      })),
    ).toEqual([
      {
        id: 'sidebar-filter-mpg',
        label: 'Fuel economy',
        kind: 'range',
        formattedValue: '20 - 30',
      },
      {
        id: 'charts-filter-cyl',
        label: 'Cylinders',
        kind: 'membership',
        formattedValue: '4',
      },
    ]);
  });

  test('highlights are not listed', () => {
    const { main, registry } = setup();
    main.update('brush', { keys: ['Alder'] });
    expect(registry.store.state.filters).toEqual([]);
  });

  test('formatters override the default description', () => {
    const cars = createCars();
    const group = new LinkGroup(cars);
    const registry = new ActiveFilterRegistry();
    registry.register(group, {
      groupId: 'g',
      formatterMap: {
        origin: (p) => (p.type === 'equals' ? `from ${String(p.value)}` : ''),
      },
    });

    group.update('origin-select', {
      predicate: { type: 'equals', column: 'origin', value: 'JP' },
    });

    expect(registry.store.state.filters[0]?.formattedValue).toBe('from JP');
  });

  test('removeFilter resets the source in its link group', () => {
    const { main, registry } = setup();
    const checkbox = main.attachWidget(
      new CheckboxFilter(main, { column: 'cyl' }),
    );
    checkbox.toggle(6);

    const [filter] = registry.store.state.filters;
    expect(filter).toBeDefined();
    if (filter) registry.removeFilter(filter);

    expect(main.getSnapshot().filters).toEqual([]);
    expect(checkbox.getValue()).toBeNull();
    expect(registry.store.state.filters).toEqual([]);
  });

  test('clearGroup only touches one display group', () => {
    const { main, side, registry } = setup();
    main.update('a', {
      predicate: { type: 'equals', column: 'origin', value: 'US' },
    });
    side.update('b', {
      predicate: { type: 'equals', column: 'origin', value: 'EU' },
    });

    registry.clearGroup('sidebar');

    expect(registry.store.state.filters.map((f) => f.id)).toEqual(['charts-a']);
  });

  test('unregister stops tracking a link group', () => {
    const { main, registry } = setup();
    registry.unregister(main);
    main.update('a', {
      predicate: { type: 'equals', column: 'origin', value: 'US' },
    });
    expect(registry.store.state.filters).toEqual([]);
  });
});
