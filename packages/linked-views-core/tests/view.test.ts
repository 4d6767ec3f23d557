import { describe, expect, test, vi } from 'vitest';
import { InvalidChannelMapping, InvalidPredicate } from '../src/errors';
import { LinkGroup } from '../src/link-group';
import { View, pointInPolygon } from '../src/view';
import { createCars } from './fixtures';

const scatter = { channels: { x: 'hp', y: 'mpg' } };

function highlighted(group: LinkGroup) {
  return [...(group.getSnapshot().highlightedKeys ?? [])];
}

describe('View construction', () => {
  test('rejects a channel mapped to an unknown column', () => {
    let caught: unknown;
    try {
      new View({ channels: { x: 'hp', y: 'weight' } }, createCars(), null);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidChannelMapping);
    expect(caught).toMatchObject({
      channel: 'y',
      column: 'weight',
      message:
        '[View] Channel "y" maps to unknown column "weight" in dataset "cars".',
    });
  });

  test('rejects unknown tooltip columns', () => {
    expect(
      () =>
        new View(
          { channels: { x: 'hp', tooltip: ['model', 'trim'] } },
          createCars(),
          null,
        ),
    ).toThrow(InvalidChannelMapping);
  });

  test('the spec is frozen together with its channels and style', () => {
    const tooltip = ['model'];
    const view = new View({ channels: { x: 'hp', tooltip } }, createCars(), null);
    tooltip.push('origin');

    expect(Object.isFrozen(view.spec.channels)).toBe(true);
    expect(Object.isFrozen(view.spec.channels.tooltip)).toBe(true);
    expect(Object.isFrozen(view.spec.style)).toBe(true);
    expect(Reflect.set(view.spec.channels, 'x', 'weight')).toBe(false);
    expect(view.spec.channels).toEqual({ x: 'hp', tooltip: ['model'] });

    const artifact = view.render();
    expect(artifact.channels).toBe(view.spec.channels);
    expect(artifact.marks[0]?.x).toBe(88);
  });
});

describe('View.render', () => {
  test('a static view renders every row with default styling', () => {
    const view = new View(
      { ...scatter, channels: { ...scatter.channels, tooltip: ['model'] } },
      createCars(),
      null,
    );
    const artifact = view.render();

    expect(artifact.version).toBe(0);
    expect(artifact.rowCount).toBe(8);
    expect(artifact.mark).toBe('point');
    expect(artifact.dimensions).toEqual({ width: 640, height: 400 });
    expect(artifact.marks[0]).toEqual({
      key: 'Alder',
      x: 88,
      y: 31.5,
      color: null,
      size: null,
      group: null,
      tooltip: { model: 'Alder' },
      highlighted: false,
      opacity: 1,
      fill: '#4e79a7',
    });
    expect(artifact.highlightedKeys).toEqual([]);
  });

  test('static views ignore interactions', () => {
    const view = new View(scatter, createCars(), null);
    view.onInteract({ type: 'click', key: 'Alder' });
    expect(view.render().highlightedKeys).toEqual([]);
    expect(view.isLinked).toBe(false);
  });

  test('rendering twice at the same version returns the same artifact', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);
    group.update('src', { keys: ['Elm'] });

    const first = view.render();
    expect(view.render()).toBe(first);

    group.update('src', { keys: ['Fir'] });
    expect(view.render()).not.toBe(first);
  });

  test('an empty filter result is a valid empty artifact', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);
    group.update('mpg', {
      predicate: { type: 'range', column: 'mpg', min: 100, max: null },
    });

    const artifact = view.render();
    expect(artifact.empty).toBe(true);
    expect(artifact.marks).toEqual([]);
  });

  test('highlighted marks stand out and the rest dim', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView({
      ...scatter,
      style: { dimOpacity: 0.3, highlightColor: '#ff0000' },
    });
    view.onInteract({ type: 'click', key: 'Cedar' });

    const marks = view.render().marks;
    const cedar = marks.find((m) => m.key === 'Cedar');
    const alder = marks.find((m) => m.key === 'Alder');

    expect(cedar).toMatchObject({
      highlighted: true,
      opacity: 1,
      fill: '#ff0000',
    });
    expect(alder).toMatchObject({
      highlighted: false,
      opacity: 0.3,
      fill: '#4e79a7',
    });
  });
});

describe('View.onInteract', () => {
  test('brush selects rows inside the interval', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);

    view.onInteract({ type: 'brush', x: [100, 200] });
    expect(highlighted(group)).toEqual(['Birch', 'Elm', 'Hazel']);

    view.onInteract({ type: 'brush', x: [200, 100] });
    expect(highlighted(group)).toEqual(['Birch', 'Elm', 'Hazel']);
  });

  test('brush on both axes intersects', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);

    view.onInteract({ type: 'brush', x: [100, 200], y: [20, 25] });
    expect(highlighted(group)).toEqual(['Birch', 'Hazel']);
  });

  test('brush only considers rows passing the filters', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);
    group.update('origin', {
      predicate: { type: 'equals', column: 'origin', value: 'US' },
    });

    view.onInteract({ type: 'brush', x: [100, 200] });
    expect(highlighted(group)).toEqual(['Birch']);
  });

  test('a brush over no rows is an empty highlight', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);

    view.onInteract({ type: 'brush', x: [1000, 2000] });

    expect(highlighted(group)).toEqual([]);
    expect(group.getSnapshot().highlightedKeys).not.toBeNull();
    expect(view.render().marks.every((m) => m.opacity === 0.2)).toBe(true);
  });

  test('brush on a categorical channel is rejected', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView({ channels: { x: 'origin', y: 'mpg' } });

    expect(() => view.onInteract({ type: 'brush', x: [0, 1] })).toThrow(
      InvalidPredicate,
    );
    expect(() => view.onInteract({ type: 'brush' })).toThrow(InvalidPredicate);
    expect(group.getSnapshot().version).toBe(0);
  });

  test('lasso selects rows inside the polygon', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);

    view.onInteract({
      type: 'lasso',
      polygon: [
        [60, 25],
        [100, 25],
        [100, 35],
        [60, 35],
      ],
    });
    expect(highlighted(group)).toEqual(['Alder', 'Cedar', 'Fir']);

    expect(() =>
      view.onInteract({
        type: 'lasso',
        polygon: [
          [0, 0],
          [1, 1],
        ],
      }),
    ).toThrow(InvalidPredicate);
  });

  test('additive clicks toggle keys and emptying resets', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);

    view.onInteract({ type: 'click', key: 'Alder' });
    view.onInteract({ type: 'click', key: 'Cedar', additive: true });
    expect(highlighted(group)).toEqual(['Alder', 'Cedar']);

    view.onInteract({ type: 'click', key: 'Alder', additive: true });
    expect(highlighted(group)).toEqual(['Cedar']);

    view.onInteract({ type: 'click', key: 'Cedar', additive: true });
    expect(group.getSnapshot().highlightedKeys).toBeNull();
  });

  test('clicking empty space clears', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);
    view.onInteract({ type: 'click', key: 'Alder' });

    view.onInteract({ type: 'click', key: null });
    expect(group.getSnapshot().highlightedKeys).toBeNull();
  });

  test('clicking an unknown key is rejected', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter);
    expect(() => view.onInteract({ type: 'click', key: 'Oak' })).toThrow(
      InvalidPredicate,
    );
  });

  test('legend selects rows by channel value', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView({
      channels: { ...scatter.channels, color: 'origin' },
    });

    view.onInteract({ type: 'legend', channel: 'color', value: 'JP' });
    expect(highlighted(group)).toEqual(['Cedar', 'Fir', 'Hazel']);

    view.onInteract({
      type: 'legend',
      channel: 'color',
      value: 'EU',
      additive: true,
    });
    expect(highlighted(group)).toEqual([
      'Cedar',
      'Fir',
      'Hazel',
      'Alder',
      'Elm',
    ]);

    expect(() =>
      view.onInteract({ type: 'legend', channel: 'size', value: 1 }),
    ).toThrow(InvalidPredicate);
  });

  test('clear drops only the interacting view highlight', () => {
    const group = new LinkGroup(createCars());
    const a = group.createView(scatter);
    const b = group.createView(scatter);
    a.onInteract({ type: 'click', key: 'Alder' });
    b.onInteract({ type: 'click', key: 'Birch' });

    a.onInteract({ type: 'clear' });
    expect(highlighted(group)).toEqual(['Birch']);
  });
});

describe('View renderer', () => {
  test('synchronous renderers are committed on every change', () => {
    const group = new LinkGroup(createCars());
    const commit = vi.fn();
    const view = group.createView(scatter, {
      renderer: { draw: (artifact) => artifact.rowCount, commit },
    });

    group.update('origin', {
      predicate: { type: 'equals', column: 'origin', value: 'EU' },
    });

    expect(commit).toHaveBeenCalledTimes(1);
    expect(commit).toHaveBeenCalledWith(2, view.render());
    expect(view.getCommittedArtifact()?.version).toBe(1);
  });

  test('stale asynchronous output is discarded', async () => {
    const group = new LinkGroup(createCars());
    const resolvers: Array<(value: string) => void> = [];
    const commit = vi.fn();
    const view = group.createView(scatter, {
      renderer: {
        draw: () => new Promise<string>((resolve) => resolvers.push(resolve)),
        commit,
      },
    });

    const stale = view.refresh();
    group.update('src', { keys: ['Fir'] });
    expect(resolvers).toHaveLength(2);

    resolvers[0]?.('stale');
    await expect(stale).resolves.toBe(false);

    resolvers[1]?.('fresh');
    await vi.waitFor(() => expect(commit).toHaveBeenCalledTimes(1));
    expect(commit).toHaveBeenCalledWith(
      'fresh',
      expect.objectContaining({ version: 1 }),
    );
  });

  test('a failing renderer is reported and not committed', async () => {
    const group = new LinkGroup(createCars());
    const commit = vi.fn();
    const view = group.createView(scatter, {
      renderer: {
        draw: () => {
          throw new Error('canvas lost');
        },
        commit,
      },
    });

    await expect(view.refresh()).resolves.toBe(false);
    expect(commit).not.toHaveBeenCalled();
  });

  test('dispose detaches the view', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter, { id: 'scatter' });
    view.onInteract({ type: 'click', key: 'Alder' });

    view.dispose();

    expect(group.getViewIds()).toEqual([]);
    expect(group.getSnapshot().highlightedKeys).toBeNull();
  });

  test('a detached view can be attached again', () => {
    const group = new LinkGroup(createCars());
    const view = group.createView(scatter, { id: 'scatter' });
    view.onInteract({ type: 'click', key: 'Alder' });

    view.detach();
    expect(group.getViewIds()).toEqual([]);
    expect(group.getSnapshot().highlightedKeys).toBeNull();

    group.attachView(view);
    view.onInteract({ type: 'click', key: 'Birch' });
    expect(highlighted(group)).toEqual(['Birch']);
    expect(view.render().highlightedKeys).toEqual(['Birch']);
  });
});

describe('pointInPolygon', () => {
  const triangle = [
    [0, 0],
    [10, 0],
    [0, 10],
  ] as const;

  test('inside and outside', () => {
    expect(pointInPolygon(2, 2, triangle)).toBe(true);
    expect(pointInPolygon(8, 8, triangle)).toBe(false);
  });
});
