import { describe, expect, test } from 'vitest';
import { InvalidPredicate } from '../src/errors';
import {
  compilePredicate,
  describePredicate,
  evaluatePredicate,
  resolveColumn,
} from '../src/predicate';
import { createCars, decade, sorted } from './fixtures';
import type { DerivedColumn, Predicate } from '../src/types';

describe('evaluatePredicate', () => {
  const cars = createCars();

  test('membership keeps rows whose value is listed', () => {
    const keys = evaluatePredicate(
      { type: 'membership', column: 'cyl', values: [4] },
      cars,
    );
    expect([...keys]).toEqual(['Alder', 'Cedar', 'Fir']);
  });

  test('range is a closed interval', () => {
    const keys = evaluatePredicate(
      { type: 'range', column: 'mpg', min: 21, max: 27.3 },
      cars,
    );
    expect([...keys]).toEqual(['Birch', 'Cedar', 'Hazel']);
  });

  test('range with an open side', () => {
    const keys = evaluatePredicate(
      { type: 'range', column: 'mpg', min: 30, max: null },
      cars,
    );
    expect([...keys]).toEqual(['Alder', 'Fir']);
  });

  test('range over a temporal column compares dates', () => {
    const keys = evaluatePredicate(
      {
        type: 'range',
        column: 'released',
        min: new Date('2019-01-01'),
        max: new Date('2020-12-31'),
      },
      cars,
    );
    expect([...keys]).toEqual(['Alder', 'Cedar', 'Hazel']);
  });

  test('equals', () => {
    const keys = evaluatePredicate(
      { type: 'equals', column: 'origin', value: 'JP' },
      cars,
    );
    expect([...keys]).toEqual(['Cedar', 'Fir', 'Hazel']);
  });

  test('text is case-insensitive by default', () => {
    const keys = evaluatePredicate(
      { type: 'text', column: 'model', query: 'O' },
      cars,
    );
    expect([...keys]).toEqual(['Dogwood', 'Ginkgo']);
  });

  test('text can be case-sensitive', () => {
    const keys = evaluatePredicate(
      { type: 'text', column: 'model', query: 'E', caseSensitive: true },
      cars,
    );
    expect([...keys]).toEqual(['Elm']);
  });

  test('derived columns are computed per row', () => {
    const keys = evaluatePredicate(
      { type: 'equals', column: decade, value: 2020 },
      cars,
    );
    expect(sorted(keys)).toEqual(['Cedar', 'Elm', 'Fir']);
  });
});

describe('compilePredicate validation', () => {
  const cars = createCars();

  const rejects = (predicate: Predicate) => {
    let caught: unknown;
    try {
      compilePredicate(predicate, cars);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidPredicate);
    return caught;
  };

  test('unknown column', () => {
    const error = rejects({ type: 'equals', column: 'weight', value: 1 });
    expect(error).toMatchObject({
      column: 'weight',
      message: '[Predicate] Unknown column "weight" in dataset "cars".',
    });
  });

  test('range without bounds', () => {
    rejects({ type: 'range', column: 'mpg', min: null, max: null });
  });

  test('range with min greater than max', () => {
    rejects({ type: 'range', column: 'mpg', min: 30, max: 10 });
  });

  test('range over a categorical column', () => {
    rejects({ type: 'range', column: 'origin', min: 1, max: 2 });
  });

  test('empty text query', () => {
    rejects({ type: 'text', column: 'model', query: '' });
  });

  test('derived column over a missing column', () => {
    const broken: DerivedColumn = {
      id: 'ratio',
      dependsOn: ['hp', 'weight'],
      compute: () => null,
    };
    const error = rejects({ type: 'equals', column: broken, value: 1 });
    expect(error).toMatchObject({ column: 'ratio' });
  });
});

describe('resolveColumn', () => {
  test('reads declared type for plain columns', () => {
    const accessor = resolveColumn('hp', createCars());
    expect(accessor.type).toBe('numeric');
    expect(accessor.derived).toBe(false);
  });

  test('derived columns carry no declared type', () => {
    const accessor = resolveColumn(decade, createCars());
    expect(accessor.id).toBe('decade');
    expect(accessor.type).toBeUndefined();
    expect(accessor.derived).toBe(true);
  });
});

describe('describePredicate', () => {
  test('membership lists values', () => {
    expect(
      describePredicate({ type: 'membership', column: 'cyl', values: [4, 6] }),
    ).toBe('4, 6');
  });

  test('range forms', () => {
    expect(
      describePredicate({ type: 'range', column: 'hp', min: 10, max: 20 }),
    ).toBe('10 - 20');
    expect(
      describePredicate({ type: 'range', column: 'hp', min: 10, max: null }),
    ).toBe('>= 10');
    expect(
      describePredicate({ type: 'range', column: 'hp', min: null, max: 20 }),
    ).toBe('<= 20');
  });

  test('dates are shown as calendar days', () => {
    expect(
      describePredicate({
        type: 'range',
        column: 'released',
        min: new Date('2019-01-01'),
        max: new Date('2020-12-31'),
      }),
    ).toBe('2019-01-01 - 2020-12-31');
  });

  test('text is quoted', () => {
    expect(
      describePredicate({ type: 'text', column: 'model', query: 'fir' }),
    ).toBe('"fir"');
  });
});
