import { Dataset } from '../src/dataset';
import type { DerivedColumn } from '../src/types';

// ---------------------------------------------------------------------------
// Shared fixtures
// ---------------------------------------------------------------------------

export function createCars(): Dataset {
  return Dataset.from({
    name: 'cars',
    columns: [
      { name: 'model', type: 'key' },
      { name: 'cyl', type: 'categorical', label: 'Cylinders' },
      { name: 'mpg', type: 'numeric' },
      { name: 'hp', type: 'numeric', label: 'Horsepower' },
      { name: 'origin', type: 'categorical' },
      { name: 'released', type: 'temporal' },
    ],
    rows: [
      { model: 'Alder', cyl: 4, mpg: 31.5, hp: 88, origin: 'EU', released: '2019-03-01' },
      { model: 'Birch', cyl: 6, mpg: 21.0, hp: 140, origin: 'US', released: '2018-06-15' },
      { model: 'Cedar', cyl: 4, mpg: 27.3, hp: 95, origin: 'JP', released: '2020-01-10' },
      { model: 'Dogwood', cyl: 8, mpg: 15.2, hp: 245, origin: 'US', released: '2017-09-30' },
      { model: 'Elm', cyl: 6, mpg: 19.7, hp: 160, origin: 'EU', released: '2021-11-05' },
      { model: 'Fir', cyl: 4, mpg: 33.9, hp: 70, origin: 'JP', released: '2022-04-20' },
      { model: 'Ginkgo', cyl: 8, mpg: 14.3, hp: 300, origin: 'US', released: '2016-02-12' },
      { model: 'Hazel', cyl: 6, mpg: 22.8, hp: 125, origin: 'JP', released: '2019-08-08' },
    ],
  });
}

/**
 * The three-row table used by the linked-selection scenarios.
 */
export function createTrio(): Dataset {
  return Dataset.from({
    name: 'trio',
    columns: [
      { name: 'id', type: 'key' },
      { name: 'cyl', type: 'categorical' },
    ],
    rows: [
      { id: 'A', cyl: 4 },
      { id: 'B', cyl: 6 },
      { id: 'C', cyl: 4 },
    ],
  });
}

export const decade: DerivedColumn = {
  id: 'decade',
  dependsOn: ['released'],
  compute: (row) => {
    const released = row.released;
    return released instanceof Date
      ? Math.floor(released.getUTCFullYear() / 10) * 10
      : null;
  },
};

export function sorted<T>(values: Iterable<T>): Array<T> {
  return [...values].sort();
}
