// packages/linked-views-core/src/index.ts
export * from './dataset';
export * from './errors';
export * from './link-group';
export * from './selection-state';
export * from './view';
export * from './widgets';
export * from './predicate';
export * from './facets';
export * from './sql';
export * from './filter-registry';
export * from './constants';
export * from './logger';
export * from './schema';
export * from './validation';
export type * from './types';
