// packages/react-linked-views/src/index.ts
export * from './context';
export * from './filter-context';
export * from './hooks/use-selection-snapshot';
export * from './hooks/use-view';
export * from './hooks/use-filter-widget';
