export * from './base';
export * from './checkbox-filter';
export * from './range-slider-filter';
export * from './select-filter';
export * from './text-filter';
