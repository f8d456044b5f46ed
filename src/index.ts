export * from './types';
export * from './core/coords';
export * from './core/dimension';
export * from './core/transform';
export * from './core/bounds';
export * from './core/paint';
export * from './core/clip';
export * from './core/shapes';
export * from './core/path';
export * from './core/text';
export * from './core/cascade';
export * from './core/layout';
export * from './core/compose';
export * from './core/renderer';
export * from './core/errors';
export * from './core/logger';
export * from './core/config';
export * from './state/store';
