export * from './config';
export * from './countdown';
export * from './engine';
export * from './layout';
export * from './math';
export * from './target';
export type * from './types';
