export * from './constants/index';
export * from './errors/index';
export * from './utils/index';
export type * from './types/index';
