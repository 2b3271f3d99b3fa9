export * from './defaults';
export * from './types';
