export * from './logger';
export * from './timer';
export * from './key-value';
