export * from './logger';
export * from './timer';
export * from './kv';
