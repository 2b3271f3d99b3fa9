export * from './memory';
export * from './manager';
