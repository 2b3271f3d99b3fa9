export * from './node';
export * from './fake';
