export * from './noop';
export * from './fn';
export * from './slot';
