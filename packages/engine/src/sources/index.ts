export * from './delay';
export * from './notify';
export * from './yieldNow';
