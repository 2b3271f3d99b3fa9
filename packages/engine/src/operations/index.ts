export * from './operation';
export * from './combinators';
