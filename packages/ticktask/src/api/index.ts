export * from './createRuntime';
