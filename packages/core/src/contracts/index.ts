export * from './computation';
export * from './waker';
