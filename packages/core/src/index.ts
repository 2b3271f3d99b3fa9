export * from './contracts';
export * from './ports';
export * from './config';
export * from './errors';
