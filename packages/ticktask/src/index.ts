export * from '@ticktask/core';
export * from '@ticktask/engine';
export { PinoLogger, NodeTimerHost, InMemoryKeyValueConnection, KeyValueManager } from '@ticktask/adapters';
export type {
  PinoLoggerOptions,
  NodeTimerHostOptions,
  InMemoryKeyValueConnectionOptions,
  KeyValueCommand,
  KeyValueManagerOptions
} from '@ticktask/adapters';

export * from './api';
