/**
 * Re-exports the ticktask execution engine components.
 */
export * from './execution/executor';
export * from './execution/roundRobin';
export * from './execution/scheduler';
export * from './execution/task';
export * from './execution/cell';
export * from './execution/joinHandle';
export * from './channels/readyQueue';
export * from './channels/channel';
export * from './channels/oneshot';
export * from './wakers';
export * from './sources';
export * from './operations';
