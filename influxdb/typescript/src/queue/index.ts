export { AsyncQueue } from './async-queue.js';
export type { TakeResult } from './async-queue.js';
export { QueueWorker } from './worker.js';
export type { WorkerState, ItemProcessor } from './worker.js';
