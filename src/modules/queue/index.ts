export { SqlRunQueue, type PopOptions, type RunHandle, type RunQueue, type SqlRunQueueOptions } from './run-queue';
export {
  RunQueueConsumer,
  type ConsumerOptions,
  type ConsumerStats,
  type DeadlineSweeper,
  type RunDisposition,
  type RunProcessor,
} from './consumer';
