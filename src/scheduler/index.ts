export { FlushScheduler } from './FlushScheduler.js';
export type { FlushSchedulerConfig, FlushHandler } from './types.js';
