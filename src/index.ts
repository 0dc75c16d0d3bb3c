export { TimerQueueCore } from './core/timerqueue.js';
export type { TimerQueue, TimerQueueOptions, TimerQueueStats } from './core/timerqueue.js';
export { DeadlineHeap } from './core/deadlineheap.js';
export { IdentityIndex } from './core/identityindex.js';
export { RecordArena } from './core/arena.js';
export { NO_POSITION, naturalOrder, handlerOf } from './core/record.js';
export type { Earlier, Handle, TimerHandler, TimerRecord } from './core/record.js';
export { EmptyQueueError, StaleHandleError, ReactorStoppedError, ConfigError } from './core/errors.js';
export { TimerReactor, systemClock, waitTimeout } from './reactor/reactor.js';
export type { Clock, ReactorOptions, TimerCallback } from './reactor/reactor.js';
export { reactorOptionsFromEnv } from './config.js';
export { metrics, exportMetrics, LabeledHistogram, LabeledCounter } from './utils/metrics.js';
export { logger } from './utils/logger.js';
