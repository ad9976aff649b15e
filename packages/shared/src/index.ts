export { ConcurrentPool, type PoolOutcome } from './utils/concurrent-pool';
export { Stats } from './utils/stats';
