/**
 * Execution module exports
 */

export {
  runPool,
  executeParallel,
  type PoolSlot,
  type PoolOptions,
  type NamedTask,
  type TaskResult,
  type ExecutionSummary,
} from './parallel-executor.js';
