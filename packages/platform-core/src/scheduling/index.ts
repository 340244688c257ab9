/**
 * Centralized Scheduling Module
 */

export { BaseScheduler } from './BaseScheduler.js';
export { SchedulerRegistry } from './SchedulerRegistry.js';
export { intervalToCronExpression, isExactCronInterval } from './interval.js';
export type {
  SchedulerStatus,
  SchedulerInfo,
  SchedulerExecutionResult,
  SchedulerHealthReport,
  SchedulerConfig,
} from './types.js';
