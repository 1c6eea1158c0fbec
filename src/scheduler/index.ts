/**
 * Scheduler module for the Schedule Manager platform
 * Per-device run schedules with fixed, sunrise/sunset and hub variable times
 */

export { SchedulerService } from './scheduler-service.js';
export { ScheduleManager } from './schedule-manager.js';
export { ScheduleStore } from './schedule-store.js';
export { RecurringScheduler } from './recurring-scheduler.js';
export * from './types.js';
