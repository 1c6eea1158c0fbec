import type { Log } from '../instance-logger.js';
import { nextOccurrence, toCronExpression } from './trigger-compiler.js';
import type { JobRef, RecurringTrigger, RegisterOptions, TriggerScheduler } from './types.js';

/**
 * Timer backed trigger primitive. Each job holds one timeout for its next
 * occurrence and re-arms itself before running the callback.
 */
export class RecurringScheduler implements TriggerScheduler {
  private jobs: Map<string, JobRef> = new Map(); // jobId -> timeout
  private delaySequence = 0;

  constructor(
    private readonly log: Log,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get size(): number {
    return this.jobs.size;
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Register a weekly trigger under its dedupe key
   */
  register(trigger: RecurringTrigger, callback: () => void, options: RegisterOptions): string {
    const jobId = options.dedupeKey;
    const existing = this.jobs.get(jobId);

    if (existing) {
      if (!options.overwrite) {
        this.log.debug(`Job ${jobId} already registered, keeping existing`);
        return jobId;
      }
      clearTimeout(existing.timeoutId);
      this.jobs.delete(jobId);
    }

    this.arm(jobId, trigger, callback);
    return jobId;
  }

  /**
   * Run a callback once after a delay
   */
  after(delayMs: number, callback: () => void): string {
    const jobId = `delay-${++this.delaySequence}`;
    const timeoutId = setTimeout(() => {
      this.jobs.delete(jobId);
      callback();
    }, delayMs);

    this.jobs.set(jobId, { type: 'delay', id: jobId, timeoutId });
    return jobId;
  }

  cancel(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (job) {
      clearTimeout(job.timeoutId);
      this.jobs.delete(jobId);
    }
  }

  /**
   * Clear all scheduled jobs
   */
  cancelAll(): void {
    this.jobs.forEach((job) => {
      clearTimeout(job.timeoutId);
    });
    this.jobs.clear();
    this.log.debug('Cleared all scheduled jobs');
  }

  private arm(jobId: string, trigger: RecurringTrigger, callback: () => void): void {
    const now = this.clock();
    const next = nextOccurrence(trigger, now);
    if (!next) {
      this.log.warn(`Trigger ${toCronExpression(trigger)} has no upcoming occurrence, not scheduled`);
      return;
    }

    const delay = next.getTime() - now.getTime();
    const timeoutId = setTimeout(() => {
      this.jobs.delete(jobId);
      this.arm(jobId, trigger, callback);
      callback();
    }, delay);

    this.jobs.set(jobId, { type: 'trigger', id: jobId, timeoutId });
    this.log.debug(`Job ${jobId} (${toCronExpression(trigger)}) next at ${next.toLocaleString()} (${delay}ms from now)`);
  }
}
