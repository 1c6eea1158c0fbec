import type { Logger } from 'homebridge';

export type Log = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

export const DEBUG_LOGGING_WINDOW_MS = 60 * 60 * 1000;

interface DelayPrimitive {
  after(delayMs: number, callback: () => void): string;
  cancel(jobId: string): void;
}

/**
 * Schedule Manager instance logger
 * Prefixes every line with the instance name and gates debug output on the
 * instance's debug switch, which turns itself off an hour after start
 */
export class InstanceLogger implements Log {
  private debugEnabled: boolean;
  private logsOffJob: string | null = null;

  constructor(
    private readonly log: Log,
    private readonly label: string,
    debugEnabled = false,
  ) {
    this.debugEnabled = debugEnabled;
  }

  get isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  info(message: string): void {
    this.log.info(`${this.label} - ${message}`);
  }

  warn(message: string): void {
    this.log.warn(`${this.label} - ${message}`);
  }

  error(message: string): void {
    this.log.error(`${this.label} - ${message}`);
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      this.log.debug(`${this.label} - ${message}`);
    }
  }

  /**
   * Arm the automatic switch-off of debug logging
   */
  scheduleLogsOff(timers: DelayPrimitive, delayMs = DEBUG_LOGGING_WINDOW_MS): void {
    if (!this.debugEnabled) {
      return;
    }
    if (this.logsOffJob) {
      timers.cancel(this.logsOffJob);
    }
    this.logsOffJob = timers.after(delayMs, () => this.logsOff());
  }

  logsOff(): void {
    this.logsOffJob = null;
    if (!this.debugEnabled) {
      return;
    }
    this.debug('logsOff() called - debug logging auto disabled');
    this.debugEnabled = false;
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
