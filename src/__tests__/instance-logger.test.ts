import { describe, expect, it, vi } from 'vitest';
import { errorMessage, InstanceLogger } from '../instance-logger.js';
import { fakeLog } from '../scheduler/__tests__/fakes.js';

describe('InstanceLogger', () => {
  it('prefixes lines with the instance name', () => {
    const log = fakeLog();

    new InstanceLogger(log, 'Evening', true).warn('Hub variable Alarm not found');

    expect(log.warn).toHaveBeenCalledWith('Evening - Hub variable Alarm not found');
  });

  it('drops debug lines while debug logging is off', () => {
    const log = fakeLog();

    new InstanceLogger(log, 'Evening', false).debug('hidden');

    expect(log.debug).not.toHaveBeenCalled();
  });

  it('switches debug logging off when the delay runs', () => {
    const log = fakeLog();
    const logger = new InstanceLogger(log, 'Evening', true);
    const callbacks: Array<() => void> = [];
    const timers = {
      after: vi.fn((_delayMs: number, callback: () => void) => {
        callbacks.push(callback);
        return `delay-${callbacks.length}`;
      }),
      cancel: vi.fn(),
    };

    logger.scheduleLogsOff(timers);
    logger.scheduleLogsOff(timers);
    callbacks[1]?.();
    logger.debug('after');

    expect(timers.after).toHaveBeenCalledWith(3600000, expect.any(Function));
    expect(timers.cancel).toHaveBeenCalledWith('delay-1');
    expect(logger.isDebugEnabled).toBe(false);
    expect(log.debug).toHaveBeenCalledTimes(1);
    expect(log.debug).toHaveBeenCalledWith('Evening - logsOff() called - debug logging auto disabled');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('offline'))).toBe('offline');
    expect(errorMessage(404)).toBe('404');
  });
});
