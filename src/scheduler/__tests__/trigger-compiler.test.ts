import { describe, expect, it } from 'vitest';
import { DaySet } from '../day-set.js';
import { parseTimestamp, type HubTimestamp } from '../timestamp.js';
import {
  compileTrigger,
  findFreeMinute,
  latestOccurrenceBefore,
  lookbackStart,
  nextOccurrence,
  sameTrigger,
  toCronExpression,
} from '../trigger-compiler.js';
import type { RecurringTrigger } from '../types.js';

function timestamp(raw: string): HubTimestamp {
  const parsed = parseTimestamp(raw);
  if (!parsed) {
    throw new Error(`Could not parse ${raw}`);
  }
  return parsed;
}

const mondayWednesdayFriday: RecurringTrigger = { minute: 0, hour: 18, daysOfWeek: ['MON', 'WED', 'FRI'] };

describe('compileTrigger', () => {
  it('compiles 18:00 on Mon/Wed/Fri', () => {
    const trigger = compileTrigger(timestamp('2024-06-03T18:00:00.000+0000'), DaySet.of('MON', 'WED', 'FRI'));

    expect(trigger).toEqual(mondayWednesdayFriday);
    expect(trigger && toCronExpression(trigger)).toBe('0 0 18 ? * MON,WED,FRI *');
  });

  it('compiles the same inputs to the same trigger', () => {
    const days = DaySet.of('SAT', 'SUN');
    const first = compileTrigger(timestamp('9999-99-99T06:45:00.000+0000'), days);
    const second = compileTrigger(timestamp('9999-99-99T06:45:00.000+0000'), days);

    expect(sameTrigger(first, second)).toBe(true);
    expect(first).toEqual(second);
  });

  it('has no trigger without days', () => {
    expect(compileTrigger(timestamp('2024-06-03T18:00:00.000+0000'), DaySet.none())).toBeNull();
  });

  it('fires a date-only value at midnight', () => {
    expect(compileTrigger(timestamp('2024-06-03T99:99:99.999+0000'), DaySet.of('MON'))).toEqual({
      minute: 0,
      hour: 0,
      daysOfWeek: ['MON'],
    });
  });
});

describe('occurrences', () => {
  it('finds the next firing strictly after an instant', () => {
    expect(nextOccurrence(mondayWednesdayFriday, new Date('2024-06-03T18:00:00Z'))?.toISOString())
      .toBe('2024-06-05T18:00:00.000Z');
    expect(nextOccurrence(mondayWednesdayFriday, new Date('2024-06-08T10:00:00Z'))?.toISOString())
      .toBe('2024-06-10T18:00:00.000Z');
  });

  it('finds the latest firing inside the window', () => {
    const now = new Date('2024-06-10T12:00:00Z');

    const latest = latestOccurrenceBefore(mondayWednesdayFriday, now, lookbackStart(now, 7));

    expect(latest?.toISOString()).toBe('2024-06-07T18:00:00.000Z');
  });

  it('has no firing when the trigger has no days', () => {
    expect(nextOccurrence({ minute: 0, hour: 1, daysOfWeek: [] }, new Date('2024-06-10T12:00:00Z'))).toBeNull();
  });
});

describe('findFreeMinute', () => {
  it('skips minutes taken in that hour only', () => {
    const triggers: RecurringTrigger[] = [
      { minute: 0, hour: 1, daysOfWeek: ['MON'] },
      { minute: 1, hour: 1, daysOfWeek: ['TUE'] },
      { minute: 2, hour: 2, daysOfWeek: ['MON'] },
    ];

    expect(findFreeMinute(triggers, 1)).toBe(2);
  });

  it('returns null when every minute is taken', () => {
    const triggers = Array.from({ length: 60 }, (_, minute): RecurringTrigger => ({ minute, hour: 1, daysOfWeek: ['SUN'] }));

    expect(findFreeMinute(triggers, 1)).toBeNull();
  });
});
