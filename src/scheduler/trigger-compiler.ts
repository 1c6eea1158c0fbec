import { addDays, set, startOfDay, subDays } from 'date-fns';
import { DAY_NAMES, type DaySet } from './day-set.js';
import type { HubTimestamp } from './timestamp.js';
import type { RecurringTrigger } from './types.js';

/**
 * Weekly minute-granularity trigger for a resolved time; null when no day is selected
 */
export function compileTrigger(effective: HubTimestamp, days: DaySet): RecurringTrigger | null {
  if (days.isEmpty()) {
    return null;
  }

  const time = effective.time ?? { hour: 0, minute: 0 };
  return {
    minute: time.minute,
    hour: time.hour,
    daysOfWeek: days.toList(),
  };
}

/**
 * Quartz style expression, used as a stable key and in logs
 */
export function toCronExpression(trigger: RecurringTrigger): string {
  return `0 ${trigger.minute} ${trigger.hour} ? * ${trigger.daysOfWeek.join(',')} *`;
}

export function sameTrigger(a: RecurringTrigger | null, b: RecurringTrigger | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return toCronExpression(a) === toCronExpression(b);
}

function occurrenceOn(trigger: RecurringTrigger, day: Date): Date | null {
  if (!trigger.daysOfWeek.includes(DAY_NAMES[day.getDay()])) {
    return null;
  }
  return set(day, { hours: trigger.hour, minutes: trigger.minute, seconds: 0, milliseconds: 0 });
}

/**
 * First firing strictly after the given instant
 */
export function nextOccurrence(trigger: RecurringTrigger, after: Date): Date | null {
  const firstDay = startOfDay(after);
  for (let offset = 0; offset <= 7; offset++) {
    const candidate = occurrenceOn(trigger, addDays(firstDay, offset));
    if (candidate && candidate > after) {
      return candidate;
    }
  }
  return null;
}

/**
 * Latest firing in [windowStart, before), walking forward from the window start
 */
export function latestOccurrenceBefore(trigger: RecurringTrigger, before: Date, windowStart: Date): Date | null {
  let latest: Date | null = null;
  for (let day = startOfDay(windowStart); day <= before; day = addDays(day, 1)) {
    const candidate = occurrenceOn(trigger, day);
    if (candidate && candidate >= windowStart && candidate < before) {
      latest = candidate;
    }
  }
  return latest;
}

export function lookbackStart(now: Date, days: number): Date {
  return subDays(now, days);
}

/**
 * First minute of the hour no trigger uses; null when the whole hour is taken
 */
export function findFreeMinute(triggers: Iterable<RecurringTrigger>, hour: number): number | null {
  const taken = new Set<number>();
  for (const trigger of triggers) {
    if (trigger.hour === hour) {
      taken.add(trigger.minute);
    }
  }
  for (let minute = 0; minute < 60; minute++) {
    if (!taken.has(minute)) {
      return minute;
    }
  }
  return null;
}
