import { addMinutes, format, isValid, parse } from 'date-fns';

/**
 * Hub datetime text: yyyy-MM-dd'T'HH:mm:ss.SSS±hhmm
 *
 * A hub variable holding only a time writes NO_DATE in place of the date, and one
 * holding only a date writes NO_TIME in place of the time. Both markers survive
 * every operation in this module.
 */
export const NO_DATE = '9999-99-99';
export const NO_TIME = '99:99:99.999';

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export interface HubTimestamp {
  date: CalendarDate | null;
  time: ClockTime | null;
  zone: string; // "+0100", "-0400" or "" when unknown
}

type TimestampParser = (raw: string) => HubTimestamp | null;

const HUB_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{3})([+-]\d{4}|Z)?$/;
const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T99:99:99\.999([+-]\d{4}|Z)?$/;
const TIME_ONLY_PATTERN = /^9999-99-99T(\d{2}):(\d{2}):(\d{2})\.(\d{3})([+-]\d{4}|Z)?$/;
const LEGACY_PATTERN = /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{2}) (\d{2}):(\d{2}):(\d{2}) \S+ (\d{4})$/;
const PLAIN_TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  const candidate = new Date(year, month - 1, day);
  if (!isValid(candidate) || candidate.getMonth() !== month - 1 || candidate.getDate() !== day) {
    return null;
  }
  return { year, month, day };
}

function toClockTime(hour: number, minute: number, second = 0, millisecond = 0): ClockTime | null {
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return { hour, minute, second, millisecond };
}

function normalizeZone(zone: string | undefined): string {
  return zone === 'Z' ? '+0000' : zone ?? '';
}

const parseHubDateTime: TimestampParser = (raw) => {
  const match = HUB_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, ms, zone] = match;
  const date = toCalendarDate(Number(year), Number(month), Number(day));
  const time = toClockTime(Number(hour), Number(minute), Number(second), Number(ms));
  if (!date || !time) {
    return null;
  }
  return { date, time, zone: normalizeZone(zone) };
};

const parseHubDateOnly: TimestampParser = (raw) => {
  const match = DATE_ONLY_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, year, month, day, zone] = match;
  const date = toCalendarDate(Number(year), Number(month), Number(day));
  return date ? { date, time: null, zone: normalizeZone(zone) } : null;
};

const parseHubTimeOnly: TimestampParser = (raw) => {
  const match = TIME_ONLY_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, hour, minute, second, ms, zone] = match;
  const time = toClockTime(Number(hour), Number(minute), Number(second), Number(ms));
  return time ? { date: null, time, zone: normalizeZone(zone) } : null;
};

// Date#toString form written by older releases for sunrise/sunset times
const parseLegacyDateString: TimestampParser = (raw) => {
  const match = LEGACY_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, monthName, day, hour, minute, second, year] = match;
  const parsed = parse(`${monthName} ${day} ${year}`, 'MMM dd yyyy', new Date(0));
  if (!isValid(parsed)) {
    return null;
  }
  const date = toCalendarDate(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
  const time = toClockTime(Number(hour), Number(minute), Number(second));
  if (!date || !time) {
    return null;
  }
  return { date, time, zone: '' };
};

const parsePlainTime: TimestampParser = (raw) => {
  const match = PLAIN_TIME_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const time = toClockTime(Number(match[1]), Number(match[2]));
  return time ? { date: null, time, zone: '' } : null;
};

const PARSERS: readonly TimestampParser[] = [
  parseHubDateTime,
  parseHubDateOnly,
  parseHubTimeOnly,
  parseLegacyDateString,
  parsePlainTime,
];

/**
 * Parse any stored or hub supplied time text; null when no parser accepts it
 */
export function parseTimestamp(raw: string): HubTimestamp | null {
  const value = raw.trim();
  for (const parser of PARSERS) {
    const result = parser(value);
    if (result) {
      return result;
    }
  }
  return null;
}

/**
 * Parse an operator entered "HH:MM" time of day
 */
export function parseTimeOfDay(raw: string): ClockTime | null {
  return parsePlainTime(raw.trim())?.time ?? null;
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

export function formatTimestamp(timestamp: HubTimestamp): string {
  const { date, time, zone } = timestamp;
  const datePart = date ? `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}` : NO_DATE;
  const timePart = time
    ? `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}.${pad(time.millisecond, 3)}`
    : NO_TIME;
  return `${datePart}T${timePart}${zone}`;
}

/**
 * Wall-clock timestamp of a local instant, with the local zone offset
 */
export function fromDate(date: Date): HubTimestamp {
  return {
    date: { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() },
    time: {
      hour: date.getHours(),
      minute: date.getMinutes(),
      second: date.getSeconds(),
      millisecond: date.getMilliseconds(),
    },
    zone: format(date, 'xx'),
  };
}

/**
 * Local instant for a timestamp. A missing date falls on the reference day and a
 * missing time is midnight. The wall clock is read in the local zone.
 */
export function toDate(timestamp: HubTimestamp, reference: Date): Date {
  const date = timestamp.date ?? {
    year: reference.getFullYear(),
    month: reference.getMonth() + 1,
    day: reference.getDate(),
  };
  const time = timestamp.time ?? { hour: 0, minute: 0, second: 0, millisecond: 0 };
  return new Date(date.year, date.month - 1, date.day, time.hour, time.minute, time.second, time.millisecond);
}

/**
 * Shift a timestamp by whole minutes, calendar aware.
 *
 * Time-only values wrap within the day and stay time-only. Date-only values are
 * anchored at midnight before shifting.
 */
export function addMinutesToTimestamp(timestamp: HubTimestamp, minutes: number): HubTimestamp {
  if (minutes === 0) {
    return timestamp;
  }

  const { date, zone } = timestamp;
  const time = timestamp.time ?? { hour: 0, minute: 0, second: 0, millisecond: 0 };

  if (!date) {
    const minuteOfDay = (((time.hour * 60 + time.minute + minutes) % 1440) + 1440) % 1440;
    return {
      date: null,
      time: { ...time, hour: Math.floor(minuteOfDay / 60), minute: minuteOfDay % 60 },
      zone,
    };
  }

  // UTC fields carry the wall clock so the shift never crosses a DST transition
  const floating = new Date(
    Date.UTC(date.year, date.month - 1, date.day, time.hour, time.minute, time.second, time.millisecond),
  );
  const shifted = addMinutes(floating, minutes);
  return {
    date: { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() },
    time: {
      hour: shifted.getUTCHours(),
      minute: shifted.getUTCMinutes(),
      second: shifted.getUTCSeconds(),
      millisecond: shifted.getUTCMilliseconds(),
    },
    zone,
  };
}

/**
 * "HH:MM" of a timestamp; date-only values read as midnight
 */
export function timeOfDayText(timestamp: HubTimestamp): string {
  const time = timestamp.time ?? { hour: 0, minute: 0 };
  return `${pad(time.hour)}:${pad(time.minute)}`;
}

export function dateText(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/**
 * Calendar date comparison against a local instant, ignoring time of day and zone
 */
export function compareDateToDay(date: CalendarDate, day: Date): number {
  const left = date.year * 10000 + date.month * 100 + date.day;
  const right = day.getFullYear() * 10000 + (day.getMonth() + 1) * 100 + day.getDate();
  return Math.sign(left - right);
}
