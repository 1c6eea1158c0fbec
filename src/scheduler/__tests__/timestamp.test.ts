import { describe, expect, it } from 'vitest';
import {
  addMinutesToTimestamp,
  compareDateToDay,
  formatTimestamp,
  fromDate,
  parseTimestamp,
  toDate,
  type HubTimestamp,
} from '../timestamp.js';

function parsed(raw: string): HubTimestamp {
  const timestamp = parseTimestamp(raw);
  if (!timestamp) {
    throw new Error(`Could not parse ${raw}`);
  }
  return timestamp;
}

describe('parseTimestamp', () => {
  it('reads the hub datetime form', () => {
    expect(parseTimestamp('2024-06-03T18:30:00.000-0400')).toEqual({
      date: { year: 2024, month: 6, day: 3 },
      time: { hour: 18, minute: 30, second: 0, millisecond: 0 },
      zone: '-0400',
    });
  });

  it('reads date-only and time-only values', () => {
    expect(parseTimestamp('2024-12-25T99:99:99.999-0500')).toEqual({
      date: { year: 2024, month: 12, day: 25 },
      time: null,
      zone: '-0500',
    });
    expect(parseTimestamp('9999-99-99T07:15:00.000+0100')).toEqual({
      date: null,
      time: { hour: 7, minute: 15, second: 0, millisecond: 0 },
      zone: '+0100',
    });
  });

  it('falls back to the legacy date string and plain HH:MM', () => {
    expect(parseTimestamp('Mon Jun 03 18:30:00 EDT 2024')).toEqual({
      date: { year: 2024, month: 6, day: 3 },
      time: { hour: 18, minute: 30, second: 0, millisecond: 0 },
      zone: '',
    });
    expect(parseTimestamp('18:05')).toEqual({
      date: null,
      time: { hour: 18, minute: 5, second: 0, millisecond: 0 },
      zone: '',
    });
  });

  it('rejects text no parser accepts', () => {
    expect(parseTimestamp('tomorrow')).toBeNull();
    expect(parseTimestamp('2024-02-30T10:00:00.000+0000')).toBeNull();
  });
});

describe('formatTimestamp', () => {
  it('writes the sentinels back', () => {
    expect(formatTimestamp(parsed('2024-12-25T99:99:99.999-0500'))).toBe('2024-12-25T99:99:99.999-0500');
    expect(formatTimestamp(parsed('9999-99-99T07:15:00.000+0100'))).toBe('9999-99-99T07:15:00.000+0100');
  });
});

describe('addMinutesToTimestamp', () => {
  it('wraps time-only values within the day', () => {
    const later = addMinutesToTimestamp(parsed('9999-99-99T23:50:00.000+0100'), 20);
    const earlier = addMinutesToTimestamp(parsed('9999-99-99T00:10:00.000+0100'), -30);

    expect(formatTimestamp(later)).toBe('9999-99-99T00:10:00.000+0100');
    expect(formatTimestamp(earlier)).toBe('9999-99-99T23:40:00.000+0100');
  });

  it('rolls the calendar date', () => {
    const shifted = addMinutesToTimestamp(parsed('2024-12-31T23:30:00.000+0000'), 45);

    expect(formatTimestamp(shifted)).toBe('2025-01-01T00:15:00.000+0000');
  });

  it('anchors date-only values at midnight', () => {
    const shifted = addMinutesToTimestamp(parsed('2024-12-25T99:99:99.999-0500'), 90);

    expect(formatTimestamp(shifted)).toBe('2024-12-25T01:30:00.000-0500');
  });

  it('shifts the wall clock across a DST change without skipping', () => {
    const shifted = addMinutesToTimestamp(parsed('2024-03-10T01:30:00.000-0500'), 60);

    expect(formatTimestamp(shifted)).toBe('2024-03-10T02:30:00.000-0500');
  });
});

describe('local conversions', () => {
  it('formats a local instant with its zone', () => {
    expect(formatTimestamp(fromDate(new Date('2024-06-03T18:00:00Z')))).toBe('2024-06-03T18:00:00.000+0000');
  });

  it('places a time-only value on the reference day', () => {
    const instant = toDate(parsed('9999-99-99T07:15:00.000+0100'), new Date('2024-06-03T12:00:00Z'));

    expect(instant.toISOString()).toBe('2024-06-03T07:15:00.000Z');
  });

  it('compares calendar dates with a day', () => {
    const day = new Date('2024-06-03T23:59:00Z');

    expect(compareDateToDay({ year: 2024, month: 6, day: 3 }, day)).toBe(0);
    expect(compareDateToDay({ year: 2024, month: 6, day: 4 }, day)).toBe(1);
    expect(compareDateToDay({ year: 2024, month: 5, day: 31 }, day)).toBe(-1);
  });
});
