import type { DayName } from './types.js';

export const DAY_NAMES: readonly DayName[] = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'];

export type DayKey = 'sun' | 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat';

export const DAY_KEYS: readonly DayKey[] = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

const ALL_DAYS = 0b1111111;

/**
 * Immutable set of weekdays stored as a 7-bit mask, bit 0 = Sunday (matches Date#getDay)
 */
export class DaySet {
  private constructor(private readonly mask: number) {}

  static all(): DaySet {
    return new DaySet(ALL_DAYS);
  }

  static none(): DaySet {
    return new DaySet(0);
  }

  static fromMask(mask: number): DaySet {
    return new DaySet(mask & ALL_DAYS);
  }

  static of(...days: DayName[]): DaySet {
    return new DaySet(days.reduce((mask, day) => mask | (1 << DAY_NAMES.indexOf(day)), 0));
  }

  /**
   * Build from the per-day booleans older stored schedules carry
   */
  static fromFlags(flags: Partial<Record<DayKey, boolean>>): DaySet {
    let mask = 0;
    DAY_KEYS.forEach((key, index) => {
      if (flags[key]) {
        mask |= 1 << index;
      }
    });
    return new DaySet(mask);
  }

  get sun(): boolean {
    return this.hasIndex(0);
  }

  get mon(): boolean {
    return this.hasIndex(1);
  }

  get tue(): boolean {
    return this.hasIndex(2);
  }

  get wed(): boolean {
    return this.hasIndex(3);
  }

  get thu(): boolean {
    return this.hasIndex(4);
  }

  get fri(): boolean {
    return this.hasIndex(5);
  }

  get sat(): boolean {
    return this.hasIndex(6);
  }

  has(day: DayKey): boolean {
    return this.hasIndex(DAY_KEYS.indexOf(day));
  }

  hasIndex(dayIndex: number): boolean {
    return (this.mask & (1 << dayIndex)) !== 0;
  }

  with(day: DayKey): DaySet {
    return new DaySet(this.mask | (1 << DAY_KEYS.indexOf(day)));
  }

  without(day: DayKey): DaySet {
    return new DaySet(this.mask & ~(1 << DAY_KEYS.indexOf(day)));
  }

  isEmpty(): boolean {
    return this.mask === 0;
  }

  /**
   * Day names in week order, Sunday first
   */
  toList(): DayName[] {
    return DAY_NAMES.filter((_, index) => this.hasIndex(index));
  }

  equals(other: DaySet): boolean {
    return this.mask === other.mask;
  }

  toJSON(): number {
    return this.mask;
  }
}
