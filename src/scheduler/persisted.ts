import { z } from 'zod';
import { DaySet } from './day-set.js';
import { parseTimestamp, timeOfDayText } from './timestamp.js';
import type { DeviceConfig, RecurringTrigger, Schedule, TimeSpec } from './types.js';

/**
 * Stored shapes of the device/schedule model and the load-time upgrade of
 * records written by older releases.
 */

const dayNameSchema = z.enum(['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT']);
const buttonActionSchema = z.enum(['push', 'hold', 'doubleTap', 'release']);
const capabilitySchema = z.enum(['Switch', 'Dimmer', 'Button']);

export const timeSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), time: z.string().nullable() }),
  z.object({ kind: z.literal('solar'), event: z.enum(['sunrise', 'sunset']), offsetMinutes: z.number().int() }),
  z.object({ kind: z.literal('variable'), variableName: z.string().nullable(), offsetMinutes: z.number().int() }),
]);

export const triggerSchema = z.object({
  minute: z.number().int().min(0).max(59),
  hour: z.number().int().min(0).max(23),
  daysOfWeek: z.array(dayNameSchema),
});

const storedScheduleSchema = z.object({
  days: z.union([z.number().int(), z.string()]).optional(),
  primary: timeSpecSchema.optional(),
  earlierLater: z.enum(['-', 'earlier', 'later']).optional(),
  secondary: timeSpecSchema.optional(),
  pause: z.boolean().optional(),
  restore: z.boolean().optional(),
  desiredState: z.enum(['on', 'off']).optional(),
  desiredLevel: z.coerce.number().optional(),
  buttonNumber: z.number().int().nullable().optional(),
  buttonAction: buttonActionSchema.nullable().optional(),
  startTime: z.string().nullable().optional(),
  secondaryStartTime: z.string().nullable().optional(),
  useSecondary: z.boolean().optional(),
  cron: z.union([triggerSchema, z.string()]).nullable().optional(),

  // Flat fields of the first stored format
  sun: z.boolean().optional(),
  mon: z.boolean().optional(),
  tue: z.boolean().optional(),
  wed: z.boolean().optional(),
  thu: z.boolean().optional(),
  fri: z.boolean().optional(),
  sat: z.boolean().optional(),
  sunTime: z.boolean().optional(),
  sunset: z.boolean().optional(),
  offset: z.coerce.number().optional(),
  useVariableTime: z.boolean().optional(),
  variableTime: z.string().nullable().optional(),
});

export type StoredSchedule = z.infer<typeof storedScheduleSchema>;

export const storedDeviceSchema = z.object({
  id: z.string(),
  zone: z.number().int().default(0),
  capability: capabilitySchema.default('Switch'),
  schedules: z.record(storedScheduleSchema),
});

export const storedInstanceSchema = z.object({
  paused: z.boolean().optional(),
  // config.json value at the time of the save
  configPaused: z.boolean().optional(),
  devices: z.record(storedDeviceSchema).default({}),
});

export const storedStateSchema = z.object({
  version: z.literal(1).default(1),
  instances: z.record(storedInstanceSchema).default({}),
});

export type StoredDevice = z.infer<typeof storedDeviceSchema>;
export type StoredInstance = z.infer<typeof storedInstanceSchema>;
export type StoredState = z.infer<typeof storedStateSchema>;

export interface PersistedSchedule {
  days: number;
  primary: TimeSpec;
  earlierLater: Schedule['earlierLater'];
  secondary: TimeSpec;
  pause: boolean;
  restore: boolean;
  desiredState: Schedule['desiredState'];
  desiredLevel: number;
  buttonNumber: number | null;
  buttonAction: Schedule['buttonAction'];
  startTime: string | null;
  secondaryStartTime: string | null;
  useSecondary: boolean;
  cron: RecurringTrigger | null;
}

export interface PersistedDevice {
  id: string;
  zone: number;
  capability: DeviceConfig['capability'];
  schedules: Record<string, PersistedSchedule>;
}

export const DEFAULT_SECONDARY_TIME: TimeSpec = { kind: 'fixed', time: null };

function legacyPrimary(stored: StoredSchedule): TimeSpec {
  const offsetMinutes = Math.trunc(stored.offset ?? 0);
  if (stored.sunTime) {
    return { kind: 'solar', event: stored.sunset === false ? 'sunrise' : 'sunset', offsetMinutes };
  }
  if (stored.useVariableTime) {
    return { kind: 'variable', variableName: stored.variableTime ?? null, offsetMinutes };
  }
  const parsed = stored.startTime ? parseTimestamp(stored.startTime) : null;
  return { kind: 'fixed', time: parsed?.time ? timeOfDayText(parsed) : null };
}

function storedDays(stored: StoredSchedule): DaySet {
  if (typeof stored.days === 'number') {
    return DaySet.fromMask(stored.days);
  }
  if (typeof stored.days === 'string' && /^\d+$/.test(stored.days)) {
    return DaySet.fromMask(Number(stored.days));
  }
  const flags = [stored.sun, stored.mon, stored.tue, stored.wed, stored.thu, stored.fri, stored.sat];
  if (flags.some((flag) => flag !== undefined)) {
    return DaySet.fromFlags(stored);
  }
  return DaySet.all();
}

/**
 * Fill in the second time and its policy on records that predate them
 */
export function ensureSecondaryTimeConfig(
  stored: Pick<StoredSchedule, 'secondary' | 'earlierLater' | 'secondaryStartTime' | 'useSecondary'>,
): Pick<Schedule, 'secondary' | 'earlierLater' | 'secondaryStartTime' | 'useSecondary'> {
  const secondary = stored.secondary ?? { ...DEFAULT_SECONDARY_TIME };
  const earlierLater = stored.earlierLater ?? '-';
  return {
    secondary,
    earlierLater,
    secondaryStartTime: stored.secondaryStartTime ?? null,
    useSecondary: earlierLater !== '-' && (stored.useSecondary ?? false),
  };
}

/**
 * Upgrade any stored schedule record to the current model
 */
export function normalizeSchedule(id: string, stored: StoredSchedule): Schedule {
  const legacy = stored.primary === undefined;
  const desiredLevel = Math.min(100, Math.max(0, Math.round(stored.desiredLevel ?? 100)));

  return {
    id,
    days: storedDays(stored),
    primary: stored.primary ?? legacyPrimary(stored),
    ...ensureSecondaryTimeConfig(stored),
    pause: stored.pause ?? false,
    restore: stored.restore ?? true,
    desiredState: stored.desiredState ?? 'on',
    desiredLevel: Number.isNaN(desiredLevel) ? 100 : desiredLevel,
    buttonNumber: stored.buttonNumber ?? null,
    buttonAction: stored.buttonAction ?? null,
    // Derived fields of the first stored format are recomputed on the next refresh
    startTime: legacy ? null : stored.startTime ?? null,
    cron: typeof stored.cron === 'object' ? stored.cron : null,
  };
}

export function normalizeDevice(stored: StoredDevice): DeviceConfig {
  const schedules = new Map<string, Schedule>();
  for (const [scheduleId, schedule] of Object.entries(stored.schedules)) {
    schedules.set(scheduleId, normalizeSchedule(scheduleId, schedule));
  }
  return { id: stored.id, zone: stored.zone, capability: stored.capability, schedules };
}

export function serializeSchedule(schedule: Schedule): PersistedSchedule {
  return {
    days: schedule.days.toJSON(),
    primary: schedule.primary,
    earlierLater: schedule.earlierLater,
    secondary: schedule.secondary,
    pause: schedule.pause,
    restore: schedule.restore,
    desiredState: schedule.desiredState,
    desiredLevel: schedule.desiredLevel,
    buttonNumber: schedule.buttonNumber,
    buttonAction: schedule.buttonAction,
    startTime: schedule.startTime,
    secondaryStartTime: schedule.secondaryStartTime,
    useSecondary: schedule.useSecondary,
    cron: schedule.cron,
  };
}

export function serializeDevice(device: DeviceConfig): PersistedDevice {
  const schedules: Record<string, PersistedSchedule> = {};
  device.schedules.forEach((schedule, scheduleId) => {
    schedules[scheduleId] = serializeSchedule(schedule);
  });
  return { id: device.id, zone: device.zone, capability: device.capability, schedules };
}
