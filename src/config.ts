import { z } from 'zod';
import type { Log } from './instance-logger.js';
import { DaySet } from './scheduler/day-set.js';
import { timeSpecSchema } from './scheduler/persisted.js';
import { createDefaultSchedule } from './scheduler/schedule-store.js';
import type { DayName, GateConfig, Schedule } from './scheduler/types.js';

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const DAY_OPTIONS = {
  sunday: 'SUN',
  monday: 'MON',
  tuesday: 'TUE',
  wednesday: 'WED',
  thursday: 'THU',
  friday: 'FRI',
  saturday: 'SAT',
} as const satisfies Record<string, DayName>;

const dayOptionSchema = z.enum([
  'everyday',
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
]);

const scheduleSeedSchema = z.object({
  days: z.array(dayOptionSchema).default(['everyday']),
  time: timeSpecSchema.default({ kind: 'fixed', time: null }),
  earlierLater: z.enum(['-', 'earlier', 'later']).default('-'),
  secondaryTime: timeSpecSchema.default({ kind: 'fixed', time: null }),
  pause: z.boolean().default(false),
  restore: z.boolean().default(true),
  desiredState: z.enum(['on', 'off']).default('on'),
  desiredLevel: z.number().int().min(0).max(100).default(100),
  buttonNumber: z.number().int().min(1).nullable().default(null),
  buttonAction: z.enum(['push', 'hold', 'doubleTap', 'release']).nullable().default(null),
});

const instanceSchema = z.object({
  name: z.string().min(1),
  devices: z
    .array(
      z.object({
        id: idSchema,
        capability: z.enum(['Switch', 'Dimmer', 'Button']).optional(),
        schedules: z.array(scheduleSeedSchema).default([]),
      }),
    )
    .default([]),
  modes: z
    .object({
      enabled: z.boolean().default(false),
      allowed: z.array(z.string()).default([]),
    })
    .default({}),
  activationSwitch: z
    .object({
      enabled: z.boolean().default(false),
      deviceId: idSchema.optional(),
      state: z.enum(['on', 'off']).default('on'),
    })
    .default({}),
  activateOnBeforeLevel: z.boolean().default(false),
  paused: z.boolean().default(false),
  debugLogging: z.boolean().default(true),
  refreshHour: z.number().int().min(0).max(23).default(1),
});

export const platformConfigSchema = z.object({
  platform: z.string(),
  name: z.string().default('Schedule Manager'),
  hub: z.object({
    baseUrl: z.string().url(),
    appId: idSchema,
    accessToken: z.string().min(1),
    pollSeconds: z.number().int().min(5).default(30),
    timeoutMs: z.number().int().positive().default(10000),
  }),
  location: z
    .object({
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180),
    })
    .optional(),
  instances: z
    .array(instanceSchema)
    .default([])
    .superRefine((instances, ctx) => {
      const seen = new Set<string>();
      instances.forEach((instance, index) => {
        if (seen.has(instance.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate instance name "${instance.name}"`,
            path: [index, 'name'],
          });
        }
        seen.add(instance.name);
      });
    }),
});

export type PlatformSettings = z.infer<typeof platformConfigSchema>;
export type HubSettings = PlatformSettings['hub'];
export type InstanceSettings = z.infer<typeof instanceSchema>;
export type ScheduleSeed = z.infer<typeof scheduleSeedSchema>;

/**
 * Validate the platform block of config.json, logging every problem found
 */
export function parsePlatformConfig(config: unknown, log: Log): PlatformSettings | null {
  const result = platformConfigSchema.safeParse(config);
  if (!result.success) {
    result.error.issues.forEach((issue) => {
      log.error(`Invalid configuration at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    });
    return null;
  }
  return result.data;
}

export function daySetFromOptions(days: ScheduleSeed['days']): DaySet {
  if (days.includes('everyday')) {
    return DaySet.all();
  }
  const named = days.filter((day): day is Exclude<typeof day, 'everyday'> => day !== 'everyday');
  return DaySet.of(...named.map((day) => DAY_OPTIONS[day]));
}

/**
 * Schedule for a run declared in config.json
 */
export function scheduleFromSeed(seed: ScheduleSeed): Schedule {
  return {
    ...createDefaultSchedule(),
    days: daySetFromOptions(seed.days),
    primary: seed.time,
    earlierLater: seed.earlierLater,
    secondary: seed.secondaryTime,
    pause: seed.pause,
    restore: seed.restore,
    desiredState: seed.desiredState,
    desiredLevel: seed.desiredLevel,
    buttonNumber: seed.buttonNumber,
    buttonAction: seed.buttonAction,
  };
}

/**
 * Immutable gate settings for one evaluation
 */
export function gateConfigFor(settings: InstanceSettings, paused: boolean): GateConfig {
  return Object.freeze({
    paused,
    modes: Object.freeze({ enabled: settings.modes.enabled, allowed: Object.freeze([...settings.modes.allowed]) }),
    activationSwitch: Object.freeze({
      enabled: settings.activationSwitch.enabled,
      deviceId: settings.activationSwitch.deviceId ?? null,
      state: settings.activationSwitch.state,
    }),
    activateOnBeforeLevel: settings.activateOnBeforeLevel,
  });
}
