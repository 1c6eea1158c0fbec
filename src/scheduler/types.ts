/**
 * Scheduler type definitions
 */

import type { DaySet } from './day-set.js';

export type Capability = 'Switch' | 'Dimmer' | 'Button';

export type SwitchState = 'on' | 'off';

export type ButtonAction = 'push' | 'hold' | 'doubleTap' | 'release';

export const BUTTON_ACTIONS: readonly ButtonAction[] = ['push', 'hold', 'doubleTap', 'release'];

export type DayName = 'SUN' | 'MON' | 'TUE' | 'WED' | 'THU' | 'FRI' | 'SAT';

export type EarlierLater = '-' | 'earlier' | 'later';

export type SolarEvent = 'sunrise' | 'sunset';

export interface FixedTime {
  kind: 'fixed';
  time: string | null; // Format: "HH:MM" (24-hour), null until selected
}

export interface SolarTime {
  kind: 'solar';
  event: SolarEvent;
  offsetMinutes: number;
}

export interface VariableTime {
  kind: 'variable';
  variableName: string | null;
  offsetMinutes: number;
}

export type TimeSpec = FixedTime | SolarTime | VariableTime;

/**
 * Minute-granularity weekly trigger handed to the recurring scheduler
 */
export interface RecurringTrigger {
  minute: number;
  hour: number;
  daysOfWeek: DayName[];
}

export interface Schedule {
  id: string;
  days: DaySet;
  primary: TimeSpec;
  earlierLater: EarlierLater;
  secondary: TimeSpec;
  pause: boolean;
  restore: boolean;
  desiredState: SwitchState;
  desiredLevel: number;
  buttonNumber: number | null;
  buttonAction: ButtonAction | null;

  // Derived by the refresh pass, never edited directly
  startTime: string | null;
  secondaryStartTime: string | null;
  useSecondary: boolean;
  cron: RecurringTrigger | null;
}

export interface DeviceConfig {
  id: string;
  zone: number;
  capability: Capability;
  schedules: Map<string, Schedule>;
}

/**
 * Operator settings read by the gates and the dispatcher, captured once per evaluation
 */
export interface GateConfig {
  readonly paused: boolean;
  readonly modes: {
    readonly enabled: boolean;
    readonly allowed: readonly string[];
  };
  readonly activationSwitch: {
    readonly enabled: boolean;
    readonly deviceId: string | null;
    readonly state: SwitchState;
  };
  readonly activateOnBeforeLevel: boolean;
}

/**
 * Commands a scheduled device accepts
 */
export interface DeviceActions {
  readonly id: string;
  readonly label: string;
  turnOn(): Promise<void>;
  turnOff(): Promise<void>;
  setLevel(level: number): Promise<void>;
  invoke(action: ButtonAction, buttonNumber: number): Promise<void>;
  currentState(): SwitchState | null;
  currentLevel(): number | null;
  supportedCapabilities(): readonly Capability[];
  supportedButtonActions(): readonly ButtonAction[];
}

export interface SunriseSunset {
  sunrise: Date;
  sunset: Date;
}

export interface SolarProvider {
  sunriseSunset(offsetMinutes: number, today?: Date): SunriseSunset | null;
}

export interface HubVariable {
  name: string;
  type: string;
  value: string;
}

export type Unsubscribe = () => void;

export interface VariableStore {
  get(name: string): { value: string } | null;
  list(): HubVariable[];
  onChange(name: string, handler: (value: string) => void): Unsubscribe;
  onRename(handler: (oldName: string, newName: string) => void): Unsubscribe;
  markInUse(name: string): void;
  clearAllInUse(): void;
}

/**
 * Read-only hub globals consulted by the gates
 */
export interface HubEnvironment {
  currentMode(): string | null;
  switchState(deviceId: string): SwitchState | null;
  now(): Date;
}

export interface RegisterOptions {
  dedupeKey: string;
  overwrite: boolean;
}

export interface JobRef {
  type: 'trigger' | 'delay';
  id: string;
  timeoutId: NodeJS.Timeout;
}

/**
 * Recurring and one-shot timer primitive owned by one scheduler instance
 */
export interface TriggerScheduler {
  register(trigger: RecurringTrigger, callback: () => void, options: RegisterOptions): string;
  after(delayMs: number, callback: () => void): string;
  cancel(jobId: string): void;
  cancelAll(): void;
}
