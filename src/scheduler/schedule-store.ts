import { v4 as uuidv4 } from 'uuid';
import type { Log } from '../instance-logger.js';
import { DaySet, type DayKey } from './day-set.js';
import { normalizeDevice, serializeDevice, type PersistedDevice, type StoredDevice } from './persisted.js';
import { parseTimeOfDay, parseTimestamp, timeOfDayText } from './timestamp.js';
import type {
  ButtonAction,
  Capability,
  DeviceConfig,
  EarlierLater,
  Schedule,
  SolarEvent,
  SwitchState,
  TimeSpec,
} from './types.js';

export type TimeSlot = 'primary' | 'secondary';

export type TimeSource = TimeSpec['kind'];

export type ScheduleEdit =
  | { field: DayKey; value: boolean }
  | { field: 'pause' | 'restore'; value: boolean }
  | { field: 'desiredState'; value: SwitchState }
  | { field: 'desiredLevel'; value: number }
  | { field: 'buttonNumber'; value: number | null }
  | { field: 'buttonAction'; value: ButtonAction | null }
  | { field: 'earlierLater'; value: EarlierLater }
  | { field: 'timeSource'; slot: TimeSlot; value: TimeSource }
  | { field: 'startTime'; slot: TimeSlot; value: string }
  | { field: 'offset'; slot: TimeSlot; value: number }
  | { field: 'solarEvent'; slot: TimeSlot; value: SolarEvent }
  | { field: 'variableName'; slot: TimeSlot; value: string };

export type EditCommand = { deviceId: string; scheduleId: string } & ScheduleEdit;

export interface DeviceSelection {
  id: string;
  label: string;
  capability?: Capability;
  seed?: Schedule[];
}

/**
 * A new run: every day, start time not yet selected, turns the device on
 */
export function createDefaultSchedule(id: string = uuidv4()): Schedule {
  return {
    id,
    days: DaySet.all(),
    primary: { kind: 'fixed', time: null },
    earlierLater: '-',
    secondary: { kind: 'fixed', time: null },
    pause: false,
    restore: true,
    desiredState: 'on',
    desiredLevel: 100,
    buttonNumber: null,
    buttonAction: null,
    startTime: null,
    secondaryStartTime: null,
    useSecondary: false,
    cron: null,
  };
}

function defaultTimeSpec(kind: TimeSource, previous: TimeSpec): TimeSpec {
  const offsetMinutes = previous.kind === 'fixed' ? 0 : previous.offsetMinutes;
  switch (kind) {
    case 'fixed':
      return { kind: 'fixed', time: null };
    case 'solar':
      return { kind: 'solar', event: 'sunset', offsetMinutes };
    case 'variable':
      return { kind: 'variable', variableName: null, offsetMinutes };
  }
}

function cloneSchedule(schedule: Schedule): Schedule {
  return {
    ...schedule,
    primary: { ...schedule.primary },
    secondary: { ...schedule.secondary },
    cron: schedule.cron ? { ...schedule.cron, daysOfWeek: [...schedule.cron.daysOfWeek] } : null,
  };
}

export function cloneDevice(device: DeviceConfig): DeviceConfig {
  const schedules = new Map<string, Schedule>();
  device.schedules.forEach((schedule, scheduleId) => schedules.set(scheduleId, cloneSchedule(schedule)));
  return { ...device, schedules };
}

/**
 * Device → schedules model of one scheduler instance.
 * Every device always holds at least one schedule.
 */
export class ScheduleStore {
  private devices: Map<string, DeviceConfig> = new Map(); // deviceId -> config

  constructor(private readonly log: Log) {}

  get size(): number {
    return this.devices.size;
  }

  get(deviceId: string): DeviceConfig | undefined {
    return this.devices.get(deviceId);
  }

  getSchedule(deviceId: string, scheduleId: string): Schedule | undefined {
    return this.devices.get(deviceId)?.schedules.get(scheduleId);
  }

  all(): DeviceConfig[] {
    return [...this.devices.values()];
  }

  /**
   * Deep copy of every device, for building the next refresh snapshot
   */
  snapshot(): Map<string, DeviceConfig> {
    const copy = new Map<string, DeviceConfig>();
    this.devices.forEach((device, deviceId) => copy.set(deviceId, cloneDevice(device)));
    return copy;
  }

  /**
   * Swap in a complete snapshot in one step
   */
  replaceAll(next: Map<string, DeviceConfig>): void {
    this.devices = next;
  }

  load(stored: Record<string, StoredDevice>): void {
    const devices = new Map<string, DeviceConfig>();
    for (const [deviceId, device] of Object.entries(stored)) {
      const normalized = normalizeDevice({ ...device, id: deviceId });
      if (normalized.schedules.size === 0) {
        const schedule = createDefaultSchedule();
        normalized.schedules.set(schedule.id, schedule);
      }
      devices.set(deviceId, normalized);
    }
    this.devices = devices;
  }

  toJSON(): Record<string, PersistedDevice> {
    const result: Record<string, PersistedDevice> = {};
    this.devices.forEach((device, deviceId) => {
      result[deviceId] = serializeDevice(device);
    });
    return result;
  }

  /**
   * Make the store match the selected devices: new ones get their seed schedules (or
   * one default run), deselected ones are removed with all their schedules.
   * Zones follow the label order.
   */
  selectDevices(selection: DeviceSelection[]): string[] {
    const selectedIds = new Set(selection.map((device) => device.id));
    const removed: string[] = [];

    this.devices.forEach((_, deviceId) => {
      if (!selectedIds.has(deviceId)) {
        removed.push(deviceId);
      }
    });
    removed.forEach((deviceId) => {
      this.devices.delete(deviceId);
      this.log.info(`Removed device ${deviceId} and its schedules`);
    });

    for (const device of selection) {
      if (this.devices.has(device.id)) {
        continue;
      }
      const schedules = new Map<string, Schedule>();
      const seed = device.seed && device.seed.length > 0 ? device.seed : [createDefaultSchedule()];
      seed.forEach((schedule) => schedules.set(schedule.id, schedule));
      this.devices.set(device.id, { id: device.id, zone: 0, capability: device.capability ?? 'Switch', schedules });
      this.log.info(`Added device ${device.label} with ${schedules.size} schedule(s)`);
    }

    [...selection]
      .sort((a, b) => a.label.toLowerCase().localeCompare(b.label.toLowerCase()))
      .forEach((device, index) => {
        const config = this.devices.get(device.id);
        if (config) {
          config.zone = index + 1;
        }
      });

    return removed;
  }

  addRun(deviceId: string): Schedule {
    const device = this.requireDevice(deviceId);
    const schedule = createDefaultSchedule();
    device.schedules.set(schedule.id, schedule);
    this.log.debug(`Added run ${schedule.id} to device ${deviceId}`);
    return schedule;
  }

  /**
   * Remove a run; removing the last one leaves a fresh default in its place
   */
  removeRun(deviceId: string, scheduleId: string): boolean {
    const device = this.requireDevice(deviceId);
    if (!device.schedules.delete(scheduleId)) {
      return false;
    }
    if (device.schedules.size === 0) {
      const schedule = createDefaultSchedule();
      device.schedules.set(schedule.id, schedule);
      this.log.debug(`Last run removed from device ${deviceId}, added default run ${schedule.id}`);
    }
    return true;
  }

  setCapability(deviceId: string, capability: Capability, supported: readonly Capability[]): boolean {
    const device = this.requireDevice(deviceId);
    if (!supported.includes(capability)) {
      this.log.warn(`Device ${deviceId} does not support capability ${capability}`);
      return false;
    }
    device.capability = capability;
    return true;
  }

  /**
   * Apply one operator edit and return the value as it now reads
   */
  applyEdit(command: EditCommand): string {
    const schedule = this.getSchedule(command.deviceId, command.scheduleId);
    if (!schedule) {
      throw new Error(`Unknown schedule ${command.deviceId}|${command.scheduleId}`);
    }

    switch (command.field) {
      case 'sun':
      case 'mon':
      case 'tue':
      case 'wed':
      case 'thu':
      case 'fri':
      case 'sat':
        schedule.days = command.value ? schedule.days.with(command.field) : schedule.days.without(command.field);
        return String(schedule.days.has(command.field));
      case 'pause':
      case 'restore':
        schedule[command.field] = command.value;
        return String(command.value);
      case 'desiredState':
        schedule.desiredState = command.value;
        return command.value;
      case 'desiredLevel':
        schedule.desiredLevel = Math.min(100, Math.max(0, Math.round(command.value)));
        return String(schedule.desiredLevel);
      case 'buttonNumber':
        if (command.value !== null && (!Number.isInteger(command.value) || command.value < 1)) {
          throw new Error(`Invalid button number: ${command.value}`);
        }
        schedule.buttonNumber = command.value;
        return command.value === null ? '' : String(command.value);
      case 'buttonAction':
        schedule.buttonAction = command.value;
        return command.value ?? '';
      case 'earlierLater':
        schedule.earlierLater = command.value;
        if (command.value === '-') {
          schedule.useSecondary = false;
        }
        return command.value;
      case 'timeSource':
        schedule[command.slot] = defaultTimeSpec(command.value, schedule[command.slot]);
        return command.value;
      case 'startTime':
        return this.editStartTime(schedule, command.slot, command.value);
      case 'offset':
        return this.editOffset(schedule, command.slot, command.value);
      case 'solarEvent': {
        const spec = schedule[command.slot];
        if (spec.kind !== 'solar') {
          throw new Error(`The ${command.slot} time is not a sunrise/sunset time`);
        }
        schedule[command.slot] = { ...spec, event: command.value };
        return command.value;
      }
      case 'variableName': {
        const spec = schedule[command.slot];
        if (spec.kind !== 'variable') {
          throw new Error(`The ${command.slot} time is not a hub variable time`);
        }
        schedule[command.slot] = { ...spec, variableName: command.value };
        return command.value;
      }
    }
  }

  /**
   * Point every time that used a renamed hub variable at its new name
   */
  renameVariable(oldName: string, newName: string): number {
    let renamed = 0;
    this.devices.forEach((device) => {
      device.schedules.forEach((schedule) => {
        for (const slot of ['primary', 'secondary'] as const) {
          const spec = schedule[slot];
          if (spec.kind === 'variable' && spec.variableName === oldName) {
            schedule[slot] = { ...spec, variableName: newName };
            renamed++;
          }
        }
      });
    });
    return renamed;
  }

  /**
   * Schedules of a device in display order: by resolved time of day, runs without a
   * time last, insertion order otherwise
   */
  sortedSchedules(deviceId: string): Schedule[] {
    const device = this.devices.get(deviceId);
    if (!device) {
      return [];
    }
    const timeKey = (schedule: Schedule): string | null => {
      const startTime = schedule.useSecondary ? schedule.secondaryStartTime : schedule.startTime;
      const timestamp = startTime ? parseTimestamp(startTime) : null;
      return timestamp ? timeOfDayText(timestamp) : null;
    };
    return [...device.schedules.values()].sort((a, b) => {
      const keyA = timeKey(a);
      const keyB = timeKey(b);
      if (keyA === null || keyB === null) {
        return keyA === keyB ? 0 : keyA === null ? 1 : -1;
      }
      return keyA.localeCompare(keyB);
    });
  }

  /**
   * Names of every hub variable the stored times reference
   */
  variableNames(): Set<string> {
    const names = new Set<string>();
    this.devices.forEach((device) => {
      device.schedules.forEach((schedule) => {
        const slots: TimeSpec[] = schedule.earlierLater === '-' ? [schedule.primary] : [schedule.primary, schedule.secondary];
        slots.forEach((spec) => {
          if (spec.kind === 'variable' && spec.variableName !== null) {
            names.add(spec.variableName);
          }
        });
      });
    });
    return names;
  }

  private editStartTime(schedule: Schedule, slot: TimeSlot, value: string): string {
    if (schedule[slot].kind !== 'fixed') {
      throw new Error(`The ${slot} time is not a fixed time`);
    }
    const clock = parseTimeOfDay(value);
    if (!clock) {
      throw new Error(`Invalid start time: ${value}`);
    }
    const time = timeOfDayText({ date: null, time: clock, zone: '' });
    schedule[slot] = { kind: 'fixed', time };
    return time;
  }

  private editOffset(schedule: Schedule, slot: TimeSlot, value: number): string {
    const spec = schedule[slot];
    if (spec.kind === 'fixed') {
      throw new Error(`The ${slot} time does not take an offset`);
    }
    if (!Number.isInteger(value) || value < -1000 || value > 1000) {
      throw new Error(`Offset must be a whole number of minutes between -1000 and 1000: ${value}`);
    }
    schedule[slot] = { ...spec, offsetMinutes: value };
    return String(value);
  }

  private requireDevice(deviceId: string): DeviceConfig {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new Error(`Unknown device ${deviceId}`);
    }
    return device;
  }
}
