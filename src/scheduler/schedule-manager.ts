import { scheduleFromSeed, gateConfigFor, type InstanceSettings } from '../config.js';
import { errorMessage, type InstanceLogger } from '../instance-logger.js';
import type { InstanceState } from '../state-store.js';
import { DAY_NAMES } from './day-set.js';
import { Dispatcher } from './dispatcher.js';
import { selectEffectiveTime } from './dual-time-selector.js';
import { GateEvaluator } from './gate-evaluator.js';
import type { StoredInstance } from './persisted.js';
import { RecoveryPlanner } from './recovery-planner.js';
import { ScheduleStore, type DeviceSelection, type EditCommand } from './schedule-store.js';
import { resolveTime, type ResolveContext } from './time-resolver.js';
import { compileTrigger, findFreeMinute, toCronExpression } from './trigger-compiler.js';
import type {
  Capability,
  DeviceActions,
  DeviceConfig,
  GateConfig,
  HubEnvironment,
  RecurringTrigger,
  Schedule,
  SolarProvider,
  TriggerScheduler,
  Unsubscribe,
  VariableStore,
} from './types.js';

export const REFRESH_JOB_KEY = 'refresh';

export interface DeviceDirectory {
  device(deviceId: string): DeviceActions | undefined;
}

export interface InstanceStatePort {
  loadInstance(name: string): StoredInstance | undefined;
  saveInstance(name: string, state: InstanceState): void;
}

export interface ScheduleManagerDependencies {
  log: InstanceLogger;
  scheduler: TriggerScheduler;
  devices: DeviceDirectory;
  variables: VariableStore;
  environment: HubEnvironment;
  solar: SolarProvider;
  state: InstanceStatePort;
}

/**
 * One scheduler instance: owns its device/schedule store, keeps the triggers in
 * line with it and runs fired schedules through the gates and the dispatcher.
 */
export class ScheduleManager {
  private readonly log: InstanceLogger;
  private readonly scheduler: TriggerScheduler;
  private readonly store: ScheduleStore;
  private readonly gates: GateEvaluator;
  private readonly dispatcher: Dispatcher;
  private readonly planner: RecoveryPlanner;

  private paused: boolean;
  private restored = false;
  private subscriptions: Unsubscribe[] = [];
  private renameSubscription: Unsubscribe | null = null;

  constructor(
    private readonly settings: InstanceSettings,
    private readonly deps: ScheduleManagerDependencies,
  ) {
    this.log = deps.log;
    this.scheduler = deps.scheduler;
    this.paused = settings.paused;
    this.store = new ScheduleStore(this.log);
    this.gates = new GateEvaluator(deps.environment);
    this.dispatcher = new Dispatcher(this.log);
    this.planner = new RecoveryPlanner(this.gates, this.dispatcher, this.log);
  }

  get name(): string {
    return this.settings.name;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get devices(): DeviceConfig[] {
    return this.store.all();
  }

  /**
   * Load saved schedules, apply the configured device selection and arm the triggers
   */
  initialize(): void {
    const stored = this.deps.state.loadInstance(this.name);
    if (stored) {
      this.store.load(stored.devices);
      // The saved switch state holds only while the configured value is the one it was saved with
      this.paused = stored.configPaused === this.settings.paused
        ? stored.paused ?? this.settings.paused
        : this.settings.paused;
    }

    const selection: DeviceSelection[] = this.settings.devices.map((device) => {
      const actions = this.deps.devices.device(device.id);
      if (!actions) {
        this.log.warn(`Device ${device.id} was not found on the hub`);
      }
      return {
        id: device.id,
        label: actions?.label ?? device.id,
        seed: device.schedules.map(scheduleFromSeed),
      };
    });
    this.store.selectDevices(selection);

    this.settings.devices.forEach((device) => {
      const current = this.store.get(device.id);
      if (device.capability && current && current.capability !== device.capability) {
        const supported = this.deps.devices.device(device.id)?.supportedCapabilities() ?? [device.capability];
        this.store.setCapability(device.id, device.capability, supported);
      }
    });

    this.renameSubscription?.();
    this.renameSubscription = this.deps.variables.onRename((oldName, newName) => {
      this.renameVariable(oldName, newName);
    });

    this.updated();
    this.log.info(`Initialized with ${this.store.size} device(s)`);
  }

  /**
   * Rebuild everything after a change: drop subscriptions and triggers, refresh
   * the resolved times, save, then register again
   */
  updated(): void {
    this.unsubscribeVariables();
    this.scheduler.cancelAll();
    this.deps.variables.clearAllInUse();
    this.refresh();
    this.persist();
    this.initializeTriggers();
    this.log.scheduleLogsOff(this.scheduler);
  }

  /**
   * Run one fired schedule. Returns true when the device was acted on.
   */
  async handleTrigger(deviceId: string, scheduleId: string): Promise<boolean> {
    const device = this.store.get(deviceId);
    const schedule = device?.schedules.get(scheduleId);
    if (!device || !schedule) {
      this.log.warn(`Schedule ${deviceId}|${scheduleId} no longer exists`);
      return false;
    }

    const actions = this.deps.devices.device(deviceId);
    const label = actions?.label ?? deviceId;
    const config = this.gateConfig();

    const gate = this.gates.evaluate(config, schedule);
    if (!gate.proceed) {
      this.log.info(`${gate.detail}, skipping run for ${label}`);
      return false;
    }

    if (!actions) {
      this.log.warn(`Device ${deviceId} is not available on the hub, skipping run`);
      return false;
    }

    try {
      this.log.debug(`Running schedule ${scheduleId} for ${label}`);
      const result = await this.dispatcher.execute(device, actions, schedule, config);
      return result === 'executed';
    } catch (error) {
      this.log.error(`Error running schedule ${scheduleId} for ${label}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Replay each device's most recent run; only the first call per process does anything
   */
  async restoreState(): Promise<number> {
    if (this.restored) {
      this.log.debug('State already restored since start, skipping');
      return 0;
    }
    this.restored = true;

    const restored = await this.planner.restoreState(
      this.store.all(),
      this.gateConfig(),
      (deviceId) => this.deps.devices.device(deviceId),
      this.deps.environment.now(),
    );
    this.log.info(`Restored ${restored} device(s)`);
    return restored;
  }

  applyEdit(command: EditCommand): string {
    const value = this.store.applyEdit(command);
    this.log.debug(`${command.deviceId}|${command.scheduleId} ${command.field} = ${value}`);
    this.updated();
    return value;
  }

  addRun(deviceId: string): Schedule {
    const schedule = this.store.addRun(deviceId);
    this.updated();
    return schedule;
  }

  removeRun(deviceId: string, scheduleId: string): boolean {
    const removed = this.store.removeRun(deviceId, scheduleId);
    if (removed) {
      this.updated();
    }
    return removed;
  }

  setCapability(deviceId: string, capability: Capability): boolean {
    const actions = this.deps.devices.device(deviceId);
    if (!actions) {
      this.log.warn(`Device ${deviceId} is not available on the hub, capability unchanged`);
      return false;
    }
    const changed = this.store.setCapability(deviceId, capability, actions.supportedCapabilities());
    if (changed) {
      this.updated();
    }
    return changed;
  }

  setPaused(paused: boolean): void {
    if (this.paused === paused) {
      return;
    }
    this.paused = paused;
    this.log.info(paused ? 'Schedules paused' : 'Schedules resumed');
    this.updated();
  }

  renameVariable(oldName: string, newName: string): number {
    const renamed = this.store.renameVariable(oldName, newName);
    if (renamed > 0) {
      this.log.info(`Hub variable ${oldName} renamed to ${newName}, updated ${renamed} time(s)`);
      this.updated();
    }
    return renamed;
  }

  /**
   * Datetime hub variables offered for selection, as "name: value"
   */
  listHubVariables(): string[] {
    return this.deps.variables
      .list()
      .filter((variable) => variable.type.toLowerCase() === 'datetime')
      .map((variable) => `${variable.name}: ${variable.value}`);
  }

  sortedSchedules(deviceId: string): Schedule[] {
    return this.store.sortedSchedules(deviceId);
  }

  shutdown(): void {
    this.unsubscribeVariables();
    this.renameSubscription?.();
    this.renameSubscription = null;
    this.scheduler.cancelAll();
    this.log.info('Schedule Manager shutdown');
  }

  private gateConfig(): GateConfig {
    return gateConfigFor(this.settings, this.paused);
  }

  /**
   * Resolve every schedule's times into a fresh snapshot and swap it in
   */
  private refresh(): void {
    const context: ResolveContext = {
      today: this.deps.environment.now(),
      solar: this.deps.solar,
      variables: this.deps.variables,
      log: this.log,
    };

    const next = this.store.snapshot();
    next.forEach((device) => {
      device.schedules.forEach((schedule) => this.refreshSchedule(schedule, context));
    });
    this.store.replaceAll(next);
  }

  private refreshSchedule(schedule: Schedule, context: ResolveContext): void {
    const selection = selectEffectiveTime(
      schedule.primary,
      schedule.earlierLater === '-' ? null : schedule.secondary,
      schedule.earlierLater,
      (spec) => resolveTime(spec, context),
      context.today,
    );

    if (!selection.resolved) {
      this.log.debug(`Schedule ${schedule.id} has no start time, keeping ${schedule.cron ? toCronExpression(schedule.cron) : 'no trigger'}`);
      return;
    }

    schedule.startTime = selection.primary?.value ?? schedule.startTime;
    schedule.secondaryStartTime = schedule.earlierLater === '-'
      ? null
      : selection.secondary?.value ?? schedule.secondaryStartTime;
    schedule.useSecondary = selection.isSecondary;

    const trigger = compileTrigger(selection.resolved.timestamp, schedule.days);
    if (!trigger) {
      this.log.warn(`Schedule ${schedule.id} has no days selected, not scheduled`);
    }
    schedule.cron = trigger;
  }

  private initializeTriggers(): void {
    if (this.paused) {
      this.log.info('All schedules paused, no triggers registered');
      return;
    }

    const triggers: RecurringTrigger[] = [];
    this.store.all().forEach((device) => {
      const label = this.deps.devices.device(device.id)?.label ?? device.id;
      device.schedules.forEach((schedule) => {
        if (schedule.pause) {
          this.log.debug(`Schedule ${schedule.id} for ${label} is paused, not registered`);
          return;
        }
        if (!schedule.cron) {
          this.log.debug(`Schedule ${schedule.id} for ${label} has no trigger`);
          return;
        }

        triggers.push(schedule.cron);
        const scheduleId = schedule.id;
        this.scheduler.register(schedule.cron, () => this.fire(device.id, scheduleId), {
          dedupeKey: `${device.id}|${scheduleId}`,
          overwrite: true,
        });
        this.log.debug(`Scheduled ${label} at ${toCronExpression(schedule.cron)} (schedule ${scheduleId})`);
      });
    });

    const hour = this.settings.refreshHour;
    let minute = findFreeMinute(triggers, hour);
    if (minute === null) {
      this.log.warn(`Every minute of hour ${hour} is taken by a schedule, daily refresh shares ${hour}:00`);
      minute = 0;
    }
    const refresh: RecurringTrigger = { minute, hour, daysOfWeek: [...DAY_NAMES] };
    this.scheduler.register(refresh, () => this.updated(), { dedupeKey: REFRESH_JOB_KEY, overwrite: true });

    this.subscribeVariables();
    this.log.info(`${triggers.length} schedule(s) registered, daily refresh at ${toCronExpression(refresh)}`);
  }

  private subscribeVariables(): void {
    this.store.variableNames().forEach((name) => {
      this.deps.variables.markInUse(name);
      this.subscriptions.push(
        this.deps.variables.onChange(name, (value) => {
          this.log.debug(`Hub variable ${name} changed to ${value}`);
          this.updated();
        }),
      );
    });
  }

  private unsubscribeVariables(): void {
    this.subscriptions.forEach((unsubscribe) => unsubscribe());
    this.subscriptions = [];
  }

  private fire(deviceId: string, scheduleId: string): void {
    this.handleTrigger(deviceId, scheduleId).catch((error) => {
      this.log.error(`Error handling trigger ${deviceId}|${scheduleId}: ${errorMessage(error)}`);
    });
  }

  private persist(): void {
    this.deps.state.saveInstance(this.name, {
      paused: this.paused,
      configPaused: this.settings.paused,
      devices: this.store.toJSON(),
    });
  }
}
