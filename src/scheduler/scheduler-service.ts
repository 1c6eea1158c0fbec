import type { PlatformSettings } from '../config.js';
import { errorMessage, InstanceLogger, type Log } from '../instance-logger.js';
import { RecurringScheduler } from './recurring-scheduler.js';
import { ScheduleManager, type DeviceDirectory, type InstanceStatePort } from './schedule-manager.js';
import { SunCalcSolarProvider } from './solar-provider.js';
import type { HubEnvironment, VariableStore } from './types.js';

export interface HubPort extends DeviceDirectory, HubEnvironment {
  scoped(): VariableStore;
}

/**
 * Parent of the scheduler instances: one ScheduleManager, with its own timers
 * and logger, per configured instance
 */
export class SchedulerService {
  private managers: Map<string, ScheduleManager> = new Map(); // instance name -> manager
  private initialized = false;

  constructor(
    settings: PlatformSettings,
    hub: HubPort,
    state: InstanceStatePort,
    private readonly log: Log,
  ) {
    this.log.info('Creating Scheduler Service');

    settings.instances.forEach((instance) => {
      const instanceLog = new InstanceLogger(log, instance.name, instance.debugLogging);
      this.managers.set(instance.name, new ScheduleManager(instance, {
        log: instanceLog,
        scheduler: new RecurringScheduler(instanceLog),
        devices: hub,
        variables: hub.scoped(),
        environment: hub,
        solar: new SunCalcSolarProvider(settings.location ?? null, instanceLog),
        state,
      }));
    });
  }

  get(name: string): ScheduleManager | undefined {
    return this.managers.get(name);
  }

  all(): ScheduleManager[] {
    return [...this.managers.values()];
  }

  /**
   * Initialize every instance; one failing instance does not stop the others
   */
  initialize(): void {
    if (this.initialized) {
      this.log.warn('Scheduler Service already initialized, skipping');
      return;
    }

    if (this.managers.size === 0) {
      this.log.warn('No scheduler instances configured');
      return;
    }

    this.managers.forEach((manager, name) => {
      try {
        manager.initialize();
      } catch (error) {
        this.log.error(`Error initializing instance ${name}: ${errorMessage(error)}`);
      }
    });

    this.initialized = true;
    this.log.info(`Scheduler Service initialized with ${this.managers.size} instance(s)`);
  }

  /**
   * Boot-time restore of every instance, one after another
   */
  async restoreState(): Promise<number> {
    let restored = 0;
    for (const [name, manager] of this.managers) {
      try {
        restored += await manager.restoreState();
      } catch (error) {
        this.log.error(`Error restoring instance ${name}: ${errorMessage(error)}`);
      }
    }
    return restored;
  }

  shutdown(): void {
    if (!this.initialized) {
      this.log.debug('Scheduler Service not initialized, nothing to shutdown');
      return;
    }

    this.log.info('Shutting down Scheduler Service');
    this.managers.forEach((manager) => manager.shutdown());
    this.initialized = false;
    this.log.info('Scheduler Service shutdown complete');
  }
}
