import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logger,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { parsePlatformConfig } from './config.js';
import { HubApi } from './hub-api.js';
import { errorMessage } from './instance-logger.js';
import { PauseSwitchAccessory } from './pause-switch-accessory.js';
import { SchedulerService } from './scheduler/index.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { StateStore } from './state-store.js';

/**
 * HomebridgePlatform
 * Polls the hub, runs the scheduler instances and exposes one pause switch per instance
 */
export class ScheduleManagerPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Used to track restored cached accessories
  public readonly accessories: PlatformAccessory[] = [];

  private hub?: HubApi;
  private scheduler?: SchedulerService;
  private readonly switches: PauseSwitchAccessory[] = [];

  constructor(
    public readonly log: Logger,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = this.api.hap.Service;
    this.Characteristic = this.api.hap.Characteristic;

    this.log.info('Initializing ScheduleManager platform...');

    const settings = parsePlatformConfig(this.config, this.log);
    if (!settings) {
      this.log.error('Configuration is invalid, schedules will not run. Please fix config.json.');
      return;
    }

    this.hub = new HubApi(settings.hub, this.log);
    const state = new StateStore(this.api.user.storagePath(), this.log);
    this.scheduler = new SchedulerService(settings, this.hub, state, this.log);

    // When this event is fired, homebridge has restored all cached accessories from disk.
    // Dynamic Platform plugins should only register new accessories after this event was fired,
    // in order to ensure they weren't added to homebridge twice.
    this.api.on('didFinishLaunching', () => {
      this.log.info('Executed didFinishLaunching callback');
      this.start().catch((error) => this.log.error(`Error starting schedules: ${errorMessage(error)}`));
    });

    this.api.on('shutdown', () => {
      this.log.info('Shutting down ScheduleManager platform...');
      this.hub?.stopPolling();
      this.scheduler?.shutdown();
    });
  }

  /**
   * This function is invoked when homebridge restores cached accessories from disk.
   */
  configureAccessory(accessory: PlatformAccessory) {
    this.log.info('Loading accessory from cache:', accessory.displayName);
    this.accessories.push(accessory);
  }

  private async start(): Promise<void> {
    if (!this.hub || !this.scheduler) {
      return;
    }

    await this.hub.poll();
    this.scheduler.initialize();
    this.registerPauseSwitches(this.scheduler);
    this.hub.startPolling();

    const restored = await this.scheduler.restoreState();
    this.log.info(`Start-up complete, ${restored} device(s) restored`);
  }

  private registerPauseSwitches(scheduler: SchedulerService): void {
    const active = new Set<string>();

    for (const manager of scheduler.all()) {
      const uuid = this.api.hap.uuid.generate(`${PLUGIN_NAME}:${manager.name}`);
      active.add(uuid);

      const existing = this.accessories.find((accessory) => accessory.UUID === uuid);
      if (existing) {
        this.log.info(`Restoring pause switch from cache: ${existing.displayName}`);
        existing.context.instance = manager.name;
        this.api.updatePlatformAccessories([existing]);
        this.switches.push(new PauseSwitchAccessory(this, existing, manager));
      } else {
        const name = `${manager.name} Schedules`;
        this.log.info(`Adding new pause switch: ${name}`);
        const accessory = new this.api.platformAccessory(name, uuid);
        accessory.context.instance = manager.name;
        this.switches.push(new PauseSwitchAccessory(this, accessory, manager));
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      }
    }

    // Remove switches of instances no longer configured
    const stale = this.accessories.filter((accessory) => !active.has(accessory.UUID));
    if (stale.length > 0) {
      stale.forEach((accessory) => this.log.info(`Removing pause switch no longer configured: ${accessory.displayName}`));
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
    }

    this.switches.forEach((pauseSwitch) => pauseSwitch.refresh());
  }
}
