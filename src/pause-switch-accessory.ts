import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { ScheduleManagerPlatform } from './platform.js';
import type { ScheduleManager } from './scheduler/index.js';

/**
 * Pause Switch Accessory
 * One switch per scheduler instance: on while its schedules run, off while paused
 */
export class PauseSwitchAccessory {
  private readonly service: Service;

  constructor(
    private readonly platform: ScheduleManagerPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly manager: ScheduleManager,
  ) {
    this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?.setCharacteristic(this.platform.Characteristic.Manufacturer, 'Schedule Manager')
      .setCharacteristic(this.platform.Characteristic.Model, 'Instance Pause Switch')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, this.accessory.UUID);

    const name = `${manager.name} Schedules`;
    this.service = this.accessory.getService(this.platform.Service.Switch) ||
      this.accessory.addService(this.platform.Service.Switch, name);
    this.service.setCharacteristic(this.platform.Characteristic.Name, name);

    this.service.getCharacteristic(this.platform.Characteristic.On)
      .onSet(this.setOn.bind(this))
      .onGet(this.getOn.bind(this));
  }

  private getOn(): CharacteristicValue {
    return !this.manager.isPaused;
  }

  private setOn(value: CharacteristicValue): void {
    const running = Boolean(value);
    this.platform.log.info(`${this.manager.name}: schedules ${running ? 'resumed' : 'paused'} from HomeKit`);
    this.manager.setPaused(!running);
  }

  /**
   * Push the current pause state to HomeKit
   */
  refresh(): void {
    this.service.updateCharacteristic(this.platform.Characteristic.On, !this.manager.isPaused);
  }
}
