import type { Log } from '../instance-logger.js';
import type { DeviceActions, DeviceConfig, GateConfig, Schedule } from './types.js';

export type DispatchResult = 'executed' | 'skipped';

/**
 * Sends a schedule's action to its device. Device errors are not retried here;
 * the next firing is the retry.
 */
export class Dispatcher {
  constructor(private readonly log: Log) {}

  async execute(
    device: DeviceConfig,
    actions: DeviceActions,
    schedule: Schedule,
    config: Pick<GateConfig, 'activateOnBeforeLevel'>,
  ): Promise<DispatchResult> {
    if (device.capability === 'Button') {
      return this.pressButton(actions, schedule);
    }

    if (schedule.desiredState === 'on') {
      if (device.capability === 'Dimmer') {
        if (config.activateOnBeforeLevel) {
          await actions.turnOn();
          this.log.debug(`${actions.label} turned on`);
        }
        await actions.setLevel(schedule.desiredLevel);
        this.log.debug(`${actions.label} set to ${schedule.desiredLevel}`);
      } else {
        await actions.turnOn();
        this.log.debug(`${actions.label} turned on`);
      }
    } else {
      await actions.turnOff();
      this.log.debug(`${actions.label} turned off`);
    }
    return 'executed';
  }

  private async pressButton(actions: DeviceActions, schedule: Schedule): Promise<DispatchResult> {
    const { buttonAction, buttonNumber } = schedule;
    if (buttonAction === null || buttonNumber === null) {
      this.log.error(`Button action or number not set for ${actions.label} (schedule ${schedule.id})`);
      return 'skipped';
    }

    if (!actions.supportedButtonActions().includes(buttonAction)) {
      this.log.error(`${actions.label} does not support button action ${buttonAction}`);
      return 'skipped';
    }

    await actions.invoke(buttonAction, buttonNumber);
    this.log.debug(`${actions.label} button ${buttonNumber} ${buttonAction}`);
    return 'executed';
  }
}
