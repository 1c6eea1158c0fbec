import { startOfDay } from 'date-fns';
import { errorMessage, type Log } from '../instance-logger.js';
import type { Dispatcher } from './dispatcher.js';
import type { GateEvaluator } from './gate-evaluator.js';
import { parseTimestamp, toDate } from './timestamp.js';
import { latestOccurrenceBefore, lookbackStart } from './trigger-compiler.js';
import type { DeviceActions, DeviceConfig, GateConfig, Schedule } from './types.js';

export const RESTORE_LOOKBACK_DAYS = 7;

export interface RestorePlan {
  device: DeviceConfig;
  schedule: Schedule;
  firedAt: Date;
}

/**
 * Most recent theoretical firing of a schedule before `now`, inside the lookback window
 */
export function lastFiring(schedule: Schedule, now: Date): Date | null {
  const windowStart = lookbackStart(now, RESTORE_LOOKBACK_DAYS);
  const spec = schedule.useSecondary ? schedule.secondary : schedule.primary;
  const startTime = schedule.useSecondary ? schedule.secondaryStartTime : schedule.startTime;

  if (spec.kind === 'variable' && startTime !== null) {
    const timestamp = parseTimestamp(startTime);
    if (timestamp?.date) {
      // A dated variable only ever fires on its own date
      const firedAt = toDate(timestamp, now);
      if (startOfDay(firedAt) > startOfDay(now)) {
        return null;
      }
      return firedAt >= windowStart && firedAt < now ? firedAt : null;
    }
  }

  if (!schedule.cron) {
    return null;
  }
  return latestOccurrenceBefore(schedule.cron, now, windowStart);
}

/**
 * Boot-time replay of each device's most recent run
 */
export class RecoveryPlanner {
  constructor(
    private readonly gates: GateEvaluator,
    private readonly dispatcher: Dispatcher,
    private readonly log: Log,
  ) {}

  /**
   * Pick the schedule to replay per device. The most recent firing wins; when it has
   * restore disabled the device is left alone.
   */
  planRestore(devices: Iterable<DeviceConfig>, now: Date): RestorePlan[] {
    const plans: RestorePlan[] = [];

    for (const device of devices) {
      if (device.capability === 'Button') {
        this.log.debug(`Skipping restore for button device ${device.id}`);
        continue;
      }

      try {
        const plan = this.planDevice(device, now);
        if (plan) {
          plans.push(plan);
        }
      } catch (error) {
        this.log.error(`Error planning restore for device ${device.id}: ${errorMessage(error)}`);
      }
    }

    return plans;
  }

  /**
   * Gate once, plan, then replay sequentially. One device failing does not stop the rest.
   */
  async restoreState(
    devices: Iterable<DeviceConfig>,
    config: GateConfig,
    actionsFor: (deviceId: string) => DeviceActions | undefined,
    now: Date,
  ): Promise<number> {
    const gate = this.gates.evaluateGlobal(config);
    if (!gate.proceed) {
      this.log.info(`${gate.detail}, skipping restore`);
      return 0;
    }

    let restored = 0;
    for (const plan of this.planRestore(devices, now)) {
      const actions = actionsFor(plan.device.id);
      if (!actions) {
        this.log.warn(`Device ${plan.device.id} is no longer available, skipping restore`);
        continue;
      }

      try {
        this.log.info(`Restoring ${actions.label} from run at ${plan.firedAt.toLocaleString()} (schedule ${plan.schedule.id})`);
        const result = await this.dispatcher.execute(plan.device, actions, plan.schedule, config);
        if (result === 'executed') {
          restored++;
        }
      } catch (error) {
        this.log.error(`Error restoring ${actions.label}: ${errorMessage(error)}`);
      }
    }
    return restored;
  }

  private planDevice(device: DeviceConfig, now: Date): RestorePlan | null {
    let winner: RestorePlan | null = null;

    for (const schedule of device.schedules.values()) {
      if (schedule.pause) {
        continue;
      }
      const firedAt = lastFiring(schedule, now);
      if (firedAt && (!winner || firedAt > winner.firedAt)) {
        winner = { device, schedule, firedAt };
      }
    }

    if (!winner) {
      this.log.debug(`No run in the last ${RESTORE_LOOKBACK_DAYS} days for device ${device.id}`);
      return null;
    }

    if (!winner.schedule.restore) {
      this.log.debug(`Most recent run for device ${device.id} (schedule ${winner.schedule.id}) has restore disabled`);
      return null;
    }

    return winner;
  }
}
