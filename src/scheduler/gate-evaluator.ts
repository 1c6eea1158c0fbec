import { compareDateToDay, dateText, parseTimestamp } from './timestamp.js';
import type { GateConfig, HubEnvironment, Schedule } from './types.js';

export type SkipReason = 'globalPause' | 'mode' | 'activationSwitch' | 'schedulePause' | 'variableDate';

export type GateResult =
  | { proceed: true }
  | { proceed: false; reason: SkipReason; detail: string };

const PASS: GateResult = { proceed: true };

/**
 * Run-time conditions a fired trigger has to clear before it acts.
 * Gates run in a fixed order and stop at the first one that fails.
 */
export class GateEvaluator {
  constructor(private readonly env: HubEnvironment) {}

  /**
   * Global pause, mode and activation switch gates
   */
  evaluateGlobal(config: GateConfig): GateResult {
    if (config.paused) {
      return { proceed: false, reason: 'globalPause', detail: 'All schedules paused' };
    }

    if (config.modes.enabled) {
      const mode = this.env.currentMode();
      if (mode === null || !config.modes.allowed.includes(mode)) {
        return {
          proceed: false,
          reason: 'mode',
          detail: `Mode of ${mode ?? 'unknown'} is not one of ${config.modes.allowed.join(', ')}`,
        };
      }
    }

    if (config.activationSwitch.enabled) {
      const { deviceId, state } = config.activationSwitch;
      const current = deviceId === null ? null : this.env.switchState(deviceId);
      if (current !== state) {
        return {
          proceed: false,
          reason: 'activationSwitch',
          detail: `Switch ${deviceId ?? '(none selected)'} is not set to ${state}`,
        };
      }
    }

    return PASS;
  }

  /**
   * Every gate for one fired schedule
   */
  evaluate(config: GateConfig, schedule: Schedule): GateResult {
    const global = this.evaluateGlobal(config);
    if (!global.proceed) {
      return global;
    }

    if (schedule.pause) {
      return { proceed: false, reason: 'schedulePause', detail: 'Schedule is paused' };
    }

    return this.checkVariableDate(schedule);
  }

  /**
   * A hub variable holding a full date only fires on that date
   */
  private checkVariableDate(schedule: Schedule): GateResult {
    const spec = schedule.useSecondary ? schedule.secondary : schedule.primary;
    const startTime = schedule.useSecondary ? schedule.secondaryStartTime : schedule.startTime;
    if (spec.kind !== 'variable' || startTime === null) {
      return PASS;
    }

    const timestamp = parseTimestamp(startTime);
    if (!timestamp?.date) {
      return PASS;
    }

    if (compareDateToDay(timestamp.date, this.env.now()) !== 0) {
      return {
        proceed: false,
        reason: 'variableDate',
        detail: `Scheduled date ${dateText(timestamp.date)} is not today`,
      };
    }
    return PASS;
  }
}
