import { describe, expect, it } from 'vitest';
import { GateEvaluator } from '../gate-evaluator.js';
import { createDefaultSchedule } from '../schedule-store.js';
import type { GateConfig, HubEnvironment, Schedule, SwitchState } from '../types.js';

function gateConfig(overrides: Partial<GateConfig> = {}): GateConfig {
  return {
    paused: false,
    modes: { enabled: true, allowed: ['Home', 'Night'] },
    activationSwitch: { enabled: true, deviceId: 'sw1', state: 'on' },
    activateOnBeforeLevel: false,
    ...overrides,
  };
}

function recordingEnvironment(mode: string | null, switchState: SwitchState | null, now: Date) {
  const calls: string[] = [];
  const env: HubEnvironment = {
    currentMode: () => {
      calls.push('currentMode');
      return mode;
    },
    switchState: (deviceId) => {
      calls.push(`switchState(${deviceId})`);
      return switchState;
    },
    now: () => {
      calls.push('now');
      return now;
    },
  };
  return { env, calls };
}

function datedVariableSchedule(startTime: string): Schedule {
  return {
    ...createDefaultSchedule('s1'),
    primary: { kind: 'variable', variableName: 'Party', offsetMinutes: 0 },
    startTime,
  };
}

const monday = new Date('2024-06-03T12:00:00Z');

describe('GateEvaluator', () => {
  it('checks nothing else once the instance is paused', () => {
    const { env, calls } = recordingEnvironment('Away', 'off', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig({ paused: true }), createDefaultSchedule('s1'));

    expect(result).toEqual({ proceed: false, reason: 'globalPause', detail: 'All schedules paused' });
    expect(calls).toEqual([]);
  });

  it('runs the gates in order', () => {
    const { env, calls } = recordingEnvironment('Home', 'on', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig(), datedVariableSchedule('2024-06-03T07:00:00.000+0000'));

    expect(result).toEqual({ proceed: true });
    expect(calls).toEqual(['currentMode', 'switchState(sw1)', 'now']);
  });

  it('stops at the mode gate', () => {
    const { env, calls } = recordingEnvironment('Away', 'on', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig(), createDefaultSchedule('s1'));

    expect(result).toEqual({ proceed: false, reason: 'mode', detail: 'Mode of Away is not one of Home, Night' });
    expect(calls).toEqual(['currentMode']);
  });

  it('stops at the activation switch', () => {
    const { env } = recordingEnvironment('Night', 'off', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig(), createDefaultSchedule('s1'));

    expect(result).toEqual({ proceed: false, reason: 'activationSwitch', detail: 'Switch sw1 is not set to on' });
  });

  it('skips a paused schedule before reading the date', () => {
    const { env, calls } = recordingEnvironment('Home', 'on', monday);
    const schedule = { ...datedVariableSchedule('2024-06-04T07:00:00.000+0000'), pause: true };

    const result = new GateEvaluator(env).evaluate(gateConfig(), schedule);

    expect(result).toEqual({ proceed: false, reason: 'schedulePause', detail: 'Schedule is paused' });
    expect(calls).not.toContain('now');
  });

  it('only lets a dated variable run on its date', () => {
    const { env } = recordingEnvironment('Home', 'on', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig(), datedVariableSchedule('2024-06-04T07:00:00.000+0000'));

    expect(result).toEqual({ proceed: false, reason: 'variableDate', detail: 'Scheduled date 2024-06-04 is not today' });
  });

  it('lets a time-only variable run any day', () => {
    const { env } = recordingEnvironment('Home', 'on', monday);

    const result = new GateEvaluator(env).evaluate(gateConfig(), datedVariableSchedule('9999-99-99T07:00:00.000+0000'));

    expect(result).toEqual({ proceed: true });
  });
});
