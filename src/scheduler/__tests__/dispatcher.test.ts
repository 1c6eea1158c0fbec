import { describe, expect, it } from 'vitest';
import { Dispatcher } from '../dispatcher.js';
import { createDefaultSchedule } from '../schedule-store.js';
import type { Capability, DeviceConfig, Schedule } from '../types.js';
import { FakeDevice, fakeLog } from './fakes.js';

function device(id: string, capability: Capability): DeviceConfig {
  return { id, zone: 1, capability, schedules: new Map() };
}

function schedule(overrides: Partial<Schedule> = {}): Schedule {
  return { ...createDefaultSchedule('s1'), ...overrides };
}

describe('Dispatcher', () => {
  it('turns a dimmer on before setting its level when asked to', async () => {
    const lamp = new FakeDevice('D2', 'Lamp');

    const result = await new Dispatcher(fakeLog()).execute(
      device('D2', 'Dimmer'),
      lamp,
      schedule({ desiredLevel: 40 }),
      { activateOnBeforeLevel: true },
    );

    expect(result).toBe('executed');
    expect(lamp.calls).toEqual(['on()', 'setLevel(40)']);
  });

  it('only sets the level otherwise', async () => {
    const lamp = new FakeDevice('D2', 'Lamp');

    await new Dispatcher(fakeLog()).execute(device('D2', 'Dimmer'), lamp, schedule({ desiredLevel: 40 }), {
      activateOnBeforeLevel: false,
    });

    expect(lamp.calls).toEqual(['setLevel(40)']);
  });

  it('switches on and off', async () => {
    const dispatcher = new Dispatcher(fakeLog());
    const fan = new FakeDevice('D1', 'Fan');

    await dispatcher.execute(device('D1', 'Switch'), fan, schedule(), { activateOnBeforeLevel: false });
    await dispatcher.execute(device('D1', 'Dimmer'), fan, schedule({ desiredState: 'off' }), { activateOnBeforeLevel: true });

    expect(fan.calls).toEqual(['on()', 'off()']);
  });

  it('presses the configured button', async () => {
    const remote = new FakeDevice('B1', 'Remote', ['Button'], ['push', 'hold']);

    const result = await new Dispatcher(fakeLog()).execute(
      device('B1', 'Button'),
      remote,
      schedule({ buttonAction: 'push', buttonNumber: 2 }),
      { activateOnBeforeLevel: false },
    );

    expect(result).toBe('executed');
    expect(remote.calls).toEqual(['push(2)']);
  });

  it('does nothing for an incomplete or unsupported button run', async () => {
    const log = fakeLog();
    const dispatcher = new Dispatcher(log);
    const remote = new FakeDevice('B1', 'Remote', ['Button'], ['push']);

    const unset = await dispatcher.execute(device('B1', 'Button'), remote, schedule({ buttonAction: 'push' }), {
      activateOnBeforeLevel: false,
    });
    const unsupported = await dispatcher.execute(
      device('B1', 'Button'),
      remote,
      schedule({ buttonAction: 'hold', buttonNumber: 1 }),
      { activateOnBeforeLevel: false },
    );

    expect([unset, unsupported]).toEqual(['skipped', 'skipped']);
    expect(remote.calls).toEqual([]);
    expect(log.error).toHaveBeenNthCalledWith(1, 'Button action or number not set for Remote (schedule s1)');
    expect(log.error).toHaveBeenNthCalledWith(2, 'Remote does not support button action hold');
  });

  it('passes device failures to the caller', async () => {
    const fan = new FakeDevice('D1', 'Fan');
    fan.failure = new Error('offline');

    await expect(
      new Dispatcher(fakeLog()).execute(device('D1', 'Switch'), fan, schedule(), { activateOnBeforeLevel: false }),
    ).rejects.toThrow('offline');
  });
});
