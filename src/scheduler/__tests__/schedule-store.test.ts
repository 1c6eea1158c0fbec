import { describe, expect, it } from 'vitest';
import { createDefaultSchedule, ScheduleStore } from '../schedule-store.js';
import type { Schedule } from '../types.js';
import { fakeLog } from './fakes.js';

function storeWith(...schedules: Schedule[]) {
  const log = fakeLog();
  const store = new ScheduleStore(log);
  store.selectDevices([{ id: 'D1', label: 'Lamp', seed: schedules }]);
  return { store, log };
}

describe('ScheduleStore', () => {
  it('adds selected devices with a default run and numbers zones by label', () => {
    const log = fakeLog();
    const store = new ScheduleStore(log);

    store.selectDevices([
      { id: '2', label: 'porch' },
      { id: '1', label: 'Attic', capability: 'Dimmer' },
    ]);

    expect(store.get('1')?.zone).toBe(1);
    expect(store.get('2')?.zone).toBe(2);
    expect(store.get('1')?.capability).toBe('Dimmer');
    expect(store.get('2')?.schedules.size).toBe(1);
    expect(log.info).toHaveBeenCalledWith('Added device porch with 1 schedule(s)');
  });

  it('drops deselected devices with their schedules', () => {
    const log = fakeLog();
    const store = new ScheduleStore(log);
    store.selectDevices([
      { id: '1', label: 'Attic' },
      { id: '2', label: 'Porch' },
    ]);

    const removed = store.selectDevices([{ id: '2', label: 'Porch' }]);

    expect(removed).toEqual(['1']);
    expect(store.get('1')).toBeUndefined();
    expect(store.get('2')?.zone).toBe(1);
    expect(log.info).toHaveBeenCalledWith('Removed device 1 and its schedules');
  });

  it('always keeps one run per device', () => {
    const { store } = storeWith(createDefaultSchedule('only'));

    expect(store.removeRun('D1', 'only')).toBe(true);

    const remaining = [...(store.get('D1')?.schedules.keys() ?? [])];
    expect(remaining).toHaveLength(1);
    expect(remaining[0]).not.toBe('only');
  });

  it('applies edits and returns the value as stored', () => {
    const { store } = storeWith(createDefaultSchedule('s1'));
    const target = { deviceId: 'D1', scheduleId: 's1' };

    expect(store.applyEdit({ ...target, field: 'mon', value: false })).toBe('false');
    expect(store.applyEdit({ ...target, field: 'startTime', slot: 'primary', value: '7:05' })).toBe('07:05');
    expect(store.applyEdit({ ...target, field: 'desiredLevel', value: 140.4 })).toBe('100');

    const schedule = store.getSchedule('D1', 's1');
    expect(schedule?.days.mon).toBe(false);
    expect(schedule?.primary).toEqual({ kind: 'fixed', time: '07:05' });
    expect(schedule?.desiredLevel).toBe(100);
  });

  it('rejects edits that do not fit the time source', () => {
    const { store } = storeWith(createDefaultSchedule('s1'));
    const target = { deviceId: 'D1', scheduleId: 's1' };

    expect(() => store.applyEdit({ ...target, field: 'offset', slot: 'primary', value: 10 })).toThrow(
      'The primary time does not take an offset',
    );
    store.applyEdit({ ...target, field: 'timeSource', slot: 'primary', value: 'solar' });
    expect(() => store.applyEdit({ ...target, field: 'offset', slot: 'primary', value: 2000 })).toThrow(
      'Offset must be a whole number of minutes between -1000 and 1000: 2000',
    );
    expect(() => store.applyEdit({ deviceId: 'D1', scheduleId: 'nope', field: 'pause', value: true })).toThrow(
      'Unknown schedule D1|nope',
    );
  });

  it('keeps the offset when switching between solar and variable times', () => {
    const { store } = storeWith(createDefaultSchedule('s1'));
    const target = { deviceId: 'D1', scheduleId: 's1' };

    store.applyEdit({ ...target, field: 'timeSource', slot: 'secondary', value: 'solar' });
    store.applyEdit({ ...target, field: 'offset', slot: 'secondary', value: -30 });
    store.applyEdit({ ...target, field: 'timeSource', slot: 'secondary', value: 'variable' });

    expect(store.getSchedule('D1', 's1')?.secondary).toEqual({ kind: 'variable', variableName: null, offsetMinutes: -30 });
  });

  it('clears the secondary choice when the policy is removed', () => {
    const { store } = storeWith({ ...createDefaultSchedule('s1'), earlierLater: 'later', useSecondary: true });

    store.applyEdit({ deviceId: 'D1', scheduleId: 's1', field: 'earlierLater', value: '-' });

    expect(store.getSchedule('D1', 's1')?.useSecondary).toBe(false);
  });

  it('only accepts capabilities the device supports', () => {
    const { store, log } = storeWith(createDefaultSchedule('s1'));

    expect(store.setCapability('D1', 'Button', ['Switch', 'Dimmer'])).toBe(false);
    expect(store.setCapability('D1', 'Dimmer', ['Switch', 'Dimmer'])).toBe(true);
    expect(store.get('D1')?.capability).toBe('Dimmer');
    expect(log.warn).toHaveBeenCalledWith('Device D1 does not support capability Button');
  });

  it('renames variables in every slot that uses them', () => {
    const variable = { kind: 'variable' as const, variableName: 'Alarm', offsetMinutes: 0 };
    const { store } = storeWith(
      { ...createDefaultSchedule('s1'), primary: variable },
      { ...createDefaultSchedule('s2'), secondary: variable, earlierLater: 'earlier' },
    );

    expect(store.renameVariable('Alarm', 'WakeAlarm')).toBe(2);
    expect(store.variableNames()).toEqual(new Set(['WakeAlarm']));
  });

  it('ignores the secondary variable without a policy', () => {
    const { store } = storeWith({
      ...createDefaultSchedule('s1'),
      secondary: { kind: 'variable', variableName: 'Alarm', offsetMinutes: 0 },
    });

    expect(store.variableNames().size).toBe(0);
  });

  it('sorts runs by time of day with unset times last', () => {
    const { store } = storeWith(
      { ...createDefaultSchedule('unset') },
      { ...createDefaultSchedule('evening'), startTime: '2024-06-03T18:00:00.000+0000' },
      { ...createDefaultSchedule('morning'), startTime: '9999-99-99T06:30:00.000+0000' },
    );

    expect(store.sortedSchedules('D1').map((schedule) => schedule.id)).toEqual(['morning', 'evening', 'unset']);
  });

  it('hands out snapshots that do not touch the live model', () => {
    const { store } = storeWith(createDefaultSchedule('s1'));

    const snapshot = store.snapshot();
    const copy = snapshot.get('D1')?.schedules.get('s1');
    if (copy) {
      copy.startTime = '2024-06-03T18:00:00.000+0000';
    }

    expect(store.getSchedule('D1', 's1')?.startTime).toBeNull();
    store.replaceAll(snapshot);
    expect(store.getSchedule('D1', 's1')?.startTime).toBe('2024-06-03T18:00:00.000+0000');
  });
});
