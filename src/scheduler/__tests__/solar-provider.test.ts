import { describe, expect, it } from 'vitest';
import { SunCalcSolarProvider } from '../solar-provider.js';
import { fakeLog } from './fakes.js';

const day = new Date('2024-06-03T08:00:00Z');

describe('SunCalcSolarProvider', () => {
  it('shifts both events by the offset', () => {
    const provider = new SunCalcSolarProvider({ latitude: 51.5, longitude: -0.1 }, fakeLog());

    const base = provider.sunriseSunset(0, day);
    const shifted = provider.sunriseSunset(30, day);

    expect(base && shifted && shifted.sunset.getTime() - base.sunset.getTime()).toBe(30 * 60 * 1000);
    expect(base && shifted && shifted.sunrise.getTime() - base.sunrise.getTime()).toBe(30 * 60 * 1000);
    expect(base && base.sunrise < base.sunset).toBe(true);
  });

  it('has no times without a location', () => {
    const log = fakeLog();

    expect(new SunCalcSolarProvider(null, log).sunriseSunset(0, day)).toBeNull();
    expect(log.warn).toHaveBeenCalledWith('No location configured, sunrise/sunset times are unavailable');
  });

  it('has no times during polar day', () => {
    const provider = new SunCalcSolarProvider({ latitude: 78.2, longitude: 15.6 }, fakeLog());

    expect(provider.sunriseSunset(0, new Date('2024-06-21T08:00:00Z'))).toBeNull();
  });
});
