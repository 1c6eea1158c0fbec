import { addMinutes, isValid, set } from 'date-fns';
import SunCalc from 'suncalc';
import type { Log } from '../instance-logger.js';
import type { SolarProvider, SunriseSunset } from './types.js';

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

/**
 * Sunrise and sunset for the configured location, computed fresh on every call
 */
export class SunCalcSolarProvider implements SolarProvider {
  constructor(
    private readonly location: GeoLocation | null,
    private readonly log: Log,
  ) {}

  sunriseSunset(offsetMinutes: number, today: Date = new Date()): SunriseSunset | null {
    if (!this.location) {
      this.log.warn('No location configured, sunrise/sunset times are unavailable');
      return null;
    }

    // Noon keeps the calculation on the local calendar day
    const noon = set(today, { hours: 12, minutes: 0, seconds: 0, milliseconds: 0 });
    const times = SunCalc.getTimes(noon, this.location.latitude, this.location.longitude);

    if (!isValid(times.sunrise) || !isValid(times.sunset)) {
      this.log.warn(`No sunrise/sunset on ${noon.toDateString()} at ${this.location.latitude}, ${this.location.longitude}`);
      return null;
    }

    return {
      sunrise: addMinutes(times.sunrise, offsetMinutes),
      sunset: addMinutes(times.sunset, offsetMinutes),
    };
  }
}
