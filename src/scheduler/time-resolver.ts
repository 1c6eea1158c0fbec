import { set } from 'date-fns';
import type { Log } from '../instance-logger.js';
import {
  addMinutesToTimestamp,
  formatTimestamp,
  fromDate,
  parseTimeOfDay,
  parseTimestamp,
  type HubTimestamp,
} from './timestamp.js';
import type { SolarProvider, TimeSpec, VariableStore } from './types.js';

/**
 * A resolved time: the hub text form plus its parsed components
 */
export interface ConcreteTime {
  value: string;
  timestamp: HubTimestamp;
}

export interface ResolveContext {
  today: Date;
  solar: SolarProvider;
  variables: VariableStore;
  log: Log;
}

/**
 * Turn a declarative time specification into a concrete timestamp.
 * Returns null (unresolved) when the inputs are missing or unreadable.
 */
export function resolveTime(spec: TimeSpec, context: ResolveContext): ConcreteTime | null {
  switch (spec.kind) {
    case 'fixed':
      return resolveFixed(spec.time, context);
    case 'solar':
      return resolveSolar(spec.event, spec.offsetMinutes, context);
    case 'variable':
      return resolveVariable(spec.variableName, spec.offsetMinutes, context);
  }
}

function resolveFixed(time: string | null, { today, log }: ResolveContext): ConcreteTime | null {
  if (time === null) {
    log.warn('Start time has not been selected');
    return null;
  }

  const clock = parseTimeOfDay(time);
  if (!clock) {
    log.error(`Failed to parse start time: ${time}`);
    return null;
  }

  const timestamp = fromDate(set(today, { hours: clock.hour, minutes: clock.minute, seconds: 0, milliseconds: 0 }));
  return { value: formatTimestamp(timestamp), timestamp };
}

function resolveSolar(
  event: 'sunrise' | 'sunset',
  offsetMinutes: number,
  { today, solar, log }: ResolveContext,
): ConcreteTime | null {
  const times = solar.sunriseSunset(offsetMinutes, today);
  if (!times) {
    log.warn(`No ${event} time available for today`);
    return null;
  }

  const timestamp = fromDate(event === 'sunset' ? times.sunset : times.sunrise);
  return { value: formatTimestamp(timestamp), timestamp };
}

function resolveVariable(
  variableName: string | null,
  offsetMinutes: number,
  { variables, log }: ResolveContext,
): ConcreteTime | null {
  if (variableName === null) {
    log.warn('Hub variable has not been selected');
    return null;
  }

  const variable = variables.get(variableName);
  if (!variable) {
    log.warn(`Hub variable ${variableName} not found`);
    return null;
  }

  const timestamp = parseTimestamp(variable.value);
  if (!timestamp) {
    log.error(`Failed to parse date: ${variable.value} (hub variable ${variableName})`);
    return null;
  }

  if (offsetMinutes === 0) {
    return { value: variable.value, timestamp };
  }

  const shifted = addMinutesToTimestamp(timestamp, offsetMinutes);
  return { value: formatTimestamp(shifted), timestamp: shifted };
}
