import type { ConcreteTime } from './time-resolver.js';
import { toDate } from './timestamp.js';
import type { EarlierLater, TimeSpec } from './types.js';

export interface TimeSelection {
  effective: TimeSpec;
  isSecondary: boolean;
  primary: ConcreteTime | null;
  secondary: ConcreteTime | null;
  resolved: ConcreteTime | null;
}

/**
 * Pick the governing time of a schedule that may carry a second time.
 * An unresolved side loses to a resolved one; equal instants keep the primary.
 */
export function selectEffectiveTime(
  primary: TimeSpec,
  secondary: TimeSpec | null,
  policy: EarlierLater,
  resolve: (spec: TimeSpec) => ConcreteTime | null,
  today: Date,
): TimeSelection {
  const primaryTime = resolve(primary);

  if (policy === '-' || secondary === null) {
    return { effective: primary, isSecondary: false, primary: primaryTime, secondary: null, resolved: primaryTime };
  }

  const secondaryTime = resolve(secondary);
  const chooseSecondary = (): TimeSelection => ({
    effective: secondary,
    isSecondary: true,
    primary: primaryTime,
    secondary: secondaryTime,
    resolved: secondaryTime,
  });
  const choosePrimary = (): TimeSelection => ({
    effective: primary,
    isSecondary: false,
    primary: primaryTime,
    secondary: secondaryTime,
    resolved: primaryTime,
  });

  if (!primaryTime) {
    return secondaryTime ? chooseSecondary() : choosePrimary();
  }
  if (!secondaryTime) {
    return choosePrimary();
  }

  const primaryInstant = toDate(primaryTime.timestamp, today).getTime();
  const secondaryInstant = toDate(secondaryTime.timestamp, today).getTime();

  if (policy === 'earlier' && secondaryInstant < primaryInstant) {
    return chooseSecondary();
  }
  if (policy === 'later' && secondaryInstant > primaryInstant) {
    return chooseSecondary();
  }
  return choosePrimary();
}
