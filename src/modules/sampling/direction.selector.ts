/**
 * =============================================================================
 * DIRECTION SELECTOR
 * =============================================================================
 *
 * Windows (local time, inclusive):
 *   05:30-10:30 -> HOME_TO_WORK
 *   10:40-18:30 -> WORK_TO_HOME
 *   otherwise   -> SKIP (no request is made)
 *
 * A forced direction (DIRECTION=H2W|W2H) wins regardless of the clock.
 * =============================================================================
 */

import { DateTime } from 'luxon';
import {
  Direction,
  DIRECTION_WINDOWS,
  TimeOfDay,
  TravelDirection,
} from '../../core/constants';
import type { PlaceConfig } from '../../config/environment';

export function toSeconds({ hour, minute, second = 0 }: TimeOfDay): number {
  return hour * 3600 + minute * 60 + second;
}

/**
 * Inclusive at both ends; 19:00:45 is outside a window ending at 19:00
 */
export function isWithin(time: TimeOfDay, start: TimeOfDay, end: TimeOfDay): boolean {
  const value = toSeconds(time);
  return value >= toSeconds(start) && value <= toSeconds(end);
}

/**
 * Pure decision from a local wall-clock time
 */
export function selectDirection(localTime: TimeOfDay, forced?: TravelDirection): Direction {
  if (forced) {
    return forced;
  }

  const window = DIRECTION_WINDOWS.find(w => isWithin(localTime, w.start, w.end));
  return window ? window.direction : Direction.SKIP;
}

/**
 * Wall-clock time of `now` in the given IANA zone
 */
export function localTimeOf(now: Date, timezone: string): TimeOfDay {
  const local = DateTime.fromJSDate(now).setZone(timezone);
  return { hour: local.hour, minute: local.minute };
}

export interface Leg {
  origin: PlaceConfig;
  destination: PlaceConfig;
}

/**
 * Origin/destination places for a travel direction
 */
export function describeDirection(
  direction: TravelDirection,
  places: { home: PlaceConfig; work: PlaceConfig }
): Leg {
  return direction === Direction.HOME_TO_WORK
    ? { origin: places.home, destination: places.work }
    : { origin: places.work, destination: places.home };
}
