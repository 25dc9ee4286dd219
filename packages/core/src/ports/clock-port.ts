/**
 * Clock Port
 *
 * Source of "now" for provenance timestamps. Engines take a clock instead of
 * reading the system time so that tests can pin it.
 */

import { DateTime } from 'luxon';

export interface ClockPort {
  now(): DateTime;
}

/**
 * Create a system clock that reads the current UTC time
 */
export function createSystemClock(): ClockPort {
  return { now: () => DateTime.utc() };
}

/**
 * Create a clock frozen at the given ISO timestamp
 *
 * @throws Error if the timestamp cannot be parsed
 */
export function createFixedClock(isoTimestamp: string): ClockPort {
  const fixed = DateTime.fromISO(isoTimestamp, { zone: 'utc' });
  if (!fixed.isValid) {
    throw new Error(`Invalid clock timestamp '${isoTimestamp}': ${fixed.invalidExplanation ?? 'unparseable'}`);
  }
  return { now: () => fixed };
}
