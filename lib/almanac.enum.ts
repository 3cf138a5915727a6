import { enumify } from './shared/enumerate.library.js';
import type { Enum } from './shared/enumerate.library.js';

/**
 * Various enumerations used throughout the Almanac library.
 * Usage example:
 ```javascript
			const dayNames = WEEKDAY.keys();	// ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']
 ```
 */

/** day-of-week, Monday=0 */
export const WEEKDAY = enumify({ Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6 });
export const WEEKDAYS = enumify({ Monday: 0, Tuesday: 1, Wednesday: 2, Thursday: 3, Friday: 4, Saturday: 5, Sunday: 6 });
export type WEEKDAY = Enum.keys<typeof WEEKDAY>
export type Weekday = Enum.values<typeof WEEKDAY>

export const MONTH = enumify({ Jan: 1, Feb: 2, Mar: 3, Apr: 4, May: 5, Jun: 6, Jul: 7, Aug: 8, Sep: 9, Oct: 10, Nov: 11, Dec: 12 });
export const MONTHS = enumify({ January: 1, February: 2, March: 3, April: 4, May: 5, June: 6, July: 7, August: 8, September: 9, October: 10, November: 11, December: 12 });
export type MONTH = Enum.keys<typeof MONTH>
export type Month = Enum.values<typeof MONTH>

/** bit-widths of the packed hash schemes */
export const HASH = enumify({ UINT8: 8, UINT16: 16, UINT32: 32, UINT64: 64 });
export type HASH = Enum.values<typeof HASH>

/** the named calendars available to the configuration */
export const CALENDAR = enumify({ Gregorian: 'gregorian', UTC: 'utc', FastUTC: 'fast-utc' });
export type CALENDAR = Enum.values<typeof CALENDAR>

export const TIME = enumify({
		/** number of seconds in a minute */										minute: 60,
		/** number of seconds in an hour */											hour: 3_600,
		/** number of seconds in a day */												day: 86_400,
		/** number of seconds in a 365-day year */							year: 31_536_000,
});

/** nanoseconds per unit-of-time */
export const NANO = Object.freeze({
	microsecond: 1_000n,
	millisecond: 1_000_000n,
	second: 1_000_000_000n,
	day: 86_400_000_000_000n,
} as const)

/** the largest value held by an unsigned 64-bit counter */
export const MAX_UINT64 = (1n << 64n) - 1n;

/** leap-second model: a constant correction for every date from {since} onward */
export const LEAPSEC = Object.freeze({ since: 1972, count: 27 } as const)

/** the year-span of one full Gregorian cycle, and the days it holds */
export const CYCLE = Object.freeze({ years: 400, days: 146_097 } as const)
