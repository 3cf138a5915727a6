import { ParameterError } from './almanac.config.js';
import { CALENDAR, LEAPSEC, NANO, TIME, HASH } from './almanac.enum.js';
import { pack, unpack, type HashFields } from './hash.library.js';
import { secure } from './shared/reflection.library.js';
import { assertNever } from './shared/type.library.js';
import type { Secure } from './shared/type.library.js';

// #region Const variables ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** days in each month of a common (non-leap) year */
const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/** cumulative days before each month of a common year */
const MONTH_BEFORE = MONTH_DAYS.reduce<number[]>((acc, days, idx) => {
	acc.push(idx === 0 ? 0 : acc[idx - 1] + MONTH_DAYS[idx - 1]);
	return acc;
}, []);

/** the bounds shared by every calendar */
const Bounds = {
	minMonth: 1, maxMonth: 12,
	minDay: 1,
	minHour: 0, maxHour: 23,
	minMinute: 0, maxMinute: 59,
	minSecond: 0,
	maxMillisecond: 999, maxMicrosecond: 999, maxNanosecond: 999,
} as const

const FAST_DAYS = 30;																				// every full month of a fast-utc year
const FAST_MONTHS = 12;																			// full months, followed by a five-day month 13
const FAST_YEAR = 365;																			// every fast-utc year

// #endregion Const variables

/**
 * A calendar is a closed tagged union of rule-sets ('gregorian' | 'fast-utc') plus the limits of each field.
 * Every calendar measures its epoch from 1-Jan of its {minYear}.
 * A fast-utc year is twelve 30-day months then a 5-day month 13, so its {limits.maxMonth} is 13.
 *
 * Calendar values are immutable; use the static factories to derive a calendar with other limits.
 */
export class Calendar {
	readonly kind: Calendar.Kind;
	readonly limits: Secure<Calendar.Limits>;

	constructor(kind: Calendar.Kind, limits: Partial<Calendar.Limits> = {}) {
		this.kind = kind;
		this.limits = Calendar.#validate({ ...Calendar.#defaults(kind), ...limits });

		Object.freeze(this);
	}

	/** the default limits for a rule-set */
	static #defaults(kind: Calendar.Kind): Calendar.Limits {
		switch (kind) {
			case 'gregorian':
				return { ...Bounds, minYear: 1, maxYear: 9_999, maxDay: 31, maxSecond: 60 }

			case 'fast-utc':
				return { ...Bounds, minYear: 1970, maxYear: 65_535, maxMonth: 13, maxDay: FAST_DAYS, maxSecond: 59 }

			default:
				return assertNever(kind);
		}
	}

	/** every lower limit must not exceed its upper limit */
	static #validate(limits: Calendar.Limits) {
		const pairs = [
			['Year', limits.minYear, limits.maxYear],
			['Month', limits.minMonth, limits.maxMonth],
			['Day', limits.minDay, limits.maxDay],
			['Hour', limits.minHour, limits.maxHour],
			['Minute', limits.minMinute, limits.maxMinute],
			['Second', limits.minSecond, limits.maxSecond],
		] as const

		pairs.forEach(([unit, min, max]) => {
			if (!Number.isInteger(min) || !Number.isInteger(max) || min > max)
				throw new ParameterError('Calendar', `min${unit} (${min}) must not exceed max${unit} (${max})`);
		})

		return secure(limits);
	}

	// #region Static factories ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** proleptic Gregorian rules */
	static gregorian(limits: Partial<Calendar.Limits> = {}) {
		return new Calendar('gregorian', limits);
	}

	/** 365-day years: twelve 30-day months then a 5-day month 13, no leap handling */
	static fastUTC(limits: Partial<Calendar.Limits> = {}) {
		return new Calendar('fast-utc', limits);
	}

	/** a synthetic calendar sharing {base} rules, anchored at 1-Jan of {year} */
	static fromYear(year: number, base: Calendar = GREGORIAN) {
		return new Calendar(base.kind, {
			...base.limits,
			minYear: year,
			maxYear: Math.max(year, base.limits.maxYear),
		});
	}

	/** the predefined calendar for a configuration tag */
	static fromName(name: CALENDAR) {
		switch (name) {
			case CALENDAR.Gregorian:
				return GREGORIAN;
			case CALENDAR.UTC:
				return UTC;
			case CALENDAR.FastUTC:
				return FAST_UTC;

			default:
				return assertNever(name);
		}
	}

	// #endregion Static factories

	// #region Rules ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	isLeapYear(year: number) {
		switch (this.kind) {
			case 'gregorian':
				return isGregorianLeap(year);

			case 'fast-utc':
				return false;

			default:
				return assertNever(this.kind);
		}
	}

	/** second 60 at 23:59 on 30-Jun or 31-Dec, from 1972 onward */
	isLeapSecond(year: number, month: number, day: number, hour: number, minute: number, second: number) {
		switch (this.kind) {
			case 'gregorian':
				return second === 60
					&& hour === 23
					&& minute === 59
					&& year >= LEAPSEC.since
					&& ((month === 6 && day === 30) || (month === 12 && day === 31))

			case 'fast-utc':
				return false;

			default:
				return assertNever(this.kind);
		}
	}

	/** Monday = 0 */
	dayOfWeek(year: number, month: number, day: number) {
		switch (this.kind) {
			case 'gregorian':
				return gregorianDayOfWeek(year, this.dayOfYear(year, month, day));

			case 'fast-utc':
				const epoch = gregorianDayOfWeek(this.limits.minYear, 1);
				return mod(epoch + this.daysSinceEpoch(year, month, day), 7);

			default:
				return assertNever(this.kind);
		}
	}

	/** one-based ordinal day within the year */
	dayOfYear(year: number, month: number, day: number) {
		switch (this.kind) {
			case 'gregorian':
				const leap = month > 2 && isGregorianLeap(year) ? 1 : 0;
				return MONTH_BEFORE[month - 1] + day + leap;

			case 'fast-utc':
				return (month - 1) * FAST_DAYS + day;

			default:
				return assertNever(this.kind);
		}
	}

	maxDaysInMonth(year: number, month: number) {
		switch (this.kind) {
			case 'gregorian':
				const days = month === 2 && isGregorianLeap(year)
					? 29
					: MONTH_DAYS[month - 1] ?? this.limits.maxDay;
				return Math.min(days, this.limits.maxDay);

			case 'fast-utc':
				return month === FAST_MONTHS + 1
					? FAST_YEAR - FAST_MONTHS * FAST_DAYS									// the trailing short month
					: this.limits.maxDay

			default:
				return assertNever(this.kind);
		}
	}

	/** the last valid second of a minute (60 only on a leap second) */
	maxSecond(year: number, month: number, day: number, hour: number, minute: number) {
		return this.isLeapSecond(year, month, day, hour, minute, 60) && this.limits.maxSecond >= 60
			? 60
			: Math.min(59, this.limits.maxSecond)
	}

	/** [day-of-week of the first day, number of days] for a month */
	monthRange(year: number, month: number): [dow: number, dom: number] {
		return [this.dayOfWeek(year, month, 1), this.maxDaysInMonth(year, month)];
	}

	// #endregion Rules

	// #region Epoch counters ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** leap seconds inserted between the epoch and a date (a constant from 1972) */
	leapSecsSinceEpoch(year: number, _month = 1, _day = 1) {
		switch (this.kind) {
			case 'gregorian':
				return leapSecs(year) - leapSecs(this.limits.minYear);

			case 'fast-utc':
				return 0;

			default:
				return assertNever(this.kind);
		}
	}

	/** leap days inserted between the epoch and a date */
	leapDaysSinceEpoch(year: number, month = 1, _day = 1) {
		switch (this.kind) {
			case 'gregorian':
				const prior = leapsBefore(year) - leapsBefore(this.limits.minYear);
				return prior + (month > 2 && isGregorianLeap(year) ? 1 : 0);

			case 'fast-utc':
				return 0;

			default:
				return assertNever(this.kind);
		}
	}

	daysSinceEpoch(year: number, month = 1, day = 1) {
		switch (this.kind) {
			case 'gregorian':
				return (year - this.limits.minYear) * FAST_YEAR
					+ MONTH_BEFORE[month - 1]
					+ (day - 1)
					+ this.leapDaysSinceEpoch(year, month, day);

			case 'fast-utc':
				return (year - this.limits.minYear) * FAST_YEAR
					+ (month - 1) * FAST_DAYS
					+ (day - 1);

			default:
				return assertNever(this.kind);
		}
	}

	/** 365-day baselines, plus one leap-day and one leap-second correction */
	secondsSinceEpoch(year: number, month = 1, day = 1, hour = 0, minute = 0, second = 0) {
		return this.daysSinceEpoch(year, month, day) * TIME.day
			+ hour * TIME.hour
			+ minute * TIME.minute
			+ second
			+ this.leapSecsSinceEpoch(year, month, day);
	}

	mSecondsSinceEpoch(year: number, month = 1, day = 1, hour = 0, minute = 0, second = 0, millisecond = 0) {
		return this.secondsSinceEpoch(year, month, day, hour, minute, second) * 1_000 + millisecond;
	}

	nSecondsSinceEpoch(year: number, month = 1, day = 1, hour = 0, minute = 0, second = 0, millisecond = 0, microsecond = 0, nanosecond = 0) {
		return BigInt(this.secondsSinceEpoch(year, month, day, hour, minute, second)) * NANO.second
			+ BigInt(millisecond) * NANO.millisecond
			+ BigInt(microsecond) * NANO.microsecond
			+ BigInt(nanosecond);
	}

	// #endregion Epoch counters

	/** pack a field tuple into a hash of {width} bits */
	hash<W extends HASH>(width: W, fields: Partial<HashFields>) {
		return pack(width, fields);
	}

	/** unpack a hash of {width} bits into a field tuple */
	fromHash(width: HASH, hash: bigint | number) {
		return unpack(width, hash);
	}

	/** same rules and same limits */
	equals(other: Calendar) {
		return this.kind === other.kind
			&& Object.entries(this.limits)
				.every(([key, val]) => Reflect.get(other.limits, key) === val);
	}

	toString() {
		return `${this.kind}[${this.limits.minYear}..${this.limits.maxYear}]`;
	}

	get [Symbol.toStringTag]() {
		return 'Calendar';
	}
}

// #region Calendar helpers ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

function isGregorianLeap(year: number) {
	return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/** leap years in [1, year) */
function leapsBefore(year: number) {
	const y = year - 1;
	return Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400);
}

function leapSecs(year: number) {
	return year >= LEAPSEC.since ? LEAPSEC.count : 0;
}

function gregorianDayOfWeek(year: number, dayOfYear: number) {
	const y = year - 1;
	const daysBeforeYear = y * FAST_YEAR + leapsBefore(year);

	return mod(daysBeforeYear + dayOfYear + 6, 7);
}

/** modulo, always non-negative */
function mod(num: number, div: number) {
	return ((num % div) + div) % div;
}

// #endregion Calendar helpers

// #region Predefined calendars ~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** proleptic Gregorian, years 1..9999 */
export const GREGORIAN = Calendar.gregorian();
/** Gregorian, with the Unix epoch */
export const UTC = Calendar.gregorian({ minYear: 1970 });
/** the simplified calendar behind the fixed-width date-times */
export const FAST_UTC = Calendar.fastUTC();

// #endregion Predefined calendars

export namespace Calendar {
	/** the rule-sets */
	export type Kind = 'gregorian' | 'fast-utc'

	export interface Limits {
		minYear: number; maxYear: number;
		minMonth: number; maxMonth: number;
		minDay: number; maxDay: number;
		minHour: number; maxHour: number;
		minMinute: number; maxMinute: number;
		minSecond: number; maxSecond: number;
		maxMillisecond: number;
		maxMicrosecond: number;
		maxNanosecond: number;
	}
}
