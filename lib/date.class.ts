import { Temporal } from '@js-temporal/polyfill';

import { Almanac } from './almanac.config.js';
import { HASH } from './almanac.enum.js';
import { Calendar } from './calendar.class.js';
import { TimeZone } from './timezone.class.js';
import { normalise, shift, type Duration as Span, type Fields } from './carry.library.js';
import { toISO, fromISO, strftime, strptime, type ISO } from './iso.library.js';
import { isDefined } from './shared/type.library.js';

/**
 * A civil date (year, month, day) bound to a Calendar and a TimeZone.
 * Every constructor and every operation normalises: out-of-range fields are carried, never raised.
 */
export class CalendarDate {
	readonly year: number;
	readonly month: number;
	readonly day: number;
	readonly tz: TimeZone;
	readonly calendar: Calendar;

	constructor(year: number, month = 1, day = 1, { tz, calendar }: CalendarDate.Options = {}) {
		this.calendar = calendar ?? Calendar.fromName(Almanac.config.calendar);
		this.tz = tz ?? TimeZone.from(Almanac.config.timeZone);

		const fields = normalise(this.calendar, { ...DAY, year, month, day });
		this.year = fields.year;
		this.month = fields.month;
		this.day = fields.day;

		Object.freeze(this);
	}

	// #region Static constructors ~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** today, in the given (or configured) zone */
	static now(options: CalendarDate.Options = {}) {
		const tz = options.tz ?? TimeZone.from(Almanac.config.timeZone);
		const utc = Temporal.Now.plainDateTimeISO('UTC');
		const minutes = tz.minutesAt(utc.year, utc.month, utc.day, utc.hour, utc.minute, utc.second);
		const local = normalise(options.calendar ?? Calendar.fromName(Almanac.config.calendar), {
			...DAY, year: utc.year, month: utc.month, day: utc.day, hour: utc.hour, minute: utc.minute + minutes,
		});

		return new CalendarDate(local.year, local.month, local.day, { ...options, tz });
	}

	/** rebuild from a packed hash */
	static fromHash(hash: bigint | number, width: HASH = HASH.UINT32, options: CalendarDate.Options = {}) {
		const calendar = options.calendar ?? Calendar.fromName(Almanac.config.calendar);
		const { year, month, day } = calendar.fromHash(width, hash);

		return new CalendarDate(year, month, day, { ...options, calendar });
	}

	/** parse YYYY-MM-DD; undefined when malformed */
	static fromISO(text: string, options: CalendarDate.Options = {}) {
		return CalendarDate.#fromStamp(fromISO(text, 'date'), options);
	}

	/** parse against a token pattern; undefined when malformed */
	static strptime(text: string, fmt: string, options: CalendarDate.Options = {}) {
		return CalendarDate.#fromStamp(strptime(text, fmt), options);
	}

	static #fromStamp(stamp: Partial<Fields> | undefined, options: CalendarDate.Options) {
		return stamp && isDefined(stamp.year)
			? new CalendarDate(stamp.year, stamp.month, stamp.day, options)
			: void 0
	}

	// #endregion Static constructors

	// #region Arithmetic ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	add(duration: CalendarDate.Duration) {
		return this.#shift(duration, 1);
	}

	subtract(duration: CalendarDate.Duration) {
		return this.#shift(duration, -1);
	}

	#shift({ years, months, days, seconds }: CalendarDate.Duration, direction: 1 | -1) {
		const fields = normalise(this.calendar, shift({ ...DAY, ...this.fields }, { years, months, days, seconds }, direction));
		return new CalendarDate(fields.year, fields.month, fields.day, this.#options);
	}

	/**
	 * a new date with some fields replaced.
	 * a day the new year lacks (29-Feb) carries into the next month, as in the constructor.
	 * replacing the calendar keeps the distance (in days) from the epoch, so the fields change
	 */
	replace({ year = this.year, month = this.month, day = this.day, tz = this.tz, calendar }: CalendarDate.Replace = {}) {
		if (isDefined(calendar) && !calendar.equals(this.calendar)) {
			const days = this.calendar.daysSinceEpoch(year, month, day);
			const { limits } = calendar;
			const fields = normalise(calendar, { ...DAY, year: limits.minYear, month: limits.minMonth, day: limits.minDay + days });

			return new CalendarDate(fields.year, fields.month, fields.day, { tz, calendar });
		}

		return new CalendarDate(year, month, day, { tz, calendar: this.calendar });
	}

	// #endregion Arithmetic

	// #region Calendar queries ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** Monday = 0 */
	get dayOfWeek() { return this.calendar.dayOfWeek(this.year, this.month, this.day) }
	get dayOfYear() { return this.calendar.dayOfYear(this.year, this.month, this.day) }
	get isLeapYear() { return this.calendar.isLeapYear(this.year) }
	get daysInMonth() { return this.calendar.maxDaysInMonth(this.year, this.month) }

	leapDaysSinceEpoch() { return this.calendar.leapDaysSinceEpoch(this.year, this.month, this.day) }
	leapSecsSinceEpoch() { return this.calendar.leapSecsSinceEpoch(this.year, this.month, this.day) }
	daysSinceEpoch() { return this.calendar.daysSinceEpoch(this.year, this.month, this.day) }
	secondsSinceEpoch() { return this.calendar.secondsSinceEpoch(this.year, this.month, this.day) }

	// #endregion Calendar queries

	/** the UTC date at local midnight */
	toUTC() {
		const minutes = this.tz.minutesAt(this.year, this.month, this.day);
		const fields = normalise(this.calendar, { ...DAY, ...this.fields, minute: -minutes });

		return new CalendarDate(fields.year, fields.month, fields.day, { calendar: this.calendar, tz: UTC_ZONE });
	}

	/** treat this date as UTC midnight, and report the local date in {tz} */
	fromUTC(tz: TimeZone) {
		const minutes = tz.minutesAt(this.year, this.month, this.day);
		const fields = normalise(this.calendar, { ...DAY, ...this.fields, minute: minutes });

		return new CalendarDate(fields.year, fields.month, fields.day, { calendar: this.calendar, tz });
	}

	/** -1, 0, 1 by civil date (the other date is re-anchored onto this calendar first) */
	compare(other: CalendarDate) {
		const that = other.calendar.equals(this.calendar)
			? other
			: other.replace({ calendar: this.calendar });

		return Math.sign((this.year - that.year) || (this.month - that.month) || (this.day - that.day));
	}

	/** same fields, same zone, same calendar */
	equals(other: CalendarDate) {
		return this.year === other.year
			&& this.month === other.month
			&& this.day === other.day
			&& this.tz.equals(other.tz)
			&& this.calendar.equals(other.calendar);
	}

	hash<W extends HASH>(width: W) {
		return this.calendar.hash(width, this.fields);
	}

	toISO(format: Extract<ISO, 'date' | 'compact'> = 'date') {
		return format === 'compact'
			? strftime(this.fields, 'yyyymmdd')
			: toISO(this.fields, format)
	}

	strftime(fmt: string) {
		return strftime({ ...this.fields, dow: this.dayOfWeek }, fmt);
	}

	get fields() {
		return { year: this.year, month: this.month, day: this.day };
	}

	get #options(): CalendarDate.Options {
		return { tz: this.tz, calendar: this.calendar };
	}

	toString() {
		return this.toISO() ?? '';
	}

	toJSON() {
		return { ...this.fields, tz: this.tz.name, calendar: this.calendar.kind };
	}

	get [Symbol.toStringTag]() {
		return 'CalendarDate';
	}
}

/** time-of-day fields at midnight */
const DAY = { hour: 0, minute: 0, second: 0, millisecond: 0, microsecond: 0, nanosecond: 0 } as const;
const UTC_ZONE = new TimeZone('UTC');

export namespace CalendarDate {
	export interface Options {
		/** default: Almanac.config.timeZone */									tz?: TimeZone;
		/** default: Almanac.config.calendar */									calendar?: Calendar;
	}

	export type Duration = Pick<Span, 'years' | 'months' | 'days' | 'seconds'>

	export type Replace = Partial<{
		year: number;
		month: number;
		day: number;
		tz: TimeZone;
		calendar: Calendar;
	}>
}
