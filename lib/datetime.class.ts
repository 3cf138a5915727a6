import { Temporal } from '@js-temporal/polyfill';

import { Almanac } from './almanac.config.js';
import { CYCLE, HASH, NANO } from './almanac.enum.js';
import { Calendar } from './calendar.class.js';
import { TimeZone } from './timezone.class.js';
import { CalendarDate } from './date.class.js';
import { advance, elapsed, normalise, shift, type Duration, type Fields } from './carry.library.js';
import { toISO, fromISO, strftime, strptime, type ISO, type Stamp } from './iso.library.js';
import { isDefined } from './shared/type.library.js';

/**
 * A civil timestamp from year down to nanosecond, bound to a Calendar and a TimeZone.
 * Normalisation cascades nanosecond → … → year; second 60 survives only on a leap second.
 */
export class CalendarDateTime {
	readonly year: number;
	readonly month: number;
	readonly day: number;
	readonly hour: number;
	readonly minute: number;
	readonly second: number;
	readonly millisecond: number;
	readonly microsecond: number;
	readonly nanosecond: number;
	readonly tz: TimeZone;
	readonly calendar: Calendar;

	constructor(fields: Partial<Fields> = {}, { tz, calendar }: CalendarDateTime.Options = {}) {
		this.calendar = calendar ?? Calendar.fromName(Almanac.config.calendar);
		this.tz = tz ?? TimeZone.from(Almanac.config.timeZone);

		const norm = normalise(this.calendar, { ...EPOCH, year: this.calendar.limits.minYear, ...fields });
		this.year = norm.year;
		this.month = norm.month;
		this.day = norm.day;
		this.hour = norm.hour;
		this.minute = norm.minute;
		this.second = norm.second;
		this.millisecond = norm.millisecond;
		this.microsecond = norm.microsecond;
		this.nanosecond = norm.nanosecond;

		Object.freeze(this);
	}

	// #region Static constructors ~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** the current instant, as a civil timestamp in the given (or configured) zone */
	static now(options: CalendarDateTime.Options = {}) {
		const utc = Temporal.Now.plainDateTimeISO('UTC');
		const stamp = new CalendarDateTime({
			year: utc.year, month: utc.month, day: utc.day,
			hour: utc.hour, minute: utc.minute, second: utc.second,
			millisecond: utc.millisecond, microsecond: utc.microsecond, nanosecond: utc.nanosecond,
		}, { calendar: options.calendar, tz: UTC_ZONE });

		return stamp.fromUTC(options.tz ?? TimeZone.from(Almanac.config.timeZone));
	}

	/** the start of a CalendarDate */
	static fromDate(date: CalendarDate) {
		return new CalendarDateTime(date.fields, { tz: date.tz, calendar: date.calendar });
	}

	/** rebuild from a packed hash */
	static fromHash(hash: bigint | number, width: HASH = HASH.UINT64, options: CalendarDateTime.Options = {}) {
		const calendar = options.calendar ?? Calendar.fromName(Almanac.config.calendar);
		const { year, month, day, hour, minute, second, millisecond, microsecond } = calendar.fromHash(width, hash);

		return new CalendarDateTime({ year, month, day, hour, minute, second, millisecond, microsecond }, { ...options, calendar });
	}

	/** parse an ISO-8601 string; undefined when malformed */
	static fromISO(text: string, format: ISO = 'dateTime', options: CalendarDateTime.Options = {}) {
		return CalendarDateTime.#fromStamp(fromISO(text, format), options);
	}

	/** parse against a token pattern; undefined when malformed */
	static strptime(text: string, fmt: string, options: CalendarDateTime.Options = {}) {
		return CalendarDateTime.#fromStamp(strptime(text, fmt), options);
	}

	static #fromStamp(stamp: Stamp | undefined, options: CalendarDateTime.Options) {
		if (!stamp)
			return void 0;

		const { dow, ...fields } = stamp;												// weekday is derived, never stored
		return new CalendarDateTime(fields, options);
	}

	// #endregion Static constructors

	// #region Arithmetic ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	add(duration: Duration) {
		return this.#shift(duration, 1);
	}

	subtract(duration: Duration) {
		return this.#shift(duration, -1);
	}

	/** calendar units move the fields; clock units then run the clock, leap seconds included */
	#shift({ years, months, days, ...clock }: Duration, direction: 1 | -1) {
		const date = normalise(this.calendar, shift(this.fields, { years, months, days }, direction));
		const ticks = elapsed(clock) * BigInt(direction);

		return new CalendarDateTime(ticks === 0n ? date : advance(this.calendar, date, ticks), this.#options);
	}

	/**
	 * a new timestamp with some fields replaced.
	 * replacing the calendar keeps the distance (in days) from the epoch; the time-of-day is kept
	 */
	replace({ tz = this.tz, calendar, ...fields }: CalendarDateTime.Replace = {}) {
		const next = { ...this.fields, ...fields };

		if (isDefined(calendar) && !calendar.equals(this.calendar)) {
			const days = this.calendar.daysSinceEpoch(next.year, next.month, next.day);
			const { limits } = calendar;

			return new CalendarDateTime({ ...next, year: limits.minYear, month: limits.minMonth, day: limits.minDay + days }, { tz, calendar });
		}

		return new CalendarDateTime(next, { tz, calendar: this.calendar });
	}

	/**
	 * nanoseconds from the earlier operand's year, for both operands.
	 * when the years are more than one Gregorian cycle apart the later operand's count is reduced
	 * by the whole cycles ({overflowYears}, {overflowNs}), so each count stays within an unsigned 64-bit range.
	 * the true difference is (selfNs - otherNs) + sign × overflowNs
	 */
	deltaNs(other: CalendarDateTime): CalendarDateTime.Delta {
		const that = other.calendar.equals(this.calendar)
			? other
			: other.replace({ calendar: this.calendar });

		const sign = this.compare(that);
		const span = Math.abs(this.year - that.year);
		const overflowYears = span > CYCLE.years
			? Math.floor(span / CYCLE.years) * CYCLE.years
			: 0

		const anchor = Calendar.fromYear(Math.min(this.year, that.year), this.calendar);
		const overflowNs = BigInt(anchor.daysSinceEpoch(anchor.limits.minYear + overflowYears)) * NANO.day;
		const count = ({ fields }: CalendarDateTime, later: boolean) => {
			const { year, month, day, hour, minute, second, millisecond, microsecond, nanosecond } = fields;
			const ns = anchor.nSecondsSinceEpoch(year, month, day, hour, minute, second, millisecond, microsecond, nanosecond);

			return later ? ns - overflowNs : ns;								// leap seconds stay with the real year
		}

		return {
			selfNs: count(this, sign > 0),
			otherNs: count(that, sign < 0),
			overflowYears,
			overflowNs,
			sign,
		}
	}

	/**
	 * the same instant in UTC.
	 * shift by the resolved offset, then correct by the change in cumulative leap seconds
	 */
	toUTC() {
		const minutes = this.tz.minutesAt(this.year, this.month, this.day, this.hour, this.minute, this.second);
		return this.#rezone(-minutes, UTC_ZONE);
	}

	/** treat this timestamp as UTC, and report the same instant in {tz} */
	fromUTC(tz: TimeZone) {
		const guess = tz.minutesAt(this.year, this.month, this.day, this.hour, this.minute, this.second);
		const local = normalise(this.calendar, { ...this.fields, minute: this.minute + guess });
		const minutes = tz.minutesAt(local.year, local.month, local.day, local.hour, local.minute, local.second);

		return this.#rezone(minutes, tz);											// the offset in force at the local time
	}

	#rezone(minutes: number, tz: TimeZone) {
		const moved = normalise(this.calendar, { ...this.fields, minute: this.minute + minutes });
		const leap = this.calendar.leapSecsSinceEpoch(moved.year, moved.month, moved.day)
			- this.calendar.leapSecsSinceEpoch(this.year, this.month, this.day);

		return new CalendarDateTime({ ...moved, second: moved.second + leap }, { calendar: this.calendar, tz });
	}

	// #endregion Arithmetic

	// #region Calendar queries ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** Monday = 0 */
	get dayOfWeek() { return this.calendar.dayOfWeek(this.year, this.month, this.day) }
	get dayOfYear() { return this.calendar.dayOfYear(this.year, this.month, this.day) }
	get isLeapYear() { return this.calendar.isLeapYear(this.year) }
	get isLeapSecond() { return this.calendar.isLeapSecond(this.year, this.month, this.day, this.hour, this.minute, this.second) }

	secondsSinceEpoch() {
		return this.calendar.secondsSinceEpoch(this.year, this.month, this.day, this.hour, this.minute, this.second);
	}

	mSecondsSinceEpoch() {
		return this.calendar.mSecondsSinceEpoch(this.year, this.month, this.day, this.hour, this.minute, this.second, this.millisecond);
	}

	nSecondsSinceEpoch() {
		return this.calendar.nSecondsSinceEpoch(this.year, this.month, this.day, this.hour, this.minute, this.second, this.millisecond, this.microsecond, this.nanosecond);
	}

	// #endregion Calendar queries

	/** -1, 0, 1 by civil timestamp (the other timestamp is re-anchored onto this calendar first) */
	compare(other: CalendarDateTime) {
		const that = other.calendar.equals(this.calendar)
			? other
			: other.replace({ calendar: this.calendar });

		const diff = FIELDS
			.map(field => this[field] - that[field])
			.find(delta => delta !== 0) ?? 0;

		return Math.sign(diff);
	}

	/** same fields, same zone, same calendar */
	equals(other: CalendarDateTime) {
		return FIELDS.every(field => this[field] === other[field])
			&& this.tz.equals(other.tz)
			&& this.calendar.equals(other.calendar);
	}

	hash<W extends HASH>(width: W) {
		return this.calendar.hash(width, this.fields);
	}

	/** the date portion */
	toDate() {
		return new CalendarDate(this.year, this.month, this.day, this.#options);
	}

	toISO(format: ISO = 'dateTime') {
		return toISO(this.fields, format);
	}

	strftime(fmt: string) {
		return strftime({ ...this.fields, dow: this.dayOfWeek }, fmt);
	}

	get fields(): Fields {
		return {
			year: this.year, month: this.month, day: this.day,
			hour: this.hour, minute: this.minute, second: this.second,
			millisecond: this.millisecond, microsecond: this.microsecond, nanosecond: this.nanosecond,
		}
	}

	get #options(): CalendarDateTime.Options {
		return { tz: this.tz, calendar: this.calendar };
	}

	toString() {
		return this.toISO() ?? '';
	}

	toJSON() {
		return { ...this.fields, tz: this.tz.name, calendar: this.calendar.kind };
	}

	get [Symbol.toStringTag]() {
		return 'CalendarDateTime';
	}
}

/** compared most-significant first */
const FIELDS = ['year', 'month', 'day', 'hour', 'minute', 'second', 'millisecond', 'microsecond', 'nanosecond'] as const;
const EPOCH = { month: 1, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0, microsecond: 0, nanosecond: 0 } as const;
const UTC_ZONE = new TimeZone('UTC');

export namespace CalendarDateTime {
	export interface Options {
		/** default: Almanac.config.timeZone */									tz?: TimeZone;
		/** default: Almanac.config.calendar */									calendar?: Calendar;
	}

	export type Replace = Partial<Fields & {
		tz: TimeZone;
		calendar: Calendar;
	}>

	/** the result of deltaNs */
	export interface Delta {
		/** self, in nanoseconds from the anchor year */				selfNs: bigint;
		/** other, in nanoseconds from the anchor year */			otherNs: bigint;
		/** whole years removed from the later operand */			overflowYears: number;
		/** nanoseconds in those years, without leap seconds */	overflowNs: bigint;
		/** sign of (self - other) */														sign: number;
	}
}
