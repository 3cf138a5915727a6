import { NANO, TIME } from './almanac.enum.js';
import type { Calendar } from './calendar.class.js';

/**
 * Reduce-and-carry normalisation of a (possibly overflowed) field tuple against a calendar's limits.
 * Each unit is reduced into its range and the excess carried into the next larger unit,
 * so a nanosecond overflow may roll the year.
 * The year wraps within [minYear, maxYear].
 */

/** every field of a civil timestamp */
export interface Fields {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	millisecond: number;
	microsecond: number;
	nanosecond: number;
}

/** amounts to add (or subtract) */
export type Duration = Partial<{
	years: number;
	months: number;
	days: number;
	hours: number;
	minutes: number;
	seconds: number;
	milliseconds: number;
	microseconds: number;
	nanoseconds: number;
}>

/** split {value} into a remainder within [0, base) and the carry */
function divmod(value: number, base: number): [carry: number, rest: number] {
	const rest = ((value % base) + base) % base;
	return [(value - rest) / base, rest];
}

/** apply {duration} with the given direction (1 = add, -1 = subtract) */
export function shift(fields: Fields, duration: Duration, direction: 1 | -1 = 1): Fields {
	const by = (amount = 0) => Math.trunc(amount) * direction;

	return {
		year: fields.year + by(duration.years),
		month: fields.month + by(duration.months),
		day: fields.day + by(duration.days),
		hour: fields.hour + by(duration.hours),
		minute: fields.minute + by(duration.minutes),
		second: fields.second + by(duration.seconds),
		millisecond: fields.millisecond + by(duration.milliseconds),
		microsecond: fields.microsecond + by(duration.microseconds),
		nanosecond: fields.nanosecond + by(duration.nanoseconds),
	}
}

/** the clock units of a duration, in nanoseconds */
export function elapsed({ hours = 0, minutes = 0, seconds = 0, milliseconds = 0, microseconds = 0, nanoseconds = 0 }: Duration) {
	return BigInt(Math.trunc(hours) * TIME.hour + Math.trunc(minutes) * TIME.minute + Math.trunc(seconds)) * NANO.second
		+ BigInt(Math.trunc(milliseconds)) * NANO.millisecond
		+ BigInt(Math.trunc(microseconds)) * NANO.microsecond
		+ BigInt(Math.trunc(nanoseconds));
}

/**
 * move normalised {fields} by {ns} elapsed nanoseconds (negative to go back).
 * a leap second is one tick of the clock: counting forward from 23:59:59 passes 23:59:60 before 00:00:00
 */
export function advance(calendar: Calendar, fields: Fields, ns: bigint): Fields {
	const { minDay, minMonth, maxMonth } = calendar.limits;
	let { year, month } = fields;
	let total = BigInt(fields.day - minDay) * NANO.day + clockNs(fields) + ns;	// from the start of the month

	while (total >= monthNs(calendar, year, month)) {
		total -= monthNs(calendar, year, month);
		[year, month] = month === maxMonth
			? [wrapYear(calendar, year + 1), minMonth]
			: [year, month + 1]
	}
	while (total < 0n) {
		[year, month] = month === minMonth
			? [wrapYear(calendar, year - 1), maxMonth]
			: [year, month - 1]
		total += monthNs(calendar, year, month);
	}

	const last = calendar.maxDaysInMonth(year, month);
	const secs = total / NANO.second;
	const sub = total % NANO.second;
	const leap = secs >= BigInt(last * TIME.day);										// inside 23:59:60 of the last day
	const clock = leap ? TIME.day - 1 : Number(secs % BigInt(TIME.day));

	return {
		year,
		month,
		day: leap ? last : Number(secs / BigInt(TIME.day)) + minDay,
		hour: Math.floor(clock / TIME.hour),
		minute: Math.floor((clock % TIME.hour) / TIME.minute),
		second: leap ? 60 : clock % TIME.minute,
		millisecond: Number(sub / NANO.millisecond),
		microsecond: Number((sub % NANO.millisecond) / NANO.microsecond),
		nanosecond: Number(sub % NANO.microsecond),
	}
}

/** nanoseconds since midnight */
function clockNs({ hour, minute, second, millisecond, microsecond, nanosecond }: Fields) {
	return BigInt(hour * TIME.hour + minute * TIME.minute + second) * NANO.second
		+ BigInt(millisecond) * NANO.millisecond
		+ BigInt(microsecond) * NANO.microsecond
		+ BigInt(nanosecond);
}

/** nanoseconds in a month, with its leap second (if any) */
function monthNs(calendar: Calendar, year: number, month: number) {
	const last = calendar.maxDaysInMonth(year, month);
	const leap = calendar.maxSecond(year, month, last, 23, 59) === 60 ? NANO.second : 0n;

	return BigInt(last) * NANO.day + leap;
}

/** bring every field within the calendar's limits */
export function normalise(calendar: Calendar, raw: Fields, allowLeap = true): Fields {
	const { limits } = calendar;
	const out = { ...raw };
	let carry: number;

	// sub-second units
	[carry, out.nanosecond] = divmod(Math.trunc(out.nanosecond), limits.maxNanosecond + 1);
	[carry, out.microsecond] = divmod(Math.trunc(out.microsecond) + carry, limits.maxMicrosecond + 1);
	[carry, out.millisecond] = divmod(Math.trunc(out.millisecond) + carry, limits.maxMillisecond + 1);

	out.second = Math.trunc(out.second) + carry;
	const leap = allowLeap && out.second === 60;								// candidate leap second, decided once the date is settled
	if (leap)
		out.second = 59;

	[carry, out.second] = divmod(out.second - limits.minSecond, 60);
	out.second += limits.minSecond;
	[carry, out.minute] = divmod(Math.trunc(out.minute) - limits.minMinute + carry, limits.maxMinute - limits.minMinute + 1);
	out.minute += limits.minMinute;
	[carry, out.hour] = divmod(Math.trunc(out.hour) - limits.minHour + carry, limits.maxHour - limits.minHour + 1);
	out.hour += limits.minHour;
	out.day = Math.trunc(out.day) + carry;

	settleDate(calendar, out);

	if (leap) {
		if (!calendar.isLeapSecond(out.year, out.month, out.day, out.hour, out.minute, 60))
			return normalise(calendar, { ...out, second: 60 }, false);	// not a leap second: carry into the minute
		out.second = 60;
	}

	return out;
}

/** settle year, month and day in place */
function settleDate(calendar: Calendar, out: Fields) {
	const { minMonth, maxMonth } = calendar.limits;
	const months = maxMonth - minMonth + 1;
	let carry: number;

	out.year = Math.trunc(out.year);
	[carry, out.month] = divmod(Math.trunc(out.month) - minMonth, months);
	out.month += minMonth;
	out.year = wrapYear(calendar, out.year + carry);

	const next = () => {
		out.month === maxMonth
			? (out.month = minMonth, out.year = wrapYear(calendar, out.year + 1))
			: out.month += 1
	}
	const prev = () => {
		out.month === minMonth
			? (out.month = maxMonth, out.year = wrapYear(calendar, out.year - 1))
			: out.month -= 1
	}

	const { minYear, maxYear } = calendar.limits;
	while (out.year < maxYear && out.day > yearLength(calendar, out.year, out.month)) {
		out.day -= yearLength(calendar, out.year, out.month);		// skip whole years first
		out.year += 1;
	}
	while (out.year > minYear && out.day <= -yearLength(calendar, out.year - 1, out.month)) {
		out.day += yearLength(calendar, out.year - 1, out.month);
		out.year -= 1;
	}

	while (out.day > calendar.maxDaysInMonth(out.year, out.month)) {
		out.day -= calendar.maxDaysInMonth(out.year, out.month);
		next();
	}
	while (out.day < calendar.limits.minDay) {
		prev();
		out.day += calendar.maxDaysInMonth(out.year, out.month);
	}
}

/** days from the first of {month} in {year} to the first of {month} a year later */
function yearLength(calendar: Calendar, year: number, month: number) {
	const { minMonth, maxMonth } = calendar.limits;
	let days = 0;

	for (let mo = month; mo <= maxMonth; mo++)
		days += calendar.maxDaysInMonth(year, mo);
	for (let mo = minMonth; mo < month; mo++)
		days += calendar.maxDaysInMonth(year + 1, mo);

	return days;
}

/** wrap a year into [minYear, maxYear] */
export function wrapYear(calendar: Calendar, year: number) {
	const { minYear, maxYear } = calendar.limits;
	const span = maxYear - minYear + 1;

	return minYear + (((year - minYear) % span) + span) % span;
}
