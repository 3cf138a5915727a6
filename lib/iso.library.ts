import { enumify } from './shared/enumerate.library.js';
import { pad } from './shared/string.library.js';
import { isDefined, isUndefined } from './shared/type.library.js';
import { MONTH, WEEKDAY } from './almanac.enum.js';
import type { Enum } from './shared/enumerate.library.js';
import type { Fields } from './carry.library.js';

/**
 * ISO-8601 and pattern-based string codec.
 *
 * Format tokens (case-sensitive):
 * ````
 *	yyyy	4-digit year				yy	2-digit year (20yy)
 *	mmm		month name (Jan)		mm	2-digit month
 *	www		weekday name (Mon)	dd	2-digit day
 *	hh		2-digit hour				mi	2-digit minute				ss	2-digit second
 *	ff		9-digit fraction (millisecond, microsecond, nanosecond)
 * ````
 * Anything else is copied through as-is.  Every failure is reported as undefined.
 */

/** the ISO formats */
export const ISO = enumify({
	/** YYYY-MM-DD */																				date: 'yyyy-mm-dd',
	/** YYYY-MM-DDTHH:MM:SS */																dateTime: 'yyyy-mm-ddThh:mi:ss',
	/** YYYYMMDDHHMMSS */																			compact: 'yyyymmddhhmiss',
	/** HH:MM:SS */																						time: 'hh:mi:ss',
});
export type ISO = Enum.keys<typeof ISO>

/** the fields read or written by the codec; {dow} is Monday=0 */
export type Stamp = Partial<Fields> & { dow?: number }

const Match = {
	/** every token, longest first */												token: /yyyy|yy|mmm|mm|www|dd|hh|mi|ss|ff/g,
	/** characters with meaning in a RegExp */								escape: /[.*+?^${}()|[\]\\]/g,
} as const

/** the RegExp snippet for each token */
const Unit = {
	yyyy: '(?<yyyy>\\d{4})',
	yy: '(?<yy>\\d{2})',
	mmm: `(?<mmm>${MONTH.keys().join('|')})`,
	mm: '(?<mm>\\d{2})',
	www: `(?<www>${WEEKDAY.keys().join('|')})`,
	dd: '(?<dd>\\d{2})',
	hh: '(?<hh>\\d{2})',
	mi: '(?<mi>\\d{2})',
	ss: '(?<ss>\\d{2})',
	ff: '(?<ff>\\d{1,9})',
} as const
type Token = keyof typeof Unit

function isToken(token: string): token is Token {
	return Object.hasOwn(Unit, token);
}

/** format {stamp} with a token pattern; undefined if a token has no value */
export function strftime(stamp: Stamp, fmt: string) {
	let missing = false;

	const text = fmt.replace(Match.token, token => {
		const value = isToken(token) ? render(stamp, token) : token;
		missing ||= isUndefined(value);
		return value ?? '';
	})

	return missing ? void 0 : text;
}

function render(stamp: Stamp, token: Token) {
	const { year, month, day, hour, minute, second, millisecond = 0, microsecond = 0, nanosecond = 0, dow } = stamp;

	switch (token) {
		case 'yyyy': return isDefined(year) ? pad(year, 4) : void 0;
		case 'yy': return isDefined(year) ? pad(year % 100) : void 0;
		case 'mmm': return isDefined(month) ? String(MONTH.keys()[month - 1] ?? '') || void 0 : void 0;
		case 'mm': return isDefined(month) ? pad(month) : void 0;
		case 'www': return isDefined(dow) ? String(WEEKDAY.keys()[dow] ?? '') || void 0 : void 0;
		case 'dd': return isDefined(day) ? pad(day) : void 0;
		case 'hh': return isDefined(hour) ? pad(hour) : void 0;
		case 'mi': return isDefined(minute) ? pad(minute) : void 0;
		case 'ss': return isDefined(second) ? pad(second) : void 0;
		case 'ff': return pad(millisecond, 3) + pad(microsecond, 3) + pad(nanosecond, 3);
	}
}

/** parse {text} against a token pattern; undefined when it does not match or a field is out of range */
export function strptime(text: string, fmt: string): Stamp | undefined {
	const pattern = fmt
		.split(Match.token)
		.map(literal => literal.replace(Match.escape, '\\$&'));
	const tokens = fmt.match(Match.token) ?? [];

	if (new Set(tokens).size !== tokens.length)
		return void 0;																					// a token may appear only once

	const source = pattern
		.map((literal, idx) => {
			const token = tokens[idx];
			return literal + (isDefined(token) && isToken(token) ? Unit[token] : '');
		})
		.join('');

	const groups = new RegExp(`^${source}$`).exec(text.trim())?.groups;
	if (!groups)
		return void 0;

	const stamp: Stamp = {};
	const num = (key: string) => isDefined(groups[key]) ? Number(groups[key]) : void 0;
	const assign = (key: keyof Stamp, value?: number) => {
		if (isDefined(value))
			stamp[key] = value;
	}

	assign('year', num('yyyy') ?? (isDefined(groups.yy) ? 2000 + Number(groups.yy) : void 0));
	assign('month', num('mm') ?? (isDefined(groups.mmm) ? MONTH.keys().findIndex(mon => mon === groups.mmm) + 1 : void 0));
	assign('day', num('dd'));
	assign('hour', num('hh'));
	assign('minute', num('mi'));
	assign('second', num('ss'));
	assign('dow', isDefined(groups.www) ? WEEKDAY.keys().findIndex(wkd => wkd === groups.www) : void 0);
	if (isDefined(groups.ff)) {
		const ff = groups.ff.padEnd(9, '0');
		assign('millisecond', Number(ff.slice(0, 3)));
		assign('microsecond', Number(ff.slice(3, 6)));
		assign('nanosecond', Number(ff.slice(6, 9)));
	}

	return inRange(stamp) ? stamp : void 0;
}

/** every parsed field lies within its civil range */
function inRange({ month, day, hour, minute, second }: Stamp) {
	const within = (value: number | undefined, min: number, max: number) =>
		isUndefined(value) || (value >= min && value <= max);

	return within(month, 1, 12)
		&& within(day, 1, 31)
		&& within(hour, 0, 23)
		&& within(minute, 0, 59)
		&& within(second, 0, 60);
}

/** an ISO-8601 string for {stamp} */
export function toISO(stamp: Stamp, format: ISO = 'dateTime') {
	return strftime(stamp, ISO[format]);
}

/** parse an ISO-8601 string */
export function fromISO(text: string, format: ISO = 'dateTime') {
	return strptime(text, ISO[format]);
}
