import { Almanac } from './almanac.config.js';
import { GREGORIAN } from './calendar.class.js';
import { ZoneCache } from './provider.library.js';
import { Offset } from './zoneinfo.library.js';
import type { DstZone, TransitionRule, ZoneStore } from './zoneinfo.library.js';

/**
 * A named zone resolving a civil timestamp to its UTC offset.
 * A zone without DST always reports its static Offset;
 * a zone with DST looks up its DstZone in a store on each resolution.
 */
export class TimeZone {
	readonly name: string;
	readonly offset: Offset;
	readonly hasDst: boolean;
	readonly #store: ZoneStore | undefined;

	constructor(name = 'UTC', { offset = new Offset(0), hasDst = false, store }: TimeZone.Options = {}) {
		this.name = name;
		this.offset = offset;
		this.hasDst = hasDst;
		this.#store = store;

		Object.freeze(this);
	}

	/** resolve a zone by name; an unknown name falls back to UTC+00:00 */
	static from(name: string, store: ZoneStore = ZoneCache.store) {
		const record = store.get(name);

		switch (record?.kind) {
			case 'fixed':
				return new TimeZone(name, { offset: record.offset });

			case 'dst':
				return new TimeZone(name, { offset: record.zone.offset, hasDst: true, store });

			case undefined:
				Almanac.warn('TimeZone', `no zone record for "${name}", using a static offset`);
				return new TimeZone(name);
		}
	}

	/** the store consulted for DST rules */
	get store() {
		return this.#store ?? ZoneCache.store;
	}

	/** the offset in force at a civil timestamp */
	offsetAt(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): TimeZone.Resolved {
		if (!this.hasDst)
			return resolved(this.offset.minutes);

		const record = this.store.get(this.name);
		if (record?.kind !== 'dst')
			return resolved(this.offset.minutes);									// lookup miss: the static offset

		const zone = record.zone;
		return resolved(isDst(zone, year, month, day, hour, minute, second)
			? zone.offset.minutes + zone.offset.dstDelta
			: zone.offset.minutes)
	}

	/** signed minutes east of UTC at a civil timestamp */
	minutesAt(year: number, month: number, day: number, hour = 0, minute = 0, second = 0) {
		const { hour: hh, minute: mi, sign } = this.offsetAt(year, month, day, hour, minute, second);
		return sign * (hh * 60 + mi);
	}

	/** same name and same offset fields */
	equals(other: TimeZone) {
		return this.name === other.name
			&& this.hasDst === other.hasDst
			&& this.offset.equals(other.offset);
	}

	toString() {
		return this.name;
	}

	toJSON() {
		return this.name;
	}

	get [Symbol.toStringTag]() {
		return 'TimeZone';
	}
}

// #region DST evaluation ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** is DST in effect at the civil timestamp? */
function isDst(zone: DstZone, year: number, month: number, day: number, hour: number, minute: number, second: number) {
	const { start, end } = zone;
	const at = { year, day, hour, minute, second };

	if (month === start.month)
		return isOnOrAfter(start, at);												// std before the instant, dst from it
	if (month === end.month)
		return !isOnOrAfter(end, at);													// dst before the instant, std from it

	return start.month < end.month
		? month > start.month && month < end.month					// northern hemisphere
		: month > start.month || month < end.month					// southern: DST spans the year-end
}

/** the day-of-month on which a rule fires in {year} */
export function transitionDay(rule: TransitionRule, year: number) {
	const [firstDow, lastDay] = GREGORIAN.monthRange(year, rule.month);

	if (rule.eom) {																					// count back from the last day
		const lastDow = (firstDow + lastDay - 1) % 7;
		const last = lastDay - (lastDow - rule.dow + 7) % 7;
		return last - 7 * rule.week;
	}

	const first = 1 + (rule.dow - firstDow + 7) % 7;
	return first + 7 * rule.week;
}

function isOnOrAfter(rule: TransitionRule, at: { year: number, day: number, hour: number, minute: number, second: number }) {
	const day = transitionDay(rule, at.year);

	if (at.day !== day)
		return at.day > day;

	return at.hour >= rule.hour;
}

/** signed minutes to {hour, minute, sign} */
function resolved(minutes: number): TimeZone.Resolved {
	const abs = Math.abs(minutes);
	return { hour: Math.floor(abs / 60), minute: abs % 60, sign: minutes < 0 ? -1 : 1 };
}

// #endregion DST evaluation

export namespace TimeZone {
	export interface Options {
		/** static (or standard) offset */												offset?: Offset;
		/** consult a DstZone for this name */									hasDst?: boolean;
		/** where the DstZone is held (default: the zone cache) */	store?: ZoneStore;
	}

	/** a resolved offset */
	export interface Resolved {
		hour: number;
		minute: number;
		sign: 1 | -1;
	}
}
