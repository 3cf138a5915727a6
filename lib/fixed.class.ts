import { Temporal } from '@js-temporal/polyfill';

import { HASH, TIME } from './almanac.enum.js';
import { FAST_UTC } from './calendar.class.js';
import { FIELDS, pack, unpack, getField, setField, type HashField, type HashFields, type HashValue } from './hash.library.js';
import { toISO, type ISO } from './iso.library.js';
import { secure } from './shared/reflection.library.js';
import { isNumber } from './shared/type.library.js';

/**
 * Fixed-resolution date-times: a single unsigned counter of ticks since 1970 (on the FAST_UTC calendar)
 * plus a cached, packed hash of its decomposed fields.
 * ````
 *	FixedDateTime64		millisecond ticks		UINT64 hash
 *	FixedDateTime32		minute ticks				UINT32 hash
 *	FixedDateTime16		hour ticks					UINT16 hash (year relative to 1970)
 *	FixedDateTime8		hour ticks					UINT8 hash (day = days since 1970)
 * ````
 * The counter wraps silently at its width.
 *
 * Field accessors read only the cached hash.
 * {replace} rewrites hash bits only, and {add} / {subtract} move the counter only;
 * either leaves the value {isDirty} until {rehash} rebuilds the hash from the counter.
 */

// #region Const variables ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

const EPOCH_YEAR = FAST_UTC.limits.minYear;
const MS_DAY = BigInt(TIME.day * 1_000);
const MS_HOUR = BigInt(TIME.hour * 1_000);
const MS_MINUTE = BigInt(TIME.minute * 1_000);

/** ticks and hash scheme of each width */
const Scheme = secure({
	[HASH.UINT64]: { tick: 1n },
	[HASH.UINT32]: { tick: MS_MINUTE },
	[HASH.UINT16]: { tick: MS_HOUR },
	[HASH.UINT8]: { tick: MS_HOUR },
})

// #endregion Const variables

export abstract class FixedDateTime<W extends HASH> {
	readonly width: W;
	#counter: bigint;
	#hash: HashValue<W>;
	#dirty = false;

	protected constructor(width: W, counter: bigint, hash?: HashValue<W>) {
		this.width = width;
		this.#counter = BigInt.asUintN(width, counter);
		this.#hash = hash ?? this.#derive();
	}

	/** milliseconds in one tick of the counter */
	get #tick() {
		return Scheme[this.width].tick;
	}

	/** pack the counter's decomposition */
	#derive() {
		return pack(this.width, toHashFields(this.width, decompose(this.#counter * this.#tick)));
	}

	// #region Accessors ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** ticks since the epoch */
	get counter() { return this.#counter }
	/** the cached hash (may be stale, see {isDirty}) */
	get hash() { return this.#hash }
	/** the hash no longer matches the counter */
	get isDirty() { return this.#dirty }

	get year() {
		switch (this.width) {
			case HASH.UINT16: return EPOCH_YEAR + this.#field('year');
			case HASH.UINT8: return EPOCH_YEAR;
			default: return this.#field('year');
		}
	}
	get month() { return this.width === HASH.UINT8 ? 1 : this.#field('month') }
	/** for FixedDateTime8, the days since the epoch */
	get day() { return this.#field('day') }
	get hour() { return this.#field('hour') }
	get minute() { return this.#field('minute') }
	get second() { return this.#field('second') }
	get millisecond() { return this.#field('millisecond') }

	#field(field: HashField) {
		return getField(this.width, this.#hash, field);
	}

	// #endregion Accessors

	// #region Mutators ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** move the counter forward (the hash is not refreshed) */
	add(duration: FixedDateTime.Duration) {
		return this.#move(duration, 1n);
	}

	/** move the counter back (the hash is not refreshed) */
	subtract(duration: FixedDateTime.Duration) {
		return this.#move(duration, -1n);
	}

	#move({ days = 0, hours = 0, minutes = 0, seconds = 0, milliseconds = 0 }: FixedDateTime.Duration, direction: 1n | -1n) {
		const ms = BigInt(Math.trunc(days)) * MS_DAY
			+ BigInt(Math.trunc(hours)) * MS_HOUR
			+ BigInt(Math.trunc(minutes)) * MS_MINUTE
			+ BigInt(Math.trunc(seconds)) * 1_000n
			+ BigInt(Math.trunc(milliseconds));

		this.#counter = BigInt.asUintN(this.width, this.#counter + direction * (ms / this.#tick));
		this.#dirty = true;
		return this;
	}

	/** rewrite fields of the hash (the counter is not touched) */
	replace(fields: Partial<HashFields>) {
		Object.entries(fields)
			.forEach(([field, value]) => {
				if (isHashField(field) && isNumber(value))
					this.#hash = setField(this.width, this.#hash, field, field === 'year' && this.width === HASH.UINT16 ? value - EPOCH_YEAR : value);
			})

		this.#dirty = true;
		return this;
	}

	/** rebuild the hash from the counter */
	rehash() {
		this.#hash = this.#derive();
		this.#dirty = false;
		return this;
	}

	// #endregion Mutators

	/** order by counter */
	compare(other: FixedDateTime<W>) {
		return this.#counter === other.counter ? 0 : this.#counter < other.counter ? -1 : 1;
	}

	equals(other: FixedDateTime<W>) {
		return this.width === other.width && this.#counter === other.counter;
	}

	secondsSinceEpoch() {
		return Number(this.#counter * this.#tick / 1_000n);
	}

	/** an ISO-8601 string of the hash fields */
	toISO(format: ISO = 'dateTime') {
		return toISO({ year: this.year, month: this.month, day: this.day, hour: this.hour, minute: this.minute, second: this.second }, format);
	}

	toString() {
		return this.toISO() ?? '';
	}

	get [Symbol.toStringTag]() {
		return 'FixedDateTime';
	}

	// #region Static helpers ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** ticks of {width} for the wall-clock now */
	protected static nowTicks(width: HASH) {
		return BigInt(Temporal.Now.instant().epochMilliseconds) / Scheme[width].tick;
	}

	/** ticks of {width} for whole seconds since 1970 */
	protected static epochTicks(width: HASH, seconds: number) {
		return BigInt(Math.trunc(seconds)) * 1_000n / Scheme[width].tick;
	}

	/** ticks of {width} implied by the fields of a hash */
	protected static hashTicks(width: HASH, hash: bigint | number) {
		const { year, month, day, hour, minute, second, millisecond } = unpack(width, hash);
		const ms = width === HASH.UINT8
			? BigInt(day) * MS_DAY + BigInt(hour) * MS_HOUR
			: BigInt(FAST_UTC.mSecondsSinceEpoch(width === HASH.UINT16 ? EPOCH_YEAR + year : year, month, day, hour, minute, second, millisecond));

		return ms / Scheme[width].tick;
	}

	// #endregion Static helpers
}

export class FixedDateTime64 extends FixedDateTime<typeof HASH.UINT64> {
	constructor(counter: bigint | number = 0n, hash?: bigint) {
		super(HASH.UINT64, BigInt(counter), hash);
	}

	static now() { return new FixedDateTime64(FixedDateTime.nowTicks(HASH.UINT64)) }
	static fromUnixEpoch(seconds: number) { return new FixedDateTime64(FixedDateTime.epochTicks(HASH.UINT64, seconds)) }
	static fromHash(hash: bigint) { return new FixedDateTime64(FixedDateTime.hashTicks(HASH.UINT64, hash), hash) }
}

export class FixedDateTime32 extends FixedDateTime<typeof HASH.UINT32> {
	constructor(counter: bigint | number = 0n, hash?: number) {
		super(HASH.UINT32, BigInt(counter), hash);
	}

	static now() { return new FixedDateTime32(FixedDateTime.nowTicks(HASH.UINT32)) }
	static fromUnixEpoch(seconds: number) { return new FixedDateTime32(FixedDateTime.epochTicks(HASH.UINT32, seconds)) }
	static fromHash(hash: number) { return new FixedDateTime32(FixedDateTime.hashTicks(HASH.UINT32, hash), hash) }
}

export class FixedDateTime16 extends FixedDateTime<typeof HASH.UINT16> {
	constructor(counter: bigint | number = 0n, hash?: number) {
		super(HASH.UINT16, BigInt(counter), hash);
	}

	static now() { return new FixedDateTime16(FixedDateTime.nowTicks(HASH.UINT16)) }
	static fromUnixEpoch(seconds: number) { return new FixedDateTime16(FixedDateTime.epochTicks(HASH.UINT16, seconds)) }
	static fromHash(hash: number) { return new FixedDateTime16(FixedDateTime.hashTicks(HASH.UINT16, hash), hash) }
}

export class FixedDateTime8 extends FixedDateTime<typeof HASH.UINT8> {
	constructor(counter: bigint | number = 0n, hash?: number) {
		super(HASH.UINT8, BigInt(counter), hash);
	}

	static now() { return new FixedDateTime8(FixedDateTime.nowTicks(HASH.UINT8)) }
	static fromUnixEpoch(seconds: number) { return new FixedDateTime8(FixedDateTime.epochTicks(HASH.UINT8, seconds)) }
	static fromHash(hash: number) { return new FixedDateTime8(FixedDateTime.hashTicks(HASH.UINT8, hash), hash) }
}

// #region Decomposition ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** split milliseconds since 1970 on the FAST_UTC calendar; days 360..364 of a year fall in month 13 */
function decompose(ms: bigint): HashFields & { days: number } {
	const days = ms / MS_DAY;
	const rest = ms % MS_DAY;
	const doy = Number(days % 365n);

	return {
		days: Number(days),
		year: EPOCH_YEAR + Number(days / 365n),
		month: Math.floor(doy / 30) + 1,
		day: (doy % 30) + 1,
		hour: Number(rest / MS_HOUR),
		minute: Number((rest % MS_HOUR) / MS_MINUTE),
		second: Number((rest % MS_MINUTE) / 1_000n),
		millisecond: Number(rest % 1_000n),
		microsecond: 0,
	}
}

/** the tuple each width packs */
function toHashFields(width: HASH, parts: ReturnType<typeof decompose>): Partial<HashFields> {
	const { days, ...fields } = parts;

	switch (width) {
		case HASH.UINT16:
			return { ...fields, year: fields.year - EPOCH_YEAR };
		case HASH.UINT8:
			return { day: days, hour: fields.hour };
		default:
			return fields;
	}
}

function isHashField(field: string): field is HashField {
	return FIELDS.some(name => name === field);
}

// #endregion Decomposition

export namespace FixedDateTime {
	export type Duration = Partial<{
		days: number;
		hours: number;
		minutes: number;
		seconds: number;
		milliseconds: number;
	}>
}
