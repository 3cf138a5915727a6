import { ParameterError } from './almanac.config.js';
import { HASH } from './almanac.enum.js';
import { secure } from './shared/reflection.library.js';

/**
 * Fixed-width field-packing schemes for a (year, month, day, hour, minute, second, ms, us) tuple.
 *
 * Each width allots a bit budget per field, most-significant-first (year highest),
 * aligned to the low end of the word:
 * ````
 *	UINT64	year:16 month:4 day:5 hour:5 minute:6 second:6 millisecond:10 microsecond:10  (62 bits)
 *	UINT32	year:12 month:4 day:5 hour:5 minute:6
 *	UINT16	year:2  month:4 day:5 hour:5
 *	UINT8		day:3   hour:5
 * ````
 * Packing never raises: a value is truncated to an integer and masked to its budget,
 * a field without budget is dropped.  Callers pre-validate ranges when they need a lossless round-trip.
 * These layouts are a persisted format; do not reorder.
 */

export const FIELDS = ['year', 'month', 'day', 'hour', 'minute', 'second', 'millisecond', 'microsecond'] as const;

/** the tuple packed by a hash */
export type HashField = typeof FIELDS[number]
export type HashFields = Record<HashField, number>
/** a hash value is a bigint for UINT64, else a number */
export type HashValue<W extends HASH> = W extends typeof HASH.UINT64 ? bigint : number

interface Slot {
	readonly field: HashField;
	readonly bits: number;
	readonly shift: bigint;
	readonly mask: bigint;
}

/** derive shift/mask from a list of [field, bits], most-significant first */
function slots(...budget: [HashField, number][]): readonly Slot[] {
	let shift = budget.reduce((acc, [, bits]) => acc + bits, 0);

	return budget.map(([field, bits]) => {
		shift -= bits;
		return { field, bits, shift: BigInt(shift), mask: (1n << BigInt(bits)) - 1n };
	})
}

export const Layout = secure({
	[HASH.UINT64]: slots(['year', 16], ['month', 4], ['day', 5], ['hour', 5], ['minute', 6], ['second', 6], ['millisecond', 10], ['microsecond', 10]),
	[HASH.UINT32]: slots(['year', 12], ['month', 4], ['day', 5], ['hour', 5], ['minute', 6]),
	[HASH.UINT16]: slots(['year', 2], ['month', 4], ['day', 5], ['hour', 5]),
	[HASH.UINT8]: slots(['day', 3], ['hour', 5]),
})

/** lookup the slot table for a width */
function layout(width: HASH) {
	switch (width) {
		case HASH.UINT64:
		case HASH.UINT32:
		case HASH.UINT16:
		case HASH.UINT8:
			return Layout[width];

		default:
			throw new ParameterError('hash', `unsupported width: ${String(width)}`);
	}
}

/** locate one field's slot, if it has a budget in this width */
function slotOf(width: HASH, field: HashField) {
	return layout(width).find(slot => slot.field === field);
}

const asBits = (value: number) =>
	Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;

/** narrow the packed bigint to the public type for its width */
function narrow<W extends HASH>(width: W, word: bigint): HashValue<W>;
function narrow(width: HASH, word: bigint): bigint | number {
	return width === HASH.UINT64
		? word
		: Number(word)
}

/** pack a (partial) tuple into a hash of {width} bits */
export function pack<W extends HASH>(width: W, fields: Partial<HashFields>): HashValue<W> {
	const word = layout(width)
		.reduce((acc, { field, shift, mask }) => acc | ((asBits(fields[field] ?? 0) & mask) << shift), 0n);

	return narrow(width, word);
}

/** unpack a hash of {width} bits into the full tuple (zero where the width has no budget) */
export function unpack(width: HASH, hash: bigint | number): HashFields {
	const word = BigInt.asUintN(width, BigInt(hash));
	const fields: HashFields = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0, millisecond: 0, microsecond: 0 };

	layout(width)
		.forEach(({ field, shift, mask }) => fields[field] = Number((word >> shift) & mask));

	return fields;
}

/** read a single field from a hash (zero if the width has no budget for it) */
export function getField(width: HASH, hash: bigint | number, field: HashField) {
	const slot = slotOf(width, field);

	return slot
		? Number((BigInt(hash) >> slot.shift) & slot.mask)
		: 0
}

/** replace a single field's bits within a hash, leaving every other bit as-is */
export function setField<W extends HASH>(width: W, hash: bigint | number, field: HashField, value: number): HashValue<W> {
	const word = BigInt(hash);
	const slot = slotOf(width, field);

	if (!slot)
		return narrow(width, word);															// no budget; nothing to replace

	const cleared = word & ~(slot.mask << slot.shift);
	return narrow(width, cleared | ((asBits(value) & slot.mask) << slot.shift));
}

/** bit budget of a field within a width (zero if absent) */
export function bitsOf(width: HASH, field: HashField) {
	return slotOf(width, field)?.bits ?? 0;
}
