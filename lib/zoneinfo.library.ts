import { readFile, writeFile } from 'node:fs/promises';

import { Almanac, ParameterError } from './almanac.config.js';
import { WEEKDAY } from './almanac.enum.js';
import { pad } from './shared/string.library.js';

/**
 * Packed zone records.
 * ````
 *	Offset					(8 bits)		sign:1 hour:4 minute-code:2 irregular:1
 *	TransitionRule	(12 bits)		month:4 dow:3 eom:1 week:1 hour-code:3
 *	DstZone					(32 bits)		start:12 end:12 offset:8
 * ````
 * Every record is an immutable value object exposing named accessors over its packed word.
 */

// #region Const variables ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** minute-code to minutes; code 3 is reserved */
const MINUTES = [0, 30, 45] as const;
/** hour-code to the hour of a transition */
const HOURS = [20, 21, 22, 23, 0, 1, 2, 3] as const;

const RECORD = { fixed: 0, dst: 1 } as const;							// tag byte of a binary zone record

// #endregion Const variables

/** a UTC offset of up to fifteen hours, on the hour, half-hour or three-quarter hour */
export class Offset {
	readonly byte: number;

	/**
	 * @param sign				1 | -1
	 * @param irregular		DST adds 30 minutes (when {minute} is non-zero) or 120 minutes (when zero), not an hour
	 */
	constructor(hour: number, minute = 0, sign = 1, irregular = false) {
		if (sign !== 1 && sign !== -1)
			throw new ParameterError('Offset', `sign must be 1 or -1, received ${sign}`);
		if (!Number.isInteger(hour) || hour < 0 || hour >= 16)
			throw new ParameterError('Offset', `hour must be within 0..15, received ${hour}`);

		const code = MINUTES.findIndex(mi => mi === minute);
		if (code === -1)
			throw new ParameterError('Offset', `minute must be 0, 30 or 45, received ${minute}`);

		this.byte = ((sign === -1 ? 1 : 0) << 7) | (hour << 3) | (code << 1) | (irregular ? 1 : 0);
		Object.freeze(this);
	}

	/** decode a packed byte */
	static fromByte(byte: number) {
		const code = (byte >> 1) & 0b11;

		if (!Number.isInteger(byte) || byte < 0 || byte > 0xff)
			throw new ParameterError('Offset', `not an 8-bit value: ${byte}`);
		if (code === 3)
			throw new ParameterError('Offset', 'minute-code 3 is reserved');

		return new Offset((byte >> 3) & 0b1111, MINUTES[code], byte & 0x80 ? -1 : 1, (byte & 1) === 1);
	}

	/** from signed minutes east of UTC; undefined when not representable */
	static fromMinutes(minutes: number, irregular = false) {
		const abs = Math.abs(minutes);
		const hour = Math.floor(abs / 60);
		const minute = abs % 60;

		return hour < 16 && MINUTES.some(mi => mi === minute)
			? new Offset(hour, minute, minutes < 0 ? -1 : 1, irregular)
			: void 0
	}

	get sign() { return this.byte & 0x80 ? -1 : 1 }
	get hour() { return (this.byte >> 3) & 0b1111 }
	get minute(): number { return MINUTES[(this.byte >> 1) & 0b11] }
	get irregular() { return (this.byte & 1) === 1 }

	/** signed minutes east of UTC */
	get minutes() {
		return this.sign * (this.hour * 60 + this.minute);
	}

	/** the extra minutes applied while DST is in effect */
	get dstDelta() {
		return this.irregular
			? this.minute !== 0 ? 30 : 120
			: 60
	}

	equals(other: Offset) {
		return this.byte === other.byte;
	}

	toString() {
		return `${this.sign < 0 ? '-' : '+'}${pad(this.hour)}:${pad(this.minute)}`;
	}

	get [Symbol.toStringTag]() {
		return 'Offset';
	}
}

/**
 * when DST starts or ends: the first or second {dow} in {month},
 * counted from the first day, or from the last day with {eom}
 */
export class TransitionRule {
	readonly bits: number;

	constructor({ month, dow, eom = false, week = 0, hour }: TransitionRule.Options) {
		if (!Number.isInteger(month) || month < 1 || month > 12)
			throw new ParameterError('TransitionRule', `month must be within 1..12, received ${month}`);
		if (!Number.isInteger(dow) || dow < 0 || dow > 6)
			throw new ParameterError('TransitionRule', `dow must be within 0..6, received ${dow}`);
		if (week !== 0 && week !== 1)
			throw new ParameterError('TransitionRule', `week must be 0 or 1, received ${week}`);

		const code = HOURS.findIndex(hh => hh === hour);
		if (code === -1)
			throw new ParameterError('TransitionRule', `hour must be one of ${HOURS.join(',')}, received ${hour}`);

		this.bits = (month << 8) | (dow << 5) | ((eom ? 1 : 0) << 4) | (week << 3) | code;
		Object.freeze(this);
	}

	/** decode a packed 12-bit rule */
	static fromBits(bits: number) {
		return new TransitionRule({
			month: (bits >> 8) & 0b1111,
			dow: (bits >> 5) & 0b111,
			eom: ((bits >> 4) & 1) === 1,
			week: (bits >> 3) & 1,
			hour: HOURS[bits & 0b111],
		})
	}

	get month() { return (this.bits >> 8) & 0b1111 }
	get dow() { return (this.bits >> 5) & 0b111 }
	get eom() { return ((this.bits >> 4) & 1) === 1 }
	get week() { return (this.bits >> 3) & 1 }
	get hour(): number { return HOURS[this.bits & 0b111] }

	equals(other: TransitionRule) {
		return this.bits === other.bits;
	}

	toString() {
		const nth = this.eom
			? this.week === 0 ? 'last' : '2nd-last'
			: this.week === 0 ? '1st' : '2nd'

		return `${nth} ${String(WEEKDAY.keys()[this.dow])} of month ${this.month} at ${pad(this.hour)}:00`;
	}

	get [Symbol.toStringTag]() {
		return 'TransitionRule';
	}
}

/** a DST regime: start rule, end rule and the standard (base) offset */
export class DstZone {
	readonly start: TransitionRule;
	readonly end: TransitionRule;
	readonly offset: Offset;

	constructor(start: TransitionRule, end: TransitionRule, offset: Offset) {
		this.start = start;
		this.end = end;
		this.offset = offset;

		Object.freeze(this);
	}

	/** decode a packed 32-bit zone */
	static fromBits(bits: number) {
		return new DstZone(
			TransitionRule.fromBits((bits >>> 20) & 0xfff),
			TransitionRule.fromBits((bits >>> 8) & 0xfff),
			Offset.fromByte(bits & 0xff),
		)
	}

	/** unsigned 32-bit word */
	get bits() {
		return ((this.start.bits << 20) | (this.end.bits << 8) | this.offset.byte) >>> 0;
	}

	equals(other: DstZone) {
		return this.bits === other.bits;
	}

	get [Symbol.toStringTag]() {
		return 'DstZone';
	}
}

/** the data held for a zone name */
export type ZoneRecord =
	| { kind: 'fixed', offset: Offset }
	| { kind: 'dst', zone: DstZone }

/** a read-only name→record lookup */
export interface ZoneStore {
	get(name: string): ZoneRecord | undefined;
	has(name: string): boolean;
	names(): string[];
}

/** in-memory zone store; {freeze} makes it read-only */
export class ZoneInfoMem implements ZoneStore {
	#zones = new Map<string, ZoneRecord>();
	#frozen = false;

	constructor(entries: Iterable<[string, ZoneRecord]> = []) {
		for (const [name, record] of entries)
			this.add(name, record);
	}

	add(name: string, record: ZoneRecord) {
		if (this.#frozen)
			throw new ParameterError('ZoneInfoMem', `store is frozen, cannot add "${name}"`);

		this.#zones.set(name, record);
		return this;
	}

	get(name: string) {
		return this.#zones.get(name);
	}

	has(name: string) {
		return this.#zones.has(name);
	}

	names() {
		return [...this.#zones.keys()];
	}

	get size() {
		return this.#zones.size;
	}

	freeze() {
		this.#frozen = true;
		return this;
	}

	get isFrozen() {
		return this.#frozen;
	}

	[Symbol.iterator]() {
		return this.#zones.entries();
	}
}

/**
 * file-backed zone store.
 * each record is: tag (u8) | name-length (u8) | name (utf8) | offset (u8) or zone (u32, big-endian)
 */
export class ZoneInfoFile implements ZoneStore {
	readonly path: string;
	#mem: ZoneInfoMem;

	private constructor(path: string, mem: ZoneInfoMem) {
		this.path = path;
		this.#mem = mem.freeze();
	}

	/** read every record from {path}; undefined (or throw, per config) when unreadable */
	static async open(path: string) {
		let buf: Buffer;
		try {
			buf = await readFile(path);
		} catch (err) {
			return Almanac.catch('ZoneInfoFile', `cannot read "${path}": ${err instanceof Error ? err.message : String(err)}`);
		}

		const mem = ZoneInfoFile.decode(buf);
		return mem && new ZoneInfoFile(path, mem);
	}

	/** write every record of a store to {path} */
	static async save(path: string, store: ZoneStore) {
		await writeFile(path, ZoneInfoFile.encode(store));
	}

	static encode(store: ZoneStore) {
		const chunks = store.names()
			.map(name => {
				const record = store.get(name);
				const label = Buffer.from(name, 'utf8');

				if (!record)
					return Buffer.alloc(0);
				if (label.length > 0xff)
					throw new ParameterError('ZoneInfoFile', `zone name too long: "${name}"`);

				const data = record.kind === 'fixed'
					? Buffer.from([record.offset.byte])
					: Buffer.alloc(4);
				if (record.kind === 'dst')
					data.writeUInt32BE(record.zone.bits);

				return Buffer.concat([Buffer.from([RECORD[record.kind], label.length]), label, data]);
			})

		return Buffer.concat(chunks);
	}

	/** parse a buffer of records; undefined (or throw, per config) when truncated or malformed */
	static decode(buf: Buffer) {
		const mem = new ZoneInfoMem();
		let pos = 0;

		while (pos < buf.length) {
			const tag = buf[pos];
			const len = buf[pos + 1] ?? 0;
			const name = buf.toString('utf8', pos + 2, pos + 2 + len);
			const at = pos + 2 + len;

			switch (tag) {
				case RECORD.fixed:
					if (at + 1 > buf.length)
						return Almanac.catch('ZoneInfoFile', `truncated record "${name}"`);
					const offset = Almanac.attempt('ZoneInfoFile', () => Offset.fromByte(buf.readUInt8(at)));
					if (!offset)
						return void 0;
					mem.add(name, { kind: 'fixed', offset });
					pos = at + 1;
					break;

				case RECORD.dst:
					if (at + 4 > buf.length)
						return Almanac.catch('ZoneInfoFile', `truncated record "${name}"`);
					const zone = Almanac.attempt('ZoneInfoFile', () => DstZone.fromBits(buf.readUInt32BE(at)));
					if (!zone)
						return void 0;
					mem.add(name, { kind: 'dst', zone });
					pos = at + 4;
					break;

				default:
					return Almanac.catch('ZoneInfoFile', `unknown record tag ${String(tag)} at byte ${pos}`);
			}
		}

		return mem;
	}

	get(name: string) {
		return this.#mem.get(name);
	}

	has(name: string) {
		return this.#mem.has(name);
	}

	names() {
		return this.#mem.names();
	}
}

export namespace TransitionRule {
	export interface Options {
		/** 1..12 */																						month: number;
		/** day-of-week, Monday=0 */														dow: number;
		/** count from the last day of the month */							eom?: boolean;
		/** 0 = first occurrence, 1 = second */									week?: number;
		/** one of 20,21,22,23,0,1,2,3 */												hour: number;
	}
}
