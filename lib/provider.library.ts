import { Temporal } from '@js-temporal/polyfill';

import { Almanac } from './almanac.config.js';
import { Static } from './shared/class.library.js';
import { isBoolean, isNumber, isObject, isString, isUndefined } from './shared/type.library.js';
import { Offset, TransitionRule, DstZone, ZoneInfoMem } from './zoneinfo.library.js';
import type { ZoneRecord, ZoneStore } from './zoneinfo.library.js';

import zones from './zones.json' with { type: 'json' };

/**
 * A provider supplies, for a zone name, either a fixed Offset or a DST regime.
 * Providers are consulted only to populate a store; lookups afterwards are pure reads.
 */
export interface ZoneProvider {
	readonly name: string;
	lookup(zone: string): ZoneRecord | undefined;
}

const Match = {
	/** signed hh:mi */																			offset: /^(?<sign>[+-])(?<hh>\d{2}):(?<mi>\d{2})$/,
} as const

// #region Bundled provider ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/**
 * build a store from a JSON document of the form
 * ````
 *	{ "<zone>": { "offset": "+hh:mi", "irregular"?: boolean, "dst"?: { "start": <rule>, "end": <rule> } } }
 * ````
 * an invalid entry is rejected (or skipped with a warning under {catch})
 */
export function parseZones(json: unknown) {
	const mem = new ZoneInfoMem();

	if (!isObject(json)) {
		Almanac.catch('zones', 'expected an object of zone entries');
		return mem;
	}

	Object.entries(json)
		.forEach(([name, entry]) => {
			const record = parseEntry(name, entry);
			if (record)
				mem.add(name, record);
		})

	return mem;
}

function parseEntry(name: string, entry: unknown): ZoneRecord | undefined {
	if (!isObject(entry))
		return Almanac.catch('zones', `"${name}" is not an object`);

	const irregular = isBoolean(entry.irregular) && entry.irregular;
	const offset = parseOffset(entry.offset, irregular);
	if (!offset)
		return Almanac.catch('zones', `"${name}" has an invalid offset: ${String(entry.offset)}`);

	if (isUndefined(entry.dst))
		return { kind: 'fixed', offset };

	const dst = entry.dst;
	const start = isObject(dst) ? parseRule(dst.start) : void 0;
	const end = isObject(dst) ? parseRule(dst.end) : void 0;
	if (!start || !end)
		return Almanac.catch('zones', `"${name}" has an invalid dst rule`);

	return { kind: 'dst', zone: new DstZone(start, end, offset) };
}

function parseOffset(text: unknown, irregular: boolean) {
	const groups = isString(text) ? text.match(Match.offset)?.groups : void 0;
	if (!groups)
		return void 0;

	const minutes = Number(groups.hh) * 60 + Number(groups.mi);
	return Offset.fromMinutes(groups.sign === '-' ? -minutes : minutes, irregular);
}

function parseRule(rule: unknown) {
	if (!isObject(rule) || !isNumber(rule.month) || !isNumber(rule.dow) || !isNumber(rule.hour))
		return void 0;

	const options: TransitionRule.Options = {
		month: rule.month,
		dow: rule.dow,
		eom: isBoolean(rule.eom) ? rule.eom : false,
		week: isNumber(rule.week) ? rule.week : 0,
		hour: rule.hour,
	}

	return Almanac.attempt('zones', () => new TransitionRule(options));
}

/** the zones shipped with the library */
export const bundled: ZoneProvider = {
	name: 'bundled',
	lookup: (zone: string) => ZoneCache.store.get(zone),
}

// #endregion Bundled provider

// #region Temporal provider ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/**
 * derive records from the IANA data behind Temporal.TimeZone, as observed in {year}.
 * a zone whose transitions cannot be expressed as packed rules is reported as absent.
 */
export function temporal(year = Temporal.Now.plainDateISO().year): ZoneProvider {
	return {
		name: 'temporal',
		lookup: (zone: string) => deriveRecord(zone, year),
	}
}

function deriveRecord(zone: string, year: number): ZoneRecord | undefined {
	let tz: Temporal.TimeZone;
	try {
		tz = Temporal.TimeZone.from(zone);
	} catch (err) {
		return Almanac.catch('temporal', `unknown zone "${zone}": ${err instanceof Error ? err.message : String(err)}`);
	}

	const jan = offsetMinutes(tz, Temporal.Instant.from(`${year}-01-15T12:00:00Z`));
	const jul = offsetMinutes(tz, Temporal.Instant.from(`${year}-07-15T12:00:00Z`));

	if (jan === jul) {
		const offset = Offset.fromMinutes(jan);
		return offset ? { kind: 'fixed', offset } : void 0;
	}

	const std = Math.min(jan, jul);
	const delta = Math.abs(jan - jul);
	const irregular = delta !== 60;
	const base = Offset.fromMinutes(std, irregular);

	if (!base || base.dstDelta !== delta) {
		Almanac.warn('temporal', `"${zone}" has an unsupported DST delta of ${delta} minutes`);
		return void 0;
	}

	const first = tz.getNextTransition(Temporal.Instant.from(`${year}-01-01T00:00:00Z`));
	const second = first && tz.getNextTransition(first);
	if (!first || !second) {
		Almanac.warn('temporal', `"${zone}" has no transitions in ${year}`);
		return void 0;
	}

	const rules = [first, second]
		.map(instant => ({ instant, starts: offsetMinutes(tz, instant) > std }));
	const start = rules.find(rule => rule.starts);
	const end = rules.find(rule => !rule.starts);
	if (!start || !end)
		return void 0;

	const startRule = deriveRule(start.instant, std);				// wall-clock before the start is standard time
	const endRule = deriveRule(end.instant, std + delta);			// wall-clock before the end is DST
	if (!startRule || !endRule) {
		Almanac.warn('temporal', `"${zone}" has transitions that cannot be packed`);
		return void 0;
	}

	return { kind: 'dst', zone: new DstZone(startRule, endRule, base) };
}

function offsetMinutes(tz: Temporal.TimeZone, instant: Temporal.Instant) {
	return tz.getOffsetNanosecondsFor(instant) / 60e9;
}

/** express a transition as a rule, reading the wall-clock in force just before it */
function deriveRule(instant: Temporal.Instant, before: number) {
	const wall = instant.toZonedDateTimeISO('UTC').toPlainDateTime().add({ minutes: before });
	if (wall.minute !== 0 || wall.second !== 0)
		return void 0;

	const fromStart = Math.ceil(wall.day / 7);											// 1 = first occurrence in the month
	const fromEnd = Math.ceil((wall.daysInMonth - wall.day + 1) / 7);	// 1 = last occurrence
	const ordinal = fromStart <= 2
		? { eom: false, week: fromStart - 1 }
		: fromEnd <= 2
			? { eom: true, week: fromEnd - 1 }
			: void 0

	if (!ordinal || ![20, 21, 22, 23, 0, 1, 2, 3].includes(wall.hour))
		return void 0;

	return new TransitionRule({ month: wall.month, dow: wall.dayOfWeek - 1, hour: wall.hour, ...ordinal });
}

// #endregion Temporal provider

/** a frozen store of the {names} a provider knows; unknown names are skipped */
export function populate(provider: ZoneProvider, names: Iterable<string>) {
	const mem = new ZoneInfoMem();

	for (const name of names) {
		const record = provider.lookup(name);
		isUndefined(record)
			? Almanac.info(provider.name, `no record for "${name}"`)
			: mem.add(name, record)
	}

	return mem.freeze();
}

/**
 * process-wide zone cache.
 * initialised from the bundled zones on first access, and read-only thereafter
 */
export class ZoneCache extends Static {
	static #store: ZoneInfoMem | undefined;

	static get store(): ZoneStore {
		ZoneCache.#store ??= parseZones(zones).freeze();
		return ZoneCache.#store;
	}

	static get isLoaded() {
		return !isUndefined(ZoneCache.#store);
	}
}
