export { Almanac, ParameterError } from './almanac.config.js';
export { WEEKDAY, WEEKDAYS, MONTH, MONTHS, HASH, CALENDAR, TIME, NANO, LEAPSEC, CYCLE, MAX_UINT64 } from './almanac.enum.js';
export { FIELDS, Layout, pack, unpack, getField, setField, bitsOf } from './hash.library.js';
export { Calendar, GREGORIAN, UTC, FAST_UTC } from './calendar.class.js';
export { Offset, TransitionRule, DstZone, ZoneInfoMem, ZoneInfoFile } from './zoneinfo.library.js';
export { parseZones, bundled, temporal, populate, ZoneCache } from './provider.library.js';
export { TimeZone, transitionDay } from './timezone.class.js';
export { normalise, shift, wrapYear } from './carry.library.js';
export { ISO, toISO, fromISO, strftime, strptime } from './iso.library.js';
export { CalendarDate } from './date.class.js';
export { CalendarDateTime } from './datetime.class.js';
export { FixedDateTime, FixedDateTime64, FixedDateTime32, FixedDateTime16, FixedDateTime8 } from './fixed.class.js';

export type { Weekday, Month } from './almanac.enum.js';
export type { HashField, HashFields, HashValue } from './hash.library.js';
export type { ZoneRecord, ZoneStore } from './zoneinfo.library.js';
export type { ZoneProvider } from './provider.library.js';
export type { Fields, Duration } from './carry.library.js';
export type { Stamp } from './iso.library.js';
