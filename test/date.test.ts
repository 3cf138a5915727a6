import * as fc from 'fast-check';

import { Almanac } from '../lib/almanac.config.js';
import { HASH } from '../lib/almanac.enum.js';
import { GREGORIAN, UTC, FAST_UTC } from '../lib/calendar.class.js';
import { CalendarDate } from '../lib/date.class.js';
import { TimeZone } from '../lib/timezone.class.js';

const label = 'date:';

/**
 * Test the CalendarDate value
 */
describe(`${label}`, () => {

  afterEach(() => {
    Almanac.init();
  })

  describe(`${label} construction`, () => {
    test(`${label} defaults come from the config`, () => {
      const date = new CalendarDate(2024);

      expect(date.toISO())
        .toBe('2024-01-01')
      expect(date.calendar)
        .toBe(GREGORIAN)
      expect(date.tz.name)
        .toBe('UTC')
    })

    test(`${label} the configured calendar is used`, () => {
      Almanac.init({ calendar: 'fast-utc' });

      expect(new CalendarDate(1970, 12, 31).toISO())
        .toBe('1970-13-01')
    })

    test(`${label} out-of-range fields are carried`, () => {
      expect(new CalendarDate(2024, 13, 1).toISO())
        .toBe('2025-01-01')
      expect(new CalendarDate(2024, 1, 0).toISO())
        .toBe('2023-12-31')
    })

    test(`${label} today`, () => {
      const today = CalendarDate.now({ tz: TimeZone.from('Pacific/Auckland') });

      expect([today.tz.name, today.year > 2020])
        .toEqual(['Pacific/Auckland', true])
    })

    test(`${label} dates are frozen`, () => {
      expect(Object.isFrozen(new CalendarDate(2024)))
        .toBe(true)
    })
  })

  describe(`${label} arithmetic`, () => {
    test(`${label} add a day across a leap day`, () => {
      const date = new CalendarDate(2024, 2, 28);

      expect(date.add({ days: 1 }).toISO())
        .toBe('2024-02-29')
      expect(date.add({ days: 2 }).toISO())
        .toBe('2024-03-01')
    })

    test(`${label} add a day in a common year`, () => {
      expect(new CalendarDate(2023, 2, 28).add({ days: 1 }).toISO())
        .toBe('2023-03-01')
    })

    test(`${label} add a day across the year-end`, () => {
      expect(new CalendarDate(2024, 12, 31).add({ days: 1 }).toISO())
        .toBe('2025-01-01')
    })

    test(`${label} a month from the 31st overflows into the next month`, () => {
      expect(new CalendarDate(2024, 3, 31).subtract({ months: 1 }).toISO())
        .toBe('2024-03-02')
    })

    test(`${label} a day of seconds`, () => {
      expect(new CalendarDate(2024, 1, 1).add({ seconds: 86_400 }).toISO())
        .toBe('2024-01-02')
    })

    test(`${label} years`, () => {
      expect(new CalendarDate(2024, 2, 29).add({ years: 1 }).toISO())
        .toBe('2025-03-01')
    })
  })

  describe(`${label} replace`, () => {
    test(`${label} replacing nothing gives an equal date`, () => {
      const day = fc.record({
        year: fc.integer({ min: 1, max: 9_999 }),
        month: fc.integer({ min: 1, max: 12 }),
        day: fc.integer({ min: 1, max: 28 }),
      })

      fc.assert(fc.property(day, ({ year, month, day }) => {
        const date = new CalendarDate(year, month, day);

        expect(date.replace().equals(date))
          .toBe(true)
        expect(date.replace({ day }).equals(date))
          .toBe(true)
      }))
    })

    test(`${label} replacing the year and back gives an equal date`, () => {
      const pair = fc.record({
        year: fc.integer({ min: 1, max: 9_999 }),
        month: fc.integer({ min: 1, max: 12 }),
        day: fc.integer({ min: 1, max: 31 }),
        other: fc.integer({ min: 1, max: 9_999 }),
      })

      fc.assert(fc.property(pair, ({ year, month, day, other }) => {
        fc.pre(day <= GREGORIAN.maxDaysInMonth(year, month) && day <= GREGORIAN.maxDaysInMonth(other, month));
        const date = new CalendarDate(year, month, day);

        expect(date.replace({ year: other }).replace({ year: date.year }).equals(date))
          .toBe(true)
      }))
    })

    test(`${label} the 29th of February round-trips through another leap year`, () => {
      const date = new CalendarDate(2024, 2, 29);

      expect(date.replace({ year: 2028 }).replace({ year: 2024 }).toISO())
        .toBe('2024-02-29')
    })

    test(`${label} the 29th of February in a common year is carried`, () => {
      const date = new CalendarDate(2024, 2, 29);

      expect(date.replace({ year: 2023 }).toISO())
        .toBe('2023-03-01')
      expect(date.replace({ year: 2023 }).replace({ year: 2024 }).toISO())
        .toBe('2024-03-01')
    })

    test(`${label} replacing a field`, () => {
      expect(new CalendarDate(2024, 3, 15).replace({ month: 2, day: 30 }).toISO())
        .toBe('2024-03-01')
    })

    test(`${label} replacing the calendar keeps the days from the epoch`, () => {
      const date = new CalendarDate(2000, 1, 1, { calendar: UTC }).replace({ calendar: FAST_UTC });

      expect(date.toISO())
        .toBe('2000-01-08')
      expect(date.daysSinceEpoch())
        .toBe(10_957)
    })
  })

  describe(`${label} queries`, () => {
    test(`${label} weekday and day of year`, () => {
      const date = new CalendarDate(2024, 3, 1);

      expect([date.dayOfWeek, date.dayOfYear, date.isLeapYear, date.daysInMonth])
        .toEqual([4, 61, true, 31])
    })

    test(`${label} epoch counters`, () => {
      const date = new CalendarDate(2000, 1, 1, { calendar: UTC });

      expect([date.daysSinceEpoch(), date.leapDaysSinceEpoch(), date.leapSecsSinceEpoch(), date.secondsSinceEpoch()])
        .toEqual([10_957, 7, 27, 946_684_827])
    })
  })

  describe(`${label} zones`, () => {
    test(`${label} toUTC moves east of UTC back a day`, () => {
      const date = new CalendarDate(2024, 3, 15, { tz: TimeZone.from('Asia/Kolkata') }).toUTC();

      expect([date.toISO(), date.tz.name])
        .toEqual(['2024-03-14', 'UTC'])
    })

    test(`${label} fromUTC into a western zone`, () => {
      const date = new CalendarDate(2024, 3, 15).fromUTC(TimeZone.from('America/New_York'));

      expect([date.toISO(), date.tz.name])
        .toEqual(['2024-03-14', 'America/New_York'])
    })

    test(`${label} fromUTC into an eastern zone keeps the date`, () => {
      expect(new CalendarDate(2024, 3, 15).fromUTC(TimeZone.from('Asia/Tokyo')).toISO())
        .toBe('2024-03-15')
    })
  })

  describe(`${label} comparison`, () => {
    test(`${label} compare`, () => {
      const a = new CalendarDate(2024, 3, 15);

      expect(a.compare(new CalendarDate(2024, 3, 16)))
        .toBe(-1)
      expect(a.compare(new CalendarDate(2023, 12, 31)))
        .toBe(1)
      expect(a.compare(new CalendarDate(2024, 3, 15)))
        .toBe(0)
    })

    test(`${label} compare across calendars`, () => {
      const fast = new CalendarDate(2000, 1, 8, { calendar: FAST_UTC });

      expect(new CalendarDate(2000, 1, 1, { calendar: UTC }).compare(fast))
        .toBe(0)
    })

    test(`${label} equality includes the zone`, () => {
      expect(new CalendarDate(2024, 3, 15).equals(new CalendarDate(2024, 3, 15, { tz: TimeZone.from('Asia/Tokyo') })))
        .toBe(false)
    })
  })

  describe(`${label} codecs`, () => {
    test(`${label} hash and fromHash`, () => {
      const date = new CalendarDate(2024, 3, 15);

      expect(CalendarDate.fromHash(date.hash(HASH.UINT32)).equals(date))
        .toBe(true)
      expect(CalendarDate.fromHash(date.hash(HASH.UINT64), HASH.UINT64).equals(date))
        .toBe(true)
    })

    test(`${label} ISO strings`, () => {
      expect(CalendarDate.fromISO('2024-03-15')?.toISO('compact'))
        .toBe('20240315')
      expect(CalendarDate.fromISO('2024-02-30')?.toISO())
        .toBe('2024-03-01')
      expect(CalendarDate.fromISO('15/03/2024'))
        .toBeUndefined()
    })

    test(`${label} patterns`, () => {
      const date = CalendarDate.strptime('15 Mar 2024', 'dd mmm yyyy');

      expect(date?.strftime('www dd-mm-yyyy'))
        .toBe('Fri 15-03-2024')
      expect(CalendarDate.strptime('Mar 2024', 'mmm dd'))
        .toBeUndefined()
    })

    test(`${label} a pattern without a year gives undefined`, () => {
      expect(CalendarDate.strptime('15-03', 'dd-mm'))
        .toBeUndefined()
    })

    test(`${label} toJSON`, () => {
      expect(JSON.parse(JSON.stringify(new CalendarDate(2024, 3, 15))))
        .toEqual({ year: 2024, month: 3, day: 15, tz: 'UTC', calendar: 'gregorian' })
    })
  })
})
