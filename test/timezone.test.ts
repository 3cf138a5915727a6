import { TimeZone, transitionDay } from '../lib/timezone.class.js';
import { Offset, TransitionRule, DstZone, ZoneInfoMem } from '../lib/zoneinfo.library.js';

const label = 'timezone:';

/** a northern zone: last Sunday of March 02:00 until the first Sunday of November 02:00 */
const north = new DstZone(
  new TransitionRule({ month: 3, dow: 6, eom: true, hour: 2 }),
  new TransitionRule({ month: 11, dow: 6, hour: 2 }),
  new Offset(1),
)
const store = new ZoneInfoMem([['Test/North', { kind: 'dst', zone: north }]]).freeze();

/**
 * Test offset resolution, with and without DST
 */
describe(`${label}`, () => {

  describe(`${label} transition days`, () => {
    test(`${label} last Sunday of March 2024`, () => {
      expect(transitionDay(north.start, 2024))
        .toBe(31)
    })

    test(`${label} first Sunday of November 2024`, () => {
      expect(transitionDay(north.end, 2024))
        .toBe(3)
    })

    test(`${label} second Sunday of March 2024`, () => {
      expect(transitionDay(new TransitionRule({ month: 3, dow: 6, week: 1, hour: 2 }), 2024))
        .toBe(10)
    })

    test(`${label} last Sunday of October 2024`, () => {
      expect(transitionDay(new TransitionRule({ month: 10, dow: 6, eom: true, hour: 2 }), 2024))
        .toBe(27)
    })
  })

  describe(`${label} a northern zone`, () => {
    const tz = TimeZone.from('Test/North', store);

    test(`${label} the record is found in the given store`, () => {
      expect([tz.name, tz.hasDst, tz.offset.minutes])
        .toEqual(['Test/North', true, 60])
      expect(tz.store)
        .toBe(store)
    })

    test(`${label} DST starts at the transition hour`, () => {
      expect(tz.offsetAt(2024, 3, 31, 1, 59))
        .toEqual({ hour: 1, minute: 0, sign: 1 })
      expect(tz.offsetAt(2024, 3, 31, 2, 0))
        .toEqual({ hour: 2, minute: 0, sign: 1 })
    })

    test(`${label} DST ends at the transition hour`, () => {
      expect(tz.offsetAt(2024, 11, 3, 1, 59))
        .toEqual({ hour: 2, minute: 0, sign: 1 })
      expect(tz.offsetAt(2024, 11, 3, 2, 0))
        .toEqual({ hour: 1, minute: 0, sign: 1 })
    })

    test(`${label} months between the transitions`, () => {
      expect(tz.minutesAt(2024, 1, 15))
        .toBe(60)
      expect(tz.minutesAt(2024, 7, 15))
        .toBe(120)
      expect(tz.minutesAt(2024, 12, 15))
        .toBe(60)
    })
  })

  describe(`${label} bundled zones`, () => {
    test(`${label} New York`, () => {
      const tz = TimeZone.from('America/New_York');

      expect(tz.offsetAt(2024, 1, 15))
        .toEqual({ hour: 5, minute: 0, sign: -1 })
      expect(tz.minutesAt(2024, 3, 10, 1, 59))
        .toBe(-300)
      expect(tz.minutesAt(2024, 3, 10, 2, 0))
        .toBe(-240)
      expect(tz.minutesAt(2024, 7, 4))
        .toBe(-240)
    })

    test(`${label} Sydney, where DST spans the year-end`, () => {
      const tz = TimeZone.from('Australia/Sydney');

      expect(tz.minutesAt(2024, 1, 15))
        .toBe(660)
      expect(tz.minutesAt(2024, 7, 15))
        .toBe(600)
      expect(tz.minutesAt(2024, 10, 6, 1, 59))
        .toBe(600)
      expect(tz.minutesAt(2024, 10, 6, 2, 0))
        .toBe(660)
    })

    test(`${label} Lord Howe moves by thirty minutes`, () => {
      const tz = TimeZone.from('Australia/Lord_Howe');

      expect(tz.offsetAt(2024, 1, 15))
        .toEqual({ hour: 11, minute: 0, sign: 1 })
      expect(tz.offsetAt(2024, 7, 15))
        .toEqual({ hour: 10, minute: 30, sign: 1 })
    })

    test(`${label} Troll moves by two hours`, () => {
      const tz = TimeZone.from('Antarctica/Troll');

      expect(tz.offsetAt(2024, 1, 15))
        .toEqual({ hour: 0, minute: 0, sign: 1 })
      expect(tz.offsetAt(2024, 7, 15))
        .toEqual({ hour: 2, minute: 0, sign: 1 })
    })

    test(`${label} fixed zones`, () => {
      expect(TimeZone.from('Asia/Kolkata').offsetAt(2024, 7, 15))
        .toEqual({ hour: 5, minute: 30, sign: 1 })
      expect(TimeZone.from('Asia/Kathmandu').minutesAt(2024, 1, 1))
        .toBe(345)
      expect(TimeZone.from('Etc/GMT+5').minutesAt(2024, 1, 1))
        .toBe(-300)
    })
  })

  test(`${label} an unknown zone falls back to UTC+00:00`, () => {
    const tz = TimeZone.from('Nowhere/Land');

    expect([tz.name, tz.hasDst, tz.minutesAt(2024, 7, 15)])
      .toEqual(['Nowhere/Land', false, 0])
  })

  test(`${label} a DST zone missing from its store reports the static offset`, () => {
    const tz = new TimeZone('Test/Missing', { offset: new Offset(3), hasDst: true, store });

    expect(tz.minutesAt(2024, 7, 15))
      .toBe(180)
  })

  test(`${label} equality and serialisation`, () => {
    expect(TimeZone.from('UTC').equals(new TimeZone()))
      .toBe(true)
    expect(TimeZone.from('UTC').equals(TimeZone.from('Europe/London')))
      .toBe(false)
    expect(JSON.stringify({ tz: TimeZone.from('Asia/Tokyo') }))
      .toBe('{"tz":"Asia/Tokyo"}')
  })
})
