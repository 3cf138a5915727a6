import * as fc from 'fast-check';

import { ParameterError } from '../lib/almanac.config.js';
import { HASH } from '../lib/almanac.enum.js';
import { pack, unpack, getField, setField, bitsOf } from '../lib/hash.library.js';

const label = 'hash:';

/**
 * Test the fixed-width field packing
 */
describe(`${label}`, () => {

  test(`${label} UINT32 places year in the top twelve bits`, () => {
    const hash = pack(HASH.UINT32, { year: 2024, month: 3, day: 15, hour: 10, minute: 30 });

    expect(hash)
      .toBe(2024 * 2 ** 20 + 3 * 2 ** 16 + 15 * 2 ** 11 + 10 * 2 ** 6 + 30)
    expect(unpack(HASH.UINT32, hash))
      .toEqual({ year: 2024, month: 3, day: 15, hour: 10, minute: 30, second: 0, millisecond: 0, microsecond: 0 })
  })

  test(`${label} UINT32 drops the fields it has no budget for`, () => {
    const hash = pack(HASH.UINT32, { year: 1, second: 59, millisecond: 999 });

    expect(unpack(HASH.UINT32, hash).second)
      .toBe(0)
  })

  test(`${label} UINT64 is a bigint`, () => {
    const hash = pack(HASH.UINT64, { year: 2024, month: 12, day: 31, hour: 23, minute: 59, second: 59, millisecond: 999, microsecond: 999 });

    expect(typeof hash)
      .toBe('bigint')
    expect(unpack(HASH.UINT64, hash))
      .toEqual({ year: 2024, month: 12, day: 31, hour: 23, minute: 59, second: 59, millisecond: 999, microsecond: 999 })
  })

  test(`${label} UINT64 keeps every in-range tuple`, () => {
    const tuple = fc.record({
      year: fc.integer({ min: 0, max: 65_535 }),
      month: fc.integer({ min: 0, max: 15 }),
      day: fc.integer({ min: 0, max: 31 }),
      hour: fc.integer({ min: 0, max: 31 }),
      minute: fc.integer({ min: 0, max: 63 }),
      second: fc.integer({ min: 0, max: 63 }),
      millisecond: fc.integer({ min: 0, max: 1023 }),
      microsecond: fc.integer({ min: 0, max: 1023 }),
    })

    fc.assert(fc.property(tuple, fields => {
      expect(unpack(HASH.UINT64, pack(HASH.UINT64, fields)))
        .toEqual(fields)
    }))
  })

  test(`${label} out-of-budget values are masked, not rejected`, () => {
    expect(unpack(HASH.UINT16, pack(HASH.UINT16, { year: 5, month: 1 })).year)
      .toBe(1)
    expect(unpack(HASH.UINT8, pack(HASH.UINT8, { day: 9, hour: 33 })))
      .toEqual({ year: 0, month: 0, day: 1, hour: 1, minute: 0, second: 0, millisecond: 0, microsecond: 0 })
  })

  test(`${label} fractional values are truncated`, () => {
    expect(unpack(HASH.UINT32, pack(HASH.UINT32, { day: 7.9 })).day)
      .toBe(7)
  })

  test(`${label} getField reads one field`, () => {
    const hash = pack(HASH.UINT64, { year: 1999, minute: 42 });

    expect(getField(HASH.UINT64, hash, 'year'))
      .toBe(1999)
    expect(getField(HASH.UINT64, hash, 'minute'))
      .toBe(42)
    expect(getField(HASH.UINT8, 0xff, 'year'))
      .toBe(0)
  })

  test(`${label} setField rewrites one field and leaves the others`, () => {
    const hash = pack(HASH.UINT32, { year: 2024, month: 3, day: 15, hour: 10, minute: 30 });
    const next = setField(HASH.UINT32, hash, 'day', 1);

    expect(unpack(HASH.UINT32, next))
      .toEqual({ year: 2024, month: 3, day: 1, hour: 10, minute: 30, second: 0, millisecond: 0, microsecond: 0 })
    expect(setField(HASH.UINT32, hash, 'second', 12))
      .toBe(hash)
  })

  test(`${label} bit budgets`, () => {
    expect(bitsOf(HASH.UINT64, 'year'))
      .toBe(16)
    expect(bitsOf(HASH.UINT16, 'year'))
      .toBe(2)
    expect(bitsOf(HASH.UINT8, 'year'))
      .toBe(0)
  })

  test(`${label} an unsupported width is rejected`, () => {
    expect(() => Reflect.apply(pack, undefined, [12, {}]))
      .toThrow(ParameterError)
  })
})
