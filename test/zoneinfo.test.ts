import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { Almanac, ParameterError } from '../lib/almanac.config.js';
import { Offset, TransitionRule, DstZone, ZoneInfoMem, ZoneInfoFile } from '../lib/zoneinfo.library.js';

const label = 'zoneinfo:';

const lastSunMar = new TransitionRule({ month: 3, dow: 6, eom: true, hour: 1 });
const lastSunOct = new TransitionRule({ month: 10, dow: 6, eom: true, hour: 2 });

/**
 * Test the packed zone records and the zone stores
 */
describe(`${label}`, () => {

  afterEach(() => {
    Almanac.init();
    vi.restoreAllMocks();
  })

  describe(`${label} Offset`, () => {
    test(`${label} packs sign, hour, minute-code and irregular`, () => {
      expect(new Offset(5, 30).byte)
        .toBe(0b0_0101_01_0)
      expect(new Offset(3, 30, -1).byte)
        .toBe(0b1_0011_01_0)
      expect(new Offset(10, 30, 1, true).byte)
        .toBe(0b0_1010_01_1)
    })

    test(`${label} accessors`, () => {
      const offset = new Offset(5, 45, -1);

      expect([offset.sign, offset.hour, offset.minute, offset.irregular, offset.minutes])
        .toEqual([-1, 5, 45, false, -345])
      expect(offset.toString())
        .toBe('-05:45')
    })

    test(`${label} fromByte restores the offset`, () => {
      expect(Offset.fromByte(new Offset(9, 30).byte).equals(new Offset(9, 30)))
        .toBe(true)
    })

    test(`${label} invalid arguments are rejected`, () => {
      expect(() => new Offset(16))
        .toThrow(ParameterError)
      expect(() => new Offset(1, 15))
        .toThrow(ParameterError)
      expect(() => new Offset(1, 0, 0))
        .toThrow(ParameterError)
      expect(() => Offset.fromByte(0b110))
        .toThrow(ParameterError)
      expect(() => Offset.fromByte(256))
        .toThrow(ParameterError)
    })

    test(`${label} fromMinutes`, () => {
      expect(Offset.fromMinutes(-300)?.toString())
        .toBe('-05:00')
      expect(Offset.fromMinutes(345)?.toString())
        .toBe('+05:45')
      expect(Offset.fromMinutes(20))
        .toBeUndefined()
      expect(Offset.fromMinutes(16 * 60))
        .toBeUndefined()
    })

    test(`${label} DST delta`, () => {
      expect(new Offset(1).dstDelta)
        .toBe(60)
      expect(new Offset(10, 30, 1, true).dstDelta)
        .toBe(30)
      expect(new Offset(0, 0, 1, true).dstDelta)
        .toBe(120)
    })
  })

  describe(`${label} TransitionRule`, () => {
    test(`${label} packs month, dow, eom, week and hour-code`, () => {
      expect(lastSunMar.bits)
        .toBe((3 << 8) | (6 << 5) | (1 << 4) | 5)
    })

    test(`${label} accessors`, () => {
      const rule = new TransitionRule({ month: 11, dow: 6, week: 1, hour: 22 });

      expect([rule.month, rule.dow, rule.eom, rule.week, rule.hour])
        .toEqual([11, 6, false, 1, 22])
      expect(rule.toString())
        .toBe('2nd Sun of month 11 at 22:00')
      expect(lastSunMar.toString())
        .toBe('last Sun of month 3 at 01:00')
    })

    test(`${label} fromBits restores the rule`, () => {
      expect(TransitionRule.fromBits(lastSunOct.bits).equals(lastSunOct))
        .toBe(true)
    })

    test(`${label} invalid arguments are rejected`, () => {
      expect(() => new TransitionRule({ month: 13, dow: 0, hour: 2 }))
        .toThrow(ParameterError)
      expect(() => new TransitionRule({ month: 3, dow: 7, hour: 2 }))
        .toThrow(ParameterError)
      expect(() => new TransitionRule({ month: 3, dow: 6, week: 2, hour: 2 }))
        .toThrow(ParameterError)
      expect(() => new TransitionRule({ month: 3, dow: 6, hour: 4 }))
        .toThrow(ParameterError)
    })
  })

  describe(`${label} DstZone`, () => {
    test(`${label} packs into an unsigned 32-bit word`, () => {
      const zone = new DstZone(lastSunMar, lastSunOct, new Offset(0));

      expect(zone.bits)
        .toBe(lastSunMar.bits * 2 ** 20 + lastSunOct.bits * 2 ** 8)
      expect(DstZone.fromBits(zone.bits).equals(zone))
        .toBe(true)
    })

    test(`${label} a negative offset sets the top byte bit only`, () => {
      const zone = new DstZone(lastSunMar, lastSunOct, new Offset(5, 0, -1));

      expect(zone.bits & 0xff)
        .toBe(0b1_0101_00_0)
      expect(DstZone.fromBits(zone.bits).offset.minutes)
        .toBe(-300)
    })
  })

  describe(`${label} ZoneInfoMem`, () => {
    test(`${label} add, get, has and names`, () => {
      const mem = new ZoneInfoMem()
        .add('Test/Fixed', { kind: 'fixed', offset: new Offset(2) });

      expect(mem.has('Test/Fixed'))
        .toBe(true)
      expect(mem.get('Test/Fixed'))
        .toEqual({ kind: 'fixed', offset: new Offset(2) })
      expect(mem.get('Test/Missing'))
        .toBeUndefined()
      expect(mem.names())
        .toEqual(['Test/Fixed'])
      expect(mem.size)
        .toBe(1)
    })

    test(`${label} a frozen store rejects additions`, () => {
      const mem = new ZoneInfoMem().freeze();

      expect(mem.isFrozen)
        .toBe(true)
      expect(() => mem.add('Test/Fixed', { kind: 'fixed', offset: new Offset(2) }))
        .toThrow(ParameterError)
    })
  })

  describe(`${label} ZoneInfoFile`, () => {
    const store = new ZoneInfoMem([
      ['Test/Fixed', { kind: 'fixed', offset: new Offset(5, 30) }],
      ['Test/Dst', { kind: 'dst', zone: new DstZone(lastSunMar, lastSunOct, new Offset(1)) }],
    ])

    test(`${label} encode lays out tag, name and payload`, () => {
      const buf = ZoneInfoFile.encode(new ZoneInfoMem([['A', { kind: 'fixed', offset: new Offset(5, 30) }]]));

      expect([...buf])
        .toEqual([0, 1, 65, new Offset(5, 30).byte])
    })

    test(`${label} decode restores every record`, () => {
      const mem = ZoneInfoFile.decode(ZoneInfoFile.encode(store));

      expect(mem?.names())
        .toEqual(['Test/Fixed', 'Test/Dst'])
      expect(mem?.get('Test/Dst'))
        .toEqual(store.get('Test/Dst'))
    })

    test(`${label} truncated or unknown records are rejected`, () => {
      expect(() => ZoneInfoFile.decode(Buffer.from([0, 1, 65])))
        .toThrow(ParameterError)
      expect(() => ZoneInfoFile.decode(Buffer.from([9, 0])))
        .toThrow(ParameterError)
    })

    test(`${label} with catch, a truncated record is reported as undefined`, () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => void 0);
      Almanac.init({ catch: true });

      expect(ZoneInfoFile.decode(Buffer.from([1, 1, 65, 0])))
        .toBeUndefined()
      expect(warn)
        .toHaveBeenCalledWith('ZoneInfoFile.truncated record "A"')
    })

    test(`${label} a reserved minute-code is rejected`, () => {
      expect(() => ZoneInfoFile.decode(Buffer.from([0, 1, 65, 0b110])))
        .toThrow('ZoneInfoFile: Offset: minute-code 3 is reserved')
    })

    test(`${label} with catch, a reserved minute-code is reported as undefined`, () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => void 0);
      Almanac.init({ catch: true });

      expect(ZoneInfoFile.decode(Buffer.from([0, 1, 65, 0b110])))
        .toBeUndefined()
      expect(warn)
        .toHaveBeenCalledWith('ZoneInfoFile.Offset: minute-code 3 is reserved')
    })

    test(`${label} with catch, a bad rule inside a zone is reported as undefined`, () => {
      vi.spyOn(console, 'warn').mockImplementation(() => void 0);
      Almanac.init({ catch: true });

      const buf = Buffer.from([1, 1, 65, 0, 0, 0, 0]);
      buf.writeUInt32BE((lastSunOct.bits << 8) | new Offset(1).byte, 3);				// the start rule is all zero: month 0

      expect(ZoneInfoFile.decode(buf))
        .toBeUndefined()
    })

    test(`${label} save then open`, async () => {
      const dir = await mkdtemp(join(tmpdir(), 'zoneinfo-'));
      const path = join(dir, 'zones.bin');

      try {
        await ZoneInfoFile.save(path, store);
        const file = await ZoneInfoFile.open(path);

        expect(file?.path)
          .toBe(path)
        expect(file?.get('Test/Fixed'))
          .toEqual(store.get('Test/Fixed'))
        expect(file?.has('Test/Dst'))
          .toBe(true)
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    })

    test(`${label} a missing file is rejected`, async () => {
      await expect(ZoneInfoFile.open(join(tmpdir(), 'no-such-dir', 'zones.bin')))
        .rejects.toThrow(ParameterError)
    })
  })
})
