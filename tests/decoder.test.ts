import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { CsrDefinition, CsrField } from '../src/csrField'
import { CsrCatalog } from '../src/csrCatalog'
import { compare, decodeValue, decodeXorMask, popcount, toBin, toHex } from '../src/decoder'

function demo(): CsrDefinition {
  const def = new CsrDefinition('demo', { kind: 'csr', name: 'demo', length: 32 })
  // schema order differs from bit order on purpose
  def.addField(new CsrField({ name: 'CNT', msb: 4, lsb: 0, description: 'Counter' }))
  def.addField(new CsrField({ name: 'EN', msb: 7, lsb: 7, description: 'Enable' }))
  def.addField(new CsrField({ name: 'MODE', msb: 6, lsb: 5, description: 'Mode' }))
  return def
}

describe('decodeValue', () => {
  it('extracts each field highest first', () => {
    expect(decodeValue(demo(), 0b10110101n)).toEqual([
      { name: 'EN', msb: 7, lsb: 7, width: 1, value: 1n, hex: '0x1', bin: '0b1', description: 'Enable' },
      { name: 'MODE', msb: 6, lsb: 5, width: 2, value: 1n, hex: '0x1', bin: '0b1', description: 'Mode' },
      { name: 'CNT', msb: 4, lsb: 0, width: 5, value: 21n, hex: '0x15', bin: '0b10101', description: 'Counter' },
    ])
  })

  it('accepts plain numbers', () => {
    expect(decodeValue(demo(), 0xb5).map(o => o.value)).toEqual([1n, 1n, 21n])
  })

  it('is deterministic and leaves the definition untouched', () => {
    const def = demo()
    const a = decodeValue(def, 0x5an)
    const b = decodeValue(def, 0x5an)
    expect(a).toEqual(b)
    expect(def.fields.map(f => f.name)).toEqual(['CNT', 'EN', 'MODE'])
  })

  it('keeps schema order for fields sharing an msb', () => {
    const def = new CsrDefinition('alias', { kind: 'csr', name: 'alias' })
    def.addField(new CsrField({ name: 'LOW', msb: 3, lsb: 0 }))
    def.addField(new CsrField({ name: 'WHOLE', msb: 3, lsb: 0 }))
    def.addField(new CsrField({ name: 'TOP', msb: 3, lsb: 3 }))
    expect(decodeValue(def, 0xfn).map(o => o.name)).toEqual(['LOW', 'WHOLE', 'TOP'])
  })

  it('decodes 64-bit values exactly', async () => {
    const catalog = new CsrCatalog()
    await catalog.load(join(process.cwd(), 'tests', 'fixtures', 'csrs'))
    const mstatus = catalog.get('mstatus')
    expect(mstatus).toBeDefined()
    if (!mstatus) return
    const decoded = decodeValue(mstatus, 0x8000000a00006000n)
    expect(decoded.map(o => [o.name, o.value])).toEqual([
      ['SD', 1n],
      ['FS', 3n],
      ['MPP', 0n],
      ['MIE', 0n],
      ['SIE', 0n],
    ])
  })

  it('reconstructs a value from fields that tile the register', () => {
    const def = new CsrDefinition('tiled', { kind: 'csr', name: 'tiled', length: 64 })
    def.addField(new CsrField({ name: 'HI', msb: 63, lsb: 40 }))
    def.addField(new CsrField({ name: 'MID', msb: 39, lsb: 8 }))
    def.addField(new CsrField({ name: 'LO', msb: 7, lsb: 0 }))
    for (const v of [0n, 1n, 0xdeadbeefcafef00dn, 0xffffffffffffffffn, 0x8000000000000000n]) {
      const sum = decodeValue(def, v).reduce((acc, o) => acc | (o.value << BigInt(o.lsb)), 0n)
      expect(sum).toBe(v)
    }
  })
})

describe('decodeXorMask', () => {
  it('reports the single field touched by a one-bit mask', () => {
    expect(decodeXorMask(demo(), 0b00100000n)).toEqual([
      { name: 'MODE', msb: 6, lsb: 5, width: 2, changedMask: 0x20n, changedRel: 0x1n, changedBitCount: 1, description: 'Mode' },
    ])
  })

  it('reports nothing for a zero mask', () => {
    expect(decodeXorMask(demo(), 0n)).toEqual([])
  })

  it('counts changed bits per field', () => {
    const changes = decodeXorMask(demo(), 0xffn)
    expect(changes.map(c => [c.name, c.changedMask, c.changedRel, c.changedBitCount])).toEqual([
      ['EN', 0x80n, 0x1n, 1],
      ['MODE', 0x60n, 0x3n, 2],
      ['CNT', 0x1fn, 0x1fn, 5],
    ])
  })

  it('ignores bits outside every field', () => {
    expect(decodeXorMask(demo(), 0xff00n)).toEqual([])
  })
})

describe('compare', () => {
  it('lists only fields whose values differ', () => {
    const diffs = compare(demo(), 0b10110101n, 0b10100101n)
    expect(diffs.length).toBe(1)
    expect(diffs[0].name).toBe('CNT')
    expect(diffs[0].first.value).toBe(21n)
    expect(diffs[0].second.value).toBe(5n)
    expect(diffs[0].second.bin).toBe('0b101')
  })

  it('returns nothing for equal values', () => {
    expect(compare(demo(), 0x5a, 0x5a)).toEqual([])
  })

  it('agrees with decodeXorMask for disjoint fields', () => {
    const def = demo()
    const pairs: Array<[bigint, bigint]> = [
      [0b10110101n, 0b10100101n],
      [0x00n, 0xffn],
      [0x80n, 0x7fn],
      [0x1234n, 0x1200n],
      [0x3cn, 0x3cn],
    ]
    for (const [a, b] of pairs) {
      const fromCompare = compare(def, a, b).map(d => d.name)
      const fromXor = decodeXorMask(def, a ^ b).map(c => c.name)
      expect(fromXor).toEqual(fromCompare)
    }
  })
})

describe('popcount', () => {
  it('counts set bits of wide values', () => {
    expect(popcount(0n)).toBe(0)
    expect(popcount(0b1011n)).toBe(3)
    expect(popcount(0xffffffffffffffffn)).toBe(64)
  })
})

describe('toHex / toBin', () => {
  it('renders the sign ahead of the prefix', () => {
    expect(toHex(0n)).toBe('0x0')
    expect(toHex(0xb5n)).toBe('0xb5')
    expect(toHex(-1n)).toBe('-0x1')
    expect(toHex(-0x1fn)).toBe('-0x1f')
    expect(toBin(5n)).toBe('0b101')
    expect(toBin(-2n)).toBe('-0b10')
  })
})
