import { CsrDefinition, CsrField } from './csrField'
import { ChangesetEntry, FieldDifference, FieldObservation } from './types'

function byMsbDescending(def: CsrDefinition): CsrField[] {
  // copy first; Array#sort is stable so equal msb keeps schema order
  return [...def.fields].sort((a, b) => b.msb - a.msb)
}

export function popcount(v: bigint): number {
  let n = v < 0n ? -v : v
  let count = 0
  while (n > 0n) {
    if (n & 1n) count++
    n >>= 1n
  }
  return count
}

// sign goes before the radix prefix: -0x1, not 0x-1
export function toHex(v: bigint): string {
  return v < 0n ? `-0x${(-v).toString(16)}` : `0x${v.toString(16)}`
}

export function toBin(v: bigint): string {
  return v < 0n ? `-0b${(-v).toString(2)}` : `0b${v.toString(2)}`
}

/**
 * Split `value` into its fields, highest field first.
 */
export function decodeValue(def: CsrDefinition, value: bigint | number): FieldObservation[] {
  const v = BigInt(value)
  return byMsbDescending(def).map(f => {
    const raw = (v & f.mask) >> BigInt(f.lsb)
    return {
      name: f.name,
      msb: f.msb,
      lsb: f.lsb,
      width: f.width,
      value: raw,
      hex: toHex(raw),
      bin: toBin(raw),
      description: f.description,
    }
  })
}

/**
 * Given `before ^ after`, list the fields with at least one changed bit.
 */
export function decodeXorMask(def: CsrDefinition, xorValue: bigint | number): ChangesetEntry[] {
  const xor = BigInt(xorValue)
  const out: ChangesetEntry[] = []
  for (const f of byMsbDescending(def)) {
    const changed = f.changedBits(xor)
    if (changed === 0n) continue
    out.push({
      name: f.name,
      msb: f.msb,
      lsb: f.lsb,
      width: f.width,
      changedMask: changed,
      changedRel: changed >> BigInt(f.lsb),
      changedBitCount: popcount(changed),
      description: f.description,
    })
  }
  return out
}

export function compare(def: CsrDefinition, valueA: bigint | number, valueB: bigint | number): FieldDifference[] {
  const first = decodeValue(def, valueA)
  const second = decodeValue(def, valueB)
  const out: FieldDifference[] = []
  first.forEach((a, i) => {
    const b = second[i]
    if (a.value === b.value) return
    out.push({
      name: a.name,
      msb: a.msb,
      lsb: a.lsb,
      width: a.width,
      description: a.description,
      first: a,
      second: b,
    })
  })
  return out
}
