import { BitRange } from './types'
import { MalformedRangeSpecError } from './errors'

export type RangeSpec =
  | { kind: 'scalar'; bit: number }
  | { kind: 'pair'; first: number; second: number }
  | { kind: 'keyed'; high: number; low: number; highKey: string; lowKey: string }
  | { kind: 'delimitedText'; text: string; first: number; second: number }
  | { kind: 'scalarText'; text: string; bit: number }

export type RangeSpecResult =
  | { ok: true; range: BitRange }
  | { ok: false; reason: string; raw: unknown }

const HIGH_KEYS = ['msb', 'hi', 'from', 'high'] as const
const LOW_KEYS = ['lsb', 'lo', 'to', 'low'] as const

const DELIMITED_RE = /^\s*(\d+)\s*(?:\.\.|:|-)\s*(\d+)\s*$/
const SCALAR_RE = /^\s*(\d+)\s*$/

export function toBitIndex(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isSafeInteger(v) && v >= 0 ? v : undefined
  if (typeof v === 'string' && SCALAR_RE.test(v)) return Number(v)
  return undefined
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function firstKey(obj: Record<string, unknown>, keys: readonly string[]): { key: string; bit: number } | undefined {
  for (const key of keys) {
    if (!(key in obj)) continue
    const bit = toBitIndex(obj[key])
    return bit === undefined ? undefined : { key, bit }
  }
  return undefined
}

/**
 * Classify a raw schema value into one of the supported bit-range encodings.
 * Returns the reason as a string when nothing matches.
 */
export function parseRangeSpec(raw: unknown): RangeSpec | string {
  // single bit: 7
  if (typeof raw === 'number') {
    const bit = toBitIndex(raw)
    return bit === undefined ? 'bit index must be a non-negative integer' : { kind: 'scalar', bit }
  }

  // sequence form [31, 12] or [12, 31]
  if (Array.isArray(raw)) {
    if (raw.length !== 2) return `expected two bit indices, got ${raw.length}`
    const first = toBitIndex(raw[0])
    const second = toBitIndex(raw[1])
    if (first === undefined || second === undefined) return 'sequence entries must be non-negative integers'
    return { kind: 'pair', first, second }
  }

  // keyed form {msb: 31, lsb: 12}, {hi: 31, lo: 12}, {from: 31, to: 12}
  if (isRecord(raw)) {
    const high = firstKey(raw, HIGH_KEYS)
    const low = firstKey(raw, LOW_KEYS)
    if (!high || !low) return `mapping needs one of ${HIGH_KEYS.join('/')} and one of ${LOW_KEYS.join('/')}`
    return { kind: 'keyed', high: high.bit, low: low.bit, highKey: high.key, lowKey: low.key }
  }

  if (typeof raw === 'string') {
    // "31..12", "31:12", "31-12"
    const m = DELIMITED_RE.exec(raw)
    if (m) return { kind: 'delimitedText', text: raw, first: Number(m[1]), second: Number(m[2]) }
    // "7"
    const s = SCALAR_RE.exec(raw)
    if (s) return { kind: 'scalarText', text: raw, bit: Number(s[1]) }
    return 'text is neither a bit index nor a range'
  }

  return `unsupported value of type ${raw === null ? 'null' : typeof raw}`
}

function ordered(a: number, b: number): BitRange {
  return a >= b ? { msb: a, lsb: b } : { msb: b, lsb: a }
}

export function resolveRangeSpec(spec: RangeSpec): BitRange {
  switch (spec.kind) {
    case 'scalar':
    case 'scalarText':
      return { msb: spec.bit, lsb: spec.bit }
    case 'pair':
    case 'delimitedText':
      return ordered(spec.first, spec.second)
    case 'keyed':
      return ordered(spec.high, spec.low)
    default: {
      const unreachable: never = spec
      return unreachable
    }
  }
}

export function tryNormalizeRangeSpec(raw: unknown): RangeSpecResult {
  const spec = parseRangeSpec(raw)
  if (typeof spec === 'string') return { ok: false, reason: spec, raw }
  return { ok: true, range: resolveRangeSpec(spec) }
}

/**
 * Convert any supported location encoding into a canonical `(msb, lsb)` pair.
 * @throws MalformedRangeSpecError when the value matches no encoding
 */
export function normalizeRangeSpec(raw: unknown): BitRange {
  const result = tryNormalizeRangeSpec(raw)
  if (!result.ok) throw new MalformedRangeSpecError(result.raw, result.reason)
  return result.range
}
