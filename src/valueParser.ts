import { InvalidValueError } from './errors'

const LITERAL_RE = /^(-)?(0x[0-9a-f]+(?:_[0-9a-f]+)*|0b[01]+(?:_[01]+)*|0o[0-7]+(?:_[0-7]+)*|\d+(?:_\d+)*)$/i

/**
 * Parse a register value typed on the command line: `0x...`, `0b...`, `0o...`
 * or decimal, with optional `_` digit separators.
 */
export function parseValue(text: string): bigint {
  const s = text.trim()
  const m = LITERAL_RE.exec(s)
  if (!m) throw new InvalidValueError(text)
  const magnitude = BigInt(m[2].replace(/_/g, '').toLowerCase())
  return m[1] ? -magnitude : magnitude
}
