import { CsrDefinition } from './csrField'
import { compare, decodeValue, decodeXorMask, toHex } from './decoder'
import { FieldObservation } from './types'

export interface OutputSink {
  write(line: string): void
}

export interface PrinterOptions {
  json?: boolean
  compact?: boolean
}

export const consoleSink: OutputSink = {
  write: line => console.log(line),
}

function bitsLabel(f: { msb: number; lsb: number }): string {
  return f.msb !== f.lsb ? `[${f.msb}:${f.lsb}]` : `[${f.msb}]`
}

function span(f: { msb: number; lsb: number }): string {
  return `[${String(f.msb).padStart(2)}:${String(f.lsb).padStart(2)}]`
}

function wide(o: FieldObservation): string {
  return `${o.hex.padStart(6)} / ${String(o.value).padStart(3)} / ${o.bin.padStart(10)}`
}

// bigint has no JSON form; keep numbers where they are exact
function jsonInteger(v: bigint): number | string {
  return v <= BigInt(Number.MAX_SAFE_INTEGER) && v >= BigInt(Number.MIN_SAFE_INTEGER) ? Number(v) : v.toString()
}

export class CsrPrinter {
  private sink: OutputSink
  private opts: PrinterOptions

  constructor(sink: OutputSink = consoleSink, opts?: PrinterOptions) {
    this.sink = sink
    this.opts = opts || { json: false, compact: false }
  }

  printDecode(def: CsrDefinition, value: bigint): void {
    const decoded = decodeValue(def, value)
    if (this.opts.json) {
      this.writeJson({
        csr: def.name,
        value: toHex(value),
        decoded: decoded.map(o => ({
          name: o.name,
          msb: o.msb,
          lsb: o.lsb,
          width: o.width,
          value: jsonInteger(o.value),
          hex: o.hex,
          bin: o.bin,
          desc: o.description,
        })),
      })
      return
    }
    this.sink.write(`CSR: ${def.name}`)
    if (this.opts.compact) {
      this.sink.write(decoded.map(o => `${o.name}${bitsLabel(o)}=${o.bin}`).join(', '))
    } else {
      for (const o of decoded) this.sink.write(` ${o.name.padEnd(20)} ${span(o)} = ${wide(o)}`)
    }
  }

  printDiff(def: CsrDefinition, xor: bigint): void {
    const changes = decodeXorMask(def, xor)
    if (this.opts.json) {
      this.writeJson({
        csr: def.name,
        xor: toHex(xor),
        changes: changes.map(c => ({
          name: c.name,
          msb: c.msb,
          lsb: c.lsb,
          width: c.width,
          changed_mask: toHex(c.changedMask),
          changed_rel: toHex(c.changedRel),
          changed_bits_count: c.changedBitCount,
          desc: c.description,
        })),
      })
      return
    }
    this.sink.write(`CSR: ${def.name} (fields with changes)`)
    for (const c of changes) {
      const line = ` ${c.name.padEnd(20)} ${span(c)} changed_mask=${toHex(c.changedMask).padStart(10)} rel=${toHex(c.changedRel).padStart(6)} bits_changed=${String(c.changedBitCount).padStart(2)}`
      this.sink.write(c.description ? `${line}  ${c.description}` : line)
    }
  }

  printCompare(def: CsrDefinition, value1: bigint, value2: bigint): void {
    const diffs = compare(def, value1, value2)
    if (this.opts.json) {
      this.writeJson({
        csr: def.name,
        value1: toHex(value1),
        value2: toHex(value2),
        differences: diffs.map(d => ({
          field: d.name,
          value1: jsonInteger(d.first.value),
          value2: jsonInteger(d.second.value),
        })),
      })
      return
    }
    this.sink.write(`CSR: ${def.name} (field differences)`)
    if (this.opts.compact) {
      this.sink.write(diffs.map(d => `${d.name}${bitsLabel(d)}=${d.first.bin} vs ${d.second.bin}`).join(', '))
    } else {
      for (const d of diffs) {
        this.sink.write(` ${d.name.padEnd(20)} ${span(d)} = ${wide(d.first)} vs ${wide(d.second)} "${d.description}"`)
      }
    }
  }

  private writeJson(payload: unknown): void {
    this.sink.write(JSON.stringify(payload, null, 2))
  }
}
