import { AccessType, CsrDocumentRaw, CsrLength } from './types'

export interface CsrFieldInit {
  name: string
  msb: number
  lsb: number
  description?: string
  type?: string
  resetValue?: unknown
  alias?: string
}

function cleanDescription(desc: unknown): string {
  return typeof desc === 'string' ? desc.trim().replace(/\n/g, ' ') : ''
}

export class CsrField {
  readonly name: string
  readonly msb: number
  readonly lsb: number
  readonly description: string
  readonly type: string
  readonly resetValue?: unknown
  readonly alias: string
  private _accessType: AccessType = 'unset'
  private _legalValue?: unknown

  constructor(init: CsrFieldInit) {
    this.name = init.name
    this.msb = Math.max(init.msb, init.lsb)
    this.lsb = Math.min(init.msb, init.lsb)
    this.description = cleanDescription(init.description)
    this.type = init.type ?? ''
    this.resetValue = init.resetValue
    this.alias = init.alias ?? ''
  }

  get width(): number {
    return this.msb - this.lsb + 1
  }

  get mask(): bigint {
    return ((1n << BigInt(this.width)) - 1n) << BigInt(this.lsb)
  }

  get accessType(): AccessType {
    return this._accessType
  }

  get legalValue(): unknown {
    return this._legalValue
  }

  containsAny(mask: bigint): boolean {
    return (this.mask & mask) !== 0n
  }

  changedBits(xorMask: bigint): bigint {
    return this.mask & xorMask
  }

  /**
   * Set the access type only if none has been set yet.
   * Returns true when the field was updated.
   */
  setAccessTypeIfAbsent(accessType: AccessType, legalValue?: unknown): boolean {
    if (this._accessType !== 'unset' || accessType === 'unset') return false
    this._accessType = accessType
    this._legalValue = legalValue
    return true
  }

  toJSON() {
    return {
      name: this.name,
      msb: this.msb,
      lsb: this.lsb,
      width: this.width,
      desc: this.description,
      type: this.type,
      reset_value: this.resetValue ?? null,
      alias: this.alias,
      mask: `0x${this.mask.toString(16)}`,
      access_type: this._accessType,
      legal_value: this._legalValue ?? null,
    }
  }
}

export class CsrDefinition {
  readonly name: string
  readonly raw: CsrDocumentRaw
  readonly longName: string
  readonly length: CsrLength
  readonly description: string
  readonly writable: boolean
  readonly privMode: string
  readonly definedBy: unknown
  readonly fields: CsrField[] = []

  constructor(name: string, raw: CsrDocumentRaw) {
    this.name = name
    this.raw = raw
    this.longName = typeof raw.long_name === 'string' ? raw.long_name : ''
    // symbolic lengths such as MXLEN fall back to 64
    this.length = raw.length === 32 ? 32 : 64
    this.description = typeof raw.description === 'string' ? raw.description : ''
    this.writable = raw.writable === true
    this.privMode = typeof raw.priv_mode === 'string' ? raw.priv_mode : ''
    this.definedBy = raw.definedBy ?? {}
  }

  addField(field: CsrField): void {
    this.fields.push(field)
  }

  findField(name: string): CsrField | undefined {
    const low = name.toLowerCase()
    return this.fields.find(f => f.name.toLowerCase() === low)
  }

  toJSON() {
    return {
      name: this.name,
      long_name: this.longName,
      length: this.length,
      description: this.description,
      writable: this.writable,
      priv_mode: this.privMode,
      definedBy: this.definedBy,
      fields: this.fields.map(f => f.toJSON()),
    }
  }
}
