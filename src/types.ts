export type AccessType =
  | 'unset'
  | 'warl'
  | 'wlrl'
  | 'wpri'
  | 'wiri'
  | 'ro_constant'
  | 'ro_variable'

export type CsrLength = 32 | 64

export interface BitRange {
  msb: number
  lsb: number
}

// Top-level shape of a register document; values are checked where they are read
export interface CsrDocumentRaw {
  kind: 'csr'
  name: unknown
  long_name?: unknown
  length?: unknown
  description?: unknown
  writable?: unknown
  priv_mode?: unknown
  definedBy?: unknown
  fields?: unknown
  [key: string]: unknown
}

export type DiagnosticKind =
  | 'unreadable-document'
  | 'malformed-field'
  | 'missing-location'
  | 'malformed-range'
  | 'enrichment-unavailable'

export interface Diagnostic {
  kind: DiagnosticKind
  file: string
  message: string
  register?: string
  field?: string
  raw?: unknown
}

export interface FieldObservation {
  name: string
  msb: number
  lsb: number
  width: number
  value: bigint
  hex: string
  bin: string
  description: string
}

export interface ChangesetEntry {
  name: string
  msb: number
  lsb: number
  width: number
  changedMask: bigint
  changedRel: bigint
  changedBitCount: number
  description: string
}

export interface FieldDifference {
  name: string
  msb: number
  lsb: number
  width: number
  description: string
  first: FieldObservation
  second: FieldObservation
}

export interface CatalogOptions {
  configPath?: string
}
