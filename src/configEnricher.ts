import { promises as fs } from 'fs'
import * as yaml from 'js-yaml'
import { CsrDefinition, CsrField } from './csrField'
import { toBitIndex } from './rangeSpec'
import { AccessType, Diagnostic } from './types'

export interface AccessClassification {
  accessType: AccessType
  legalValue?: unknown
}

const RESERVED_HART_KEY = 'hart_ids'
const HART_PREFIX = 'hart'

// checked in this order; a descriptor is expected to carry at most one
const ACCESS_KEYS = ['warl', 'wlrl', 'wpri', 'wiri', 'ro_constant', 'ro_variable'] as const

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

/**
 * Map a `type` descriptor such as `{ warl: { legal: [...] } }` to an access type
 * and its legal-value payload.
 */
export function classifyAccessType(descriptor: unknown): AccessClassification {
  if (!isRecord(descriptor)) return { accessType: 'unset' }
  for (const key of ACCESS_KEYS) {
    if (!(key in descriptor)) continue
    const v = descriptor[key]
    switch (key) {
      case 'warl':
        return { accessType: 'warl', legalValue: isRecord(v) ? v.legal : undefined }
      case 'wpri':
      case 'wiri':
        return { accessType: key }
      default:
        return { accessType: key, legalValue: v }
    }
  }
  return { accessType: 'unset' }
}

export function selectHartEntry(doc: Record<string, unknown>): Record<string, unknown> | undefined {
  for (const [key, entry] of Object.entries(doc)) {
    if (key.startsWith(HART_PREFIX) && key !== RESERVED_HART_KEY && isRecord(entry)) return entry
  }
  return undefined
}

function selectWidthEntry(regEntry: unknown): Record<string, unknown> | undefined {
  if (!isRecord(regEntry)) return undefined
  if (isRecord(regEntry.rv64)) return regEntry.rv64
  if (isRecord(regEntry.rv32)) return regEntry.rv32
  return undefined
}

function bitOr(v: unknown, fallback: number): number {
  return toBitIndex(v) ?? fallback
}

// fields may be listed as names, { name, type } objects, single-key { NAME: descriptor }
// mappings, or a mapping of name -> descriptor
function fieldDescriptors(sub: Record<string, unknown>): Array<[string, unknown]> {
  const fields = sub.fields
  if (isRecord(fields)) return Object.entries(fields)
  if (!Array.isArray(fields)) return []
  const out: Array<[string, unknown]> = []
  for (const item of fields) {
    if (typeof item === 'string') {
      out.push([item, sub[item]])
    } else if (isRecord(item) && typeof item.name === 'string') {
      out.push([item.name, item])
    } else if (isRecord(item)) {
      const keys = Object.keys(item)
      if (keys.length === 1) out.push([keys[0], item[keys[0]]])
    }
  }
  return out
}

function applyToRegister(def: CsrDefinition, sub: Record<string, unknown>): void {
  if (sub.type !== undefined) {
    const { accessType, legalValue } = classifyAccessType(sub.type)
    if (def.fields.length === 0) {
      const field = new CsrField({
        name: def.name,
        msb: bitOr(sub.msb, def.length - 1),
        lsb: bitOr(sub.lsb, 0),
        description: def.longName,
      })
      field.setAccessTypeIfAbsent(accessType, legalValue)
      def.addField(field)
    } else {
      for (const f of def.fields) f.setAccessTypeIfAbsent(accessType, legalValue)
    }
  }

  for (const [fieldName, descriptor] of fieldDescriptors(sub)) {
    if (!isRecord(descriptor) || descriptor.type === undefined) continue
    const field = def.findField(fieldName)
    if (!field) continue
    const { accessType, legalValue } = classifyAccessType(descriptor.type)
    field.setAccessTypeIfAbsent(accessType, legalValue)
  }
}

async function readConfig(configPath: string): Promise<unknown> {
  const txt = await fs.readFile(configPath, 'utf8')
  if (configPath.endsWith('.json')) return JSON.parse(txt)
  return yaml.load(txt, { filename: configPath, json: true })
}

/**
 * Merge access types and legal values from a hart configuration document into
 * `table` in place. Already-set access types are never overwritten.
 */
export async function enrichDefinitions(
  table: Map<string, CsrDefinition>,
  configPath?: string,
  onWarning?: (d: Diagnostic) => void,
): Promise<void> {
  if (!configPath) return

  let doc: unknown
  try {
    doc = await readConfig(configPath)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return
    onWarning?.({
      kind: 'enrichment-unavailable',
      file: configPath,
      message: err instanceof Error ? err.message : String(err),
    })
    return
  }

  if (!isRecord(doc)) {
    onWarning?.({ kind: 'enrichment-unavailable', file: configPath, message: 'configuration must be a mapping keyed by hart' })
    return
  }

  const hart = selectHartEntry(doc)
  if (!hart) return

  for (const [name, regEntry] of Object.entries(hart)) {
    const def = table.get(name)
    if (!def) continue
    const sub = selectWidthEntry(regEntry)
    if (sub) applyToRegister(def, sub)
  }
}
