import { promises as fs } from 'fs'
import { EventEmitter } from 'events'
import * as path from 'path'
import * as yaml from 'js-yaml'
import { CsrDefinition, CsrField } from './csrField'
import { tryNormalizeRangeSpec } from './rangeSpec'
import { enrichDefinitions } from './configEnricher'
import { CatalogSealedError, CsrSpecDirectoryError } from './errors'
import { CatalogOptions, CsrDocumentRaw, Diagnostic } from './types'

const SCHEMA_EXTENSIONS = ['.yml', '.yaml', '.json']

// location keys in lookup order; width selection does not follow the requested XLEN
const LOCATION_KEYS = ['location', 'location_rv64', 'location_rv32'] as const

export interface LoadResult {
  definitions: Map<string, CsrDefinition>
  diagnostics: Diagnostic[]
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isCsrDocument(doc: unknown): doc is CsrDocumentRaw {
  return isRecord(doc) && doc.kind === 'csr' && doc.name !== undefined && doc.name !== null
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function parseDocument(file: string): Promise<unknown> {
  const txt = await fs.readFile(file, 'utf8')
  if (file.endsWith('.json')) return JSON.parse(txt)
  // json: repeated keys keep the last value instead of failing the document
  return yaml.load(txt, { filename: file, json: true })
}

function selectLocation(entry: Record<string, unknown>): unknown {
  for (const key of LOCATION_KEYS) {
    const loc = entry[key]
    if (loc !== undefined && loc !== null) return loc
  }
  return undefined
}

export class CsrCatalog extends EventEmitter {
  private byName: Map<string, CsrDefinition> = new Map()
  private diagnostics: Diagnostic[] = []
  private sealed = false

  async load(dir: string): Promise<LoadResult> {
    if (this.sealed) throw new CatalogSealedError('load')

    let entries: string[]
    try {
      const dirents = await fs.readdir(dir, { withFileTypes: true })
      entries = dirents
        // symlinks are kept; a link to something unreadable fails at parse time
        .filter(d => (d.isFile() || d.isSymbolicLink()) && SCHEMA_EXTENSIONS.includes(path.extname(d.name)))
        .map(d => d.name)
        .sort()
    } catch (err) {
      throw new CsrSpecDirectoryError(dir, err)
    }

    const newMap = new Map<string, CsrDefinition>()
    const diagnostics: Diagnostic[] = []
    const report = (d: Diagnostic) => {
      diagnostics.push(d)
      this.emit('diagnostic', d)
    }

    for (const entry of entries) {
      const file = path.join(dir, entry)
      let doc: unknown
      try {
        doc = await parseDocument(file)
      } catch (err) {
        report({ kind: 'unreadable-document', file, message: errorMessage(err) })
        continue
      }
      // other document kinds share the directory
      if (!isCsrDocument(doc)) {
        this.emit('skipped', file)
        continue
      }
      const def = this.buildDefinition(doc, file, report)
      newMap.set(def.name, def)
    }

    this.byName = newMap
    this.diagnostics = diagnostics
    this.emit('loaded', { definitions: newMap.size, files: entries.length })
    return { definitions: newMap, diagnostics }
  }

  private buildDefinition(doc: CsrDocumentRaw, file: string, report: (d: Diagnostic) => void): CsrDefinition {
    const name = String(doc.name)
    const def = new CsrDefinition(name, doc)
    const fieldsObj = doc.fields ?? {}

    if (!isRecord(fieldsObj)) {
      report({ kind: 'malformed-field', file, register: name, message: '`fields` must be a mapping of field name to descriptor', raw: fieldsObj })
      return def
    }

    for (const [fieldName, fieldData] of Object.entries(fieldsObj)) {
      if (!isRecord(fieldData)) {
        report({ kind: 'malformed-field', file, register: name, field: fieldName, message: 'field descriptor must be a mapping', raw: fieldData })
        continue
      }
      const loc = selectLocation(fieldData)
      if (loc === undefined) {
        report({ kind: 'missing-location', file, register: name, field: fieldName, message: 'no location, location_rv64 or location_rv32' })
        continue
      }
      const result = tryNormalizeRangeSpec(loc)
      if (!result.ok) {
        report({ kind: 'malformed-range', file, register: name, field: fieldName, message: result.reason, raw: result.raw })
        continue
      }
      def.addField(new CsrField({
        name: fieldName,
        msb: result.range.msb,
        lsb: result.range.lsb,
        description: typeof fieldData.description === 'string' ? fieldData.description : '',
        type: typeof fieldData.type === 'string' ? fieldData.type : '',
        resetValue: fieldData.reset_value,
        alias: typeof fieldData.alias === 'string' ? fieldData.alias : '',
      }))
    }
    return def
  }

  /**
   * Merge access types from a hart configuration file into the loaded definitions.
   * Unreadable sources are reported as diagnostics; a missing path is ignored.
   */
  async enrich(configPath?: string): Promise<void> {
    if (this.sealed) throw new CatalogSealedError('enrich')
    await enrichDefinitions(this.byName, configPath, d => {
      this.diagnostics.push(d)
      this.emit('diagnostic', d)
    })
    this.emit('enriched')
  }

  /** Freeze the catalog; further load or enrich calls throw. */
  seal(): this {
    this.sealed = true
    return this
  }

  get isSealed(): boolean {
    return this.sealed
  }

  get(name: string): CsrDefinition | undefined {
    const exact = this.byName.get(name)
    if (exact) return exact
    const low = name.toLowerCase()
    for (const [k, v] of this.byName) {
      if (k.toLowerCase() === low) return v
    }
    return undefined
  }

  listAll(): CsrDefinition[] {
    return Array.from(this.byName.values())
  }

  names(): string[] {
    return Array.from(this.byName.keys())
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.diagnostics]
  }
}

export async function loadCsrCatalog(dir: string, opts?: CatalogOptions) {
  const catalog = new CsrCatalog()
  await catalog.load(dir)
  await catalog.enrich(opts?.configPath)
  return catalog.seal()
}
