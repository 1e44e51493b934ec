#!/usr/bin/env node
import { main } from './cli'

export { CsrCatalog, loadCsrCatalog } from './csrCatalog'
export type { LoadResult } from './csrCatalog'
export { CsrDefinition, CsrField } from './csrField'
export type { CsrFieldInit } from './csrField'
export { normalizeRangeSpec, tryNormalizeRangeSpec, parseRangeSpec, resolveRangeSpec } from './rangeSpec'
export type { RangeSpec, RangeSpecResult } from './rangeSpec'
export { enrichDefinitions, classifyAccessType } from './configEnricher'
export type { AccessClassification } from './configEnricher'
export { decodeValue, decodeXorMask, compare, popcount } from './decoder'
export { parseValue } from './valueParser'
export { CsrPrinter } from './csrPrinter'
export type { OutputSink, PrinterOptions } from './csrPrinter'
export * from './errors'
export type * from './types'

export { main, parseArgs } from './cli'

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(err => {
      console.error(err)
      process.exit(1)
    })
}
