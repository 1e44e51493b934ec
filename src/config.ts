import * as path from 'path'

export const csrSpecDir = process.env.CSR_SPEC_DIR || path.join(process.cwd(), 'spec', 'csrs')
export const csrConfigPath = process.env.CSR_CONFIG_PATH || undefined

export const logLevel = process.env.LOG_LEVEL || 'info'

// output defaults, overridden by --json / --compact
export const outputJson = process.env.CSR_OUTPUT_JSON === '1'
export const outputCompact = process.env.CSR_OUTPUT_COMPACT === '1'

// how many known register names to list when a lookup fails
export const missingCsrSampleSize = Number(process.env.CSR_MISSING_SAMPLE || 50)
