import { CsrCatalog } from './csrCatalog'
import { CsrPrinter, consoleSink } from './csrPrinter'
import type { OutputSink } from './csrPrinter'
import { parseValue } from './valueParser'
import { csrSpecDir, csrConfigPath, logLevel, outputJson, outputCompact, missingCsrSampleSize } from './config'
import type { Diagnostic } from './types'
import { CsrSpecDirectoryError } from './errors'

const COMMANDS = ['decode', 'diff', 'compare'] as const
type Command = typeof COMMANDS[number]

const USAGE = [
  'Usage: csr-decode <command> --csr NAME [--spec DIR] [--config PATH] [--json] [--compact]',
  '  decode   --value V              decode a CSR value into bitfields',
  '  diff     --xor V                list fields touched by an XOR mask (before ^ after)',
  '  compare  --value1 V --value2 V  show fields that differ between two values',
  'Values: hex 0x..., binary 0b..., octal 0o... or decimal',
].join('\n')

function isCommand(s: string | undefined): s is Command {
  return COMMANDS.some(c => c === s)
}

export function parseArgs(argv: string[]): { positional: string[]; flags: Record<string, string | boolean> } {
  const positional: string[] = []
  const flags: Record<string, string | boolean> = {}
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    const m = a.match(/^--([^=]+)=(.*)$/)
    if (m) {
      flags[m[1]] = m[2]
    } else if (a.startsWith('--')) {
      const next = argv[i + 1]
      if (next !== undefined && !next.startsWith('--')) {
        flags[a.slice(2)] = next
        i++
      } else {
        flags[a.slice(2)] = true
      }
    } else {
      positional.push(a)
    }
  }
  return { positional, flags }
}

function describeDiagnostic(d: Diagnostic): string {
  const where = [d.register, d.field].filter(Boolean).join('.')
  return `${d.kind} ${d.file}${where ? ` (${where})` : ''}: ${d.message}`
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(argv: string[], out: OutputSink = consoleSink): Promise<number> {
  const { positional, flags } = parseArgs(argv)
  const cmd = positional[0]
  const str = (k: string) => (typeof flags[k] === 'string' ? String(flags[k]) : undefined)

  if (!isCommand(cmd) || !str('csr')) {
    console.error(USAGE)
    return 2
  }

  const specDir = str('spec') ?? csrSpecDir
  const configPath = str('config') ?? csrConfigPath
  const catalog = new CsrCatalog()
  catalog.on('diagnostic', (d: Diagnostic) => console.warn('CSR spec warning:', describeDiagnostic(d)))
  catalog.on('skipped', (file: string) => {
    if (logLevel === 'debug') console.debug('Skipping non-CSR document', file)
  })
  catalog.on('loaded', (info: { definitions: number; files: number }) => {
    if (logLevel === 'debug') console.debug('Loaded %d CSR definitions from %d files.', info.definitions, info.files)
  })

  try {
    await catalog.load(specDir)
  } catch (err) {
    if (!(err instanceof CsrSpecDirectoryError)) throw err
    console.error(err.message)
    return 2
  }
  await catalog.enrich(configPath)
  catalog.seal()

  const name = String(str('csr'))
  const csr = catalog.get(name)
  if (!csr) {
    const names = catalog.names()
    console.error(`CSR '${name}' not found under ${specDir}. Available count: ${names.length}`)
    console.error('Some available CSRs:', names.slice(0, missingCsrSampleSize).join(', '))
    return 2
  }

  const printer = new CsrPrinter(out, {
    json: flags.json === true || outputJson,
    compact: flags.compact === true || outputCompact,
  })

  try {
    switch (cmd) {
      case 'decode':
        printer.printDecode(csr, parseValue(required(str('value'), 'value')))
        break
      case 'diff':
        printer.printDiff(csr, parseValue(required(str('xor'), 'xor')))
        break
      case 'compare':
        printer.printCompare(csr, parseValue(required(str('value1'), 'value1')), parseValue(required(str('value2'), 'value2')))
        break
    }
  } catch (err) {
    console.error(err instanceof Error ? err.message : err)
    console.error(USAGE)
    return 2
  }
  return 0
}

function required(v: string | undefined, flag: string): string {
  if (v === undefined) throw new Error(`missing --${flag}`)
  return v
}
