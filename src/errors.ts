export class MalformedRangeSpecError extends Error {
  constructor(readonly raw: unknown, readonly reason: string) {
    super(`Unrecognized bit range ${describeRaw(raw)}: ${reason}`)
    this.name = 'MalformedRangeSpecError'
  }
}

export class CsrSpecDirectoryError extends Error {
  constructor(readonly directory: string, cause: unknown) {
    super(`Cannot read CSR spec directory '${directory}': ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'CsrSpecDirectoryError'
  }
}

export class CatalogSealedError extends Error {
  constructor(operation: string) {
    super(`CSR catalog is sealed; cannot ${operation}`)
    this.name = 'CatalogSealedError'
  }
}

export class InvalidValueError extends Error {
  constructor(readonly text: string) {
    super(`Invalid integer value '${text}' (expected hex 0x..., binary 0b..., octal 0o... or decimal)`)
    this.name = 'InvalidValueError'
  }
}

function describeRaw(raw: unknown): string {
  if (typeof raw === 'string') return `'${raw}'`
  try {
    return JSON.stringify(raw) ?? String(raw)
  } catch {
    return String(raw)
  }
}
