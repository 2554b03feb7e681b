export type ReaderErrorCode =
  | 'missing-start-code'
  | 'record-too-short'
  | 'record-too-long'
  | 'record-not-even-length'
  | 'contains-invalid-characters'
  | 'checksum-mismatch'
  | 'payload-length-mismatch'
  | 'unsupported-record-type'
  | 'invalid-length-for-type'

type ReaderErrorDetails = {
  line?: number
  found?: number
  expected?: number
  recordType?: number
}

export class ReaderError extends Error {
  readonly code: ReaderErrorCode
  readonly reason: string
  readonly line?: number
  readonly found?: number
  readonly expected?: number
  readonly recordType?: number

  constructor(code: ReaderErrorCode, message: string, details: ReaderErrorDetails = {}) {
    super(details.line === undefined ? message : `Line ${details.line}: ${message}`)
    this.name = 'ReaderError'
    this.code = code
    this.reason = message
    this.line = details.line
    this.found = details.found
    this.expected = details.expected
    this.recordType = details.recordType
  }

  atLine(line: number): ReaderError {
    return new ReaderError(this.code, this.reason, {
      line,
      found: this.found,
      expected: this.expected,
      recordType: this.recordType,
    })
  }
}

export class ParsingError extends Error {
  readonly code = 'parsing'
  override readonly cause: ReaderError

  constructor(cause: ReaderError) {
    super(`Error while parsing IHEX records: ${cause.message}`)
    this.name = 'ParsingError'
    this.cause = cause
  }
}

export type UnpackingErrorKind = 'address-too-high' | 'address-too-low'

export class UnpackingError extends Error {
  readonly kind: UnpackingErrorKind
  readonly address: number
  readonly capacity: number

  constructor(kind: UnpackingErrorKind, address: number, capacity: number) {
    super(
      kind === 'address-too-high'
        ? `Address (${address}) greater than binary size (${capacity})`
        : `Address (${address}) below start of binary`,
    )
    this.name = 'UnpackingError'
    this.kind = kind
    this.address = address
    this.capacity = capacity
  }

  get code(): UnpackingErrorKind {
    return this.kind
  }
}

export type LoadErrorKind = 'failed-open' | 'failed-read' | 'parsing' | 'unpacking'

const LOAD_ERROR_MESSAGES: Record<LoadErrorKind, string> = {
  'failed-open': 'IO error when opening file',
  'failed-read': 'IO error when reading file',
  parsing: 'Error while parsing IHEX records',
  unpacking: 'Error while unpacking IHEX into array',
}

export class LoadError extends Error {
  readonly kind: LoadErrorKind
  override readonly cause: unknown

  constructor(kind: LoadErrorKind, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${LOAD_ERROR_MESSAGES[kind]}: ${detail}`)
    this.name = 'LoadError'
    this.kind = kind
    this.cause = cause
  }

  get code(): string {
    if (this.cause instanceof ReaderError) return this.cause.code
    if (this.cause instanceof UnpackingError) return this.cause.kind
    return this.kind
  }
}
