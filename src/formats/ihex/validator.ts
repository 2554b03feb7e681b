import type { IhexRecord } from '@/types'
import { readIhexText } from './loader'
import { iterateRecords } from './record-reader'

export type CheckStatus = 'pass' | 'fail' | 'warn' | 'skip'

export type CheckResult = {
  name: string
  status: CheckStatus
  message?: string
  details?: Record<string, unknown>
}

export type ValidateResult = {
  valid: boolean
  file: string
  checks: CheckResult[]
}

export type AddressRange = {
  start: number
  end: number
  line?: number
}

export async function validateIhex(filePath: string): Promise<ValidateResult> {
  const text = await readIhexText(filePath)
  const checks = validateIhexText(text)
  return {
    valid: checks.every((c) => c.status !== 'fail'),
    file: filePath,
    checks,
  }
}

export function validateIhexText(text: string): CheckResult[] {
  const records: Array<{ line?: number; record: IhexRecord }> = []
  const errors: Array<{ line?: number; code: string; message: string }> = []

  for (const result of iterateRecords(text, { stopAfterFirstError: false, stopAfterEof: false })) {
    if (result.success) {
      records.push({ line: result.line, record: result.record })
    } else {
      errors.push({ line: result.error.line, code: result.error.code, message: result.error.reason })
    }
  }

  return [checkRecords(errors), checkEndOfFile(records), checkTrailingRecords(records), checkOverlaps(records)]
}

function checkRecords(errors: Array<{ line?: number; code: string; message: string }>): CheckResult {
  if (errors.length === 0) {
    return { name: 'records', status: 'pass' }
  }
  return {
    name: 'records',
    status: 'fail',
    message: `${errors.length} malformed record(s)`,
    details: { errors },
  }
}

function checkEndOfFile(records: Array<{ line?: number; record: IhexRecord }>): CheckResult {
  const eof = records.find((r) => r.record.type === 'end-of-file')
  if (!eof) {
    return { name: 'end-of-file', status: 'warn', message: 'No end-of-file record' }
  }
  return { name: 'end-of-file', status: 'pass', details: { line: eof.line } }
}

function checkTrailingRecords(records: Array<{ line?: number; record: IhexRecord }>): CheckResult {
  const eofIndex = records.findIndex((r) => r.record.type === 'end-of-file')
  if (eofIndex === -1) {
    return { name: 'trailing-records', status: 'skip' }
  }

  const trailing = records.length - eofIndex - 1
  if (trailing > 0) {
    return {
      name: 'trailing-records',
      status: 'warn',
      message: `${trailing} record(s) after end-of-file are ignored`,
      details: { firstLine: records[eofIndex + 1].line },
    }
  }
  return { name: 'trailing-records', status: 'pass' }
}

function checkOverlaps(records: Array<{ line?: number; record: IhexRecord }>): CheckResult {
  const ranges = resolveDataRanges(records)
  const overlaps = findOverlaps(ranges)
  if (overlaps.length === 0) {
    return { name: 'overlaps', status: 'pass' }
  }
  return {
    name: 'overlaps',
    status: 'warn',
    message: `${overlaps.length} overlapping data record(s); later records overwrite earlier ones`,
    details: { overlaps },
  }
}

// Absolute address ranges of data records up to the first end-of-file, with no base offset.
export function resolveDataRanges(records: Array<{ line?: number; record: IhexRecord }>): AddressRange[] {
  const ranges: AddressRange[] = []
  let base = 0

  for (const { line, record } of records) {
    if (record.type === 'end-of-file') break
    if (record.type === 'extended-segment-address') base = record.base * 0x10
    if (record.type === 'extended-linear-address') base = record.base * 0x10000
    if (record.type === 'data' && record.value.length > 0) {
      const start = base + record.offset
      ranges.push({ start, end: start + record.value.length, line })
    }
  }

  return ranges
}

export function findOverlaps(ranges: AddressRange[]): Array<{ first: AddressRange; second: AddressRange }> {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end)
  const overlaps: Array<{ first: AddressRange; second: AddressRange }> = []
  let furthest: AddressRange | undefined

  for (const range of sorted) {
    if (furthest && range.start < furthest.end) {
      overlaps.push({ first: furthest, second: range })
    }
    if (!furthest || range.end > furthest.end) {
      furthest = range
    }
  }

  return overlaps
}
