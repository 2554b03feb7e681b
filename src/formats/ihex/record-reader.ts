import { ReaderError } from '@/shared/errors'
import type { IhexRecord, RecordResult } from '@/types'
import { MAX_PAYLOAD_LENGTH, RECORD_OVERHEAD, RECORD_TYPE, START_CODE } from './record-types'

export type ReaderOptions = {
  stopAfterFirstError?: boolean
  stopAfterEof?: boolean
}

const HEX_PATTERN = /^[0-9a-fA-F]*$/

export function checksum(bytes: Uint8Array): number {
  let sum = 0
  for (const byte of bytes) {
    sum = (sum + byte) & 0xff
  }
  return (0x100 - sum) & 0xff
}

export function parseRecord(line: string): IhexRecord {
  if (!line.startsWith(START_CODE)) {
    throw new ReaderError('missing-start-code', 'Record does not start with a colon')
  }

  const hex = line.slice(1)
  if (hex.length < RECORD_OVERHEAD * 2) {
    throw new ReaderError('record-too-short', `Record is too short (${hex.length} characters)`)
  }
  if (hex.length > (MAX_PAYLOAD_LENGTH + RECORD_OVERHEAD) * 2) {
    throw new ReaderError('record-too-long', `Record is too long (${hex.length} characters)`)
  }
  if (hex.length % 2 !== 0) {
    throw new ReaderError('record-not-even-length', 'Record has an odd number of hex characters')
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new ReaderError('contains-invalid-characters', 'Record contains non-hex characters')
  }

  const bytes = Buffer.from(hex, 'hex')
  const expected = bytes[bytes.length - 1]
  const found = checksum(bytes.subarray(0, bytes.length - 1))
  if (found !== expected) {
    throw new ReaderError(
      'checksum-mismatch',
      `Checksum mismatch (computed 0x${hex2(found)}, record says 0x${hex2(expected)})`,
      { found, expected },
    )
  }

  const length = bytes[0]
  const payload = bytes.subarray(4, bytes.length - 1)
  if (payload.length !== length) {
    throw new ReaderError(
      'payload-length-mismatch',
      `Payload length ${payload.length} does not match byte count ${length}`,
    )
  }

  const offset = bytes.readUInt16BE(1)
  const recordType = bytes[3]

  switch (recordType) {
    case RECORD_TYPE.DATA:
      return { type: 'data', offset, value: Buffer.from(payload) }
    case RECORD_TYPE.END_OF_FILE:
      expectLength(recordType, payload, 0)
      return { type: 'end-of-file' }
    case RECORD_TYPE.EXTENDED_SEGMENT_ADDRESS:
      expectLength(recordType, payload, 2)
      return { type: 'extended-segment-address', base: payload.readUInt16BE(0) }
    case RECORD_TYPE.START_SEGMENT_ADDRESS:
      expectLength(recordType, payload, 4)
      return { type: 'start-segment-address', cs: payload.readUInt16BE(0), ip: payload.readUInt16BE(2) }
    case RECORD_TYPE.EXTENDED_LINEAR_ADDRESS:
      expectLength(recordType, payload, 2)
      return { type: 'extended-linear-address', base: payload.readUInt16BE(0) }
    case RECORD_TYPE.START_LINEAR_ADDRESS:
      expectLength(recordType, payload, 4)
      return { type: 'start-linear-address', address: payload.readUInt32BE(0) }
    default:
      throw new ReaderError('unsupported-record-type', `Unsupported record type 0x${hex2(recordType)}`, {
        recordType,
      })
  }
}

export function* iterateRecords(text: string, options: ReaderOptions = {}): Generator<RecordResult> {
  const stopAfterFirstError = options.stopAfterFirstError ?? true
  const stopAfterEof = options.stopAfterEof ?? true
  const lines = text.split('\n')

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim()
    if (line === '') {
      continue
    }

    let record: IhexRecord
    try {
      record = parseRecord(line)
    } catch (e) {
      if (!(e instanceof ReaderError)) {
        throw e
      }
      yield { success: false, error: e.atLine(i + 1) }
      if (stopAfterFirstError) {
        return
      }
      continue
    }

    yield { success: true, record, line: i + 1 }
    if (stopAfterEof && record.type === 'end-of-file') {
      return
    }
  }
}

function expectLength(recordType: number, payload: Buffer, length: number): void {
  if (payload.length !== length) {
    throw new ReaderError(
      'invalid-length-for-type',
      `Record type 0x${hex2(recordType)} needs ${length} payload bytes, got ${payload.length}`,
      { recordType },
    )
  }
}

function hex2(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0')
}
