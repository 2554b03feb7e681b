import type { ReaderError } from '@/shared/errors'

export type DataRecord = {
  type: 'data'
  offset: number
  value: Buffer
}

export type EndOfFileRecord = {
  type: 'end-of-file'
}

export type ExtendedSegmentAddressRecord = {
  type: 'extended-segment-address'
  base: number
}

export type StartSegmentAddressRecord = {
  type: 'start-segment-address'
  cs: number
  ip: number
}

export type ExtendedLinearAddressRecord = {
  type: 'extended-linear-address'
  base: number
}

export type StartLinearAddressRecord = {
  type: 'start-linear-address'
  address: number
}

export type IhexRecord =
  | DataRecord
  | EndOfFileRecord
  | ExtendedSegmentAddressRecord
  | StartSegmentAddressRecord
  | ExtendedLinearAddressRecord
  | StartLinearAddressRecord

export type RecordResult =
  | { success: true; record: IhexRecord; line?: number }
  | { success: false; error: ReaderError }

export type RecordSource = Iterable<RecordResult>

export type TraceEvent = {
  base: number
  record: IhexRecord
}

export type UnpackOptions = {
  trace?: (event: TraceEvent) => void
}

export type UnpackedImage<T extends Uint8Array = Buffer> = {
  image: T
  usedBytes: number
}
