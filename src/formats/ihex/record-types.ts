// Record type field values from Intel's "Hexadecimal Object File Format" document.
export const RECORD_TYPE = {
  DATA: 0x00,
  END_OF_FILE: 0x01,
  EXTENDED_SEGMENT_ADDRESS: 0x02,
  START_SEGMENT_ADDRESS: 0x03,
  EXTENDED_LINEAR_ADDRESS: 0x04,
  START_LINEAR_ADDRESS: 0x05,
} as const

export type RecordTypeCode = (typeof RECORD_TYPE)[keyof typeof RECORD_TYPE]

export const MAX_PAYLOAD_LENGTH = 0xff

// byte count + 2 offset bytes + record type + checksum
export const RECORD_OVERHEAD = 5

export const START_CODE = ':'
