export { loadIhex, readIhexText } from './formats/ihex/loader'
export { checksum, iterateRecords, parseRecord } from './formats/ihex/record-reader'
export type { ReaderOptions } from './formats/ihex/record-reader'
export { RECORD_TYPE } from './formats/ihex/record-types'
export { FILL_BYTE, unpack, unpackToArray, unpackToNewBuffer } from './formats/ihex/unpacker'
export { validateIhex, validateIhexText } from './formats/ihex/validator'
export type { CheckResult, CheckStatus, ValidateResult } from './formats/ihex/validator'
export { LoadError, ParsingError, ReaderError, UnpackingError } from './shared/errors'
export type { LoadErrorKind, ReaderErrorCode, UnpackingErrorKind } from './shared/errors'
export type * from './types'
