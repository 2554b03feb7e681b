import { ParsingError, UnpackingError } from '@/shared/errors'
import type { RecordSource, UnpackedImage, UnpackOptions } from '@/types'

// Unprogrammed flash reads back as 0xFF.
export const FILL_BYTE = 0xff

const SEGMENT_SHIFT = 0x10
const LINEAR_SHIFT = 0x10000

/**
 * Applies `records` to `buffer` in order and returns the number of payload bytes written.
 *
 * `buffer` must already hold the fill value. Every extended address record resets the base
 * address to the shifted value minus `baseOffset`. Processing stops at the first end-of-file
 * record, and throws on the first reader failure or on a data record that does not fit.
 * Writes made before a failure are left in place. `baseOffset` must be a non-negative integer.
 */
export function unpack(
  records: RecordSource,
  buffer: Uint8Array,
  baseOffset: number,
  options: UnpackOptions = {},
): number {
  if (!Number.isSafeInteger(baseOffset) || baseOffset < 0) {
    throw new RangeError(`Invalid base offset: ${baseOffset}`)
  }

  const capacity = buffer.length
  let baseAddress = 0
  let usedBytes = 0

  for (const result of records) {
    if (!result.success) {
      throw new ParsingError(result.error)
    }

    const record = result.record
    options.trace?.({ base: baseAddress, record })

    switch (record.type) {
      case 'data': {
        const start = baseAddress + record.offset
        const end = start + record.value.length
        if (start < 0) {
          throw new UnpackingError('address-too-low', start, capacity)
        }
        if (end > capacity) {
          throw new UnpackingError('address-too-high', end, capacity)
        }
        buffer.set(record.value, start)
        usedBytes += record.value.length
        break
      }
      case 'extended-segment-address':
        baseAddress = record.base * SEGMENT_SHIFT - baseOffset
        break
      case 'extended-linear-address':
        baseAddress = record.base * LINEAR_SHIFT - baseOffset
        break
      case 'end-of-file':
        return usedBytes
      // Program entry points don't affect the image.
      case 'start-segment-address':
      case 'start-linear-address':
        break
    }
  }

  return usedBytes
}

export function unpackToNewBuffer(
  records: RecordSource,
  binarySize: number,
  baseOffset: number,
  options?: UnpackOptions,
): UnpackedImage {
  const image = Buffer.alloc(binarySize, FILL_BYTE)
  const usedBytes = unpack(records, image, baseOffset, options)
  return { image, usedBytes }
}

export function unpackToArray(
  records: RecordSource,
  capacity: number,
  baseOffset: number,
  options?: UnpackOptions,
): UnpackedImage<Uint8Array> {
  const image = new Uint8Array(capacity).fill(FILL_BYTE)
  const usedBytes = unpack(records, image, baseOffset, options)
  return { image, usedBytes }
}
