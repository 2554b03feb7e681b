import { describe, expect, it } from 'vitest'
import { dataLine, EOF_LINE, segmentLine } from './test-helpers'
import { FILL_BYTE, iterateRecords, UnpackingError, unpackToNewBuffer } from './index'

describe('package entry', () => {
  it('unpacks text through the lazy reader', () => {
    const text = [segmentLine(0x0001), dataLine(0, [0x12, 0x34]), EOF_LINE].join('\n')

    const { image, usedBytes } = unpackToNewBuffer(iterateRecords(text), 0x12, 0)

    expect(usedBytes).toBe(2)
    expect(image[0x10]).toBe(0x12)
    expect(image[0x11]).toBe(0x34)
    expect(image[0]).toBe(FILL_BYTE)
  })

  it('exports the error classes', () => {
    const text = [dataLine(0x20, [0x01]), EOF_LINE].join('\n')

    expect(() => unpackToNewBuffer(iterateRecords(text), 0x20, 0)).toThrow(UnpackingError)
  })
})
