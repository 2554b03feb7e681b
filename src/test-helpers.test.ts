import { describe, expect, it } from 'vitest'
import { parseRecord } from '@/formats/ihex/record-reader'
import { dataLine, EOF_LINE, linearLine, segmentLine } from './test-helpers'

describe('test helpers', () => {
  it('builds an end-of-file line', () => {
    expect(EOF_LINE).toBe(':00000001FF')
  })

  it('builds data lines with a valid checksum', () => {
    expect(dataLine(0x30, [0x02, 0x33, 0x7a])).toBe(':0300300002337A1E')
  })

  it('builds extended address lines the reader accepts', () => {
    expect(linearLine(0x0800)).toBe(':020000040800F2')
    expect(parseRecord(segmentLine(0x1200))).toEqual({ type: 'extended-segment-address', base: 0x1200 })
  })
})
