import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { handleError } from './error-handler'
import { LoadError, ParsingError, ReaderError, UnpackingError } from './errors'

let errors: string[]

beforeEach(() => {
  errors = []
  vi.spyOn(console, 'error').mockImplementation((msg: string) => {
    errors.push(msg)
  })
  vi.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit')
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('handleError', () => {
  it('writes a plain error without code or hint and exits with status 1', () => {
    expect(() => handleError(new Error('Invalid size: lots'))).toThrow('process.exit')
    expect(JSON.parse(errors[0])).toEqual({ error: 'Invalid size: lots' })
    expect(process.exit).toHaveBeenCalledWith(1)
  })

  it('stringifies thrown values that are not errors', () => {
    expect(() => handleError(404, { context: { file: 'app.hex' } })).toThrow('process.exit')
    expect(JSON.parse(errors[0])).toEqual({ error: '404', context: { file: 'app.hex' } })
  })

  it('includes context and hint when provided', () => {
    expect(() => handleError(new Error('fail'), { context: { file: 'app.hex' }, hint: 'Try again' })).toThrow(
      'process.exit',
    )
    expect(JSON.parse(errors[0])).toEqual({ error: 'fail', context: { file: 'app.hex' }, hint: 'Try again' })
  })

  it('adds the reader error code', () => {
    const error = new ReaderError('checksum-mismatch', 'Checksum mismatch', { line: 4 })

    expect(() => handleError(error)).toThrow('process.exit')
    expect(JSON.parse(errors[0])).toEqual({ error: 'Line 4: Checksum mismatch', code: 'checksum-mismatch' })
  })

  it('uses the reader code for parsing errors', () => {
    const error = new ParsingError(new ReaderError('record-too-short', 'Record is too short (4 characters)'))

    expect(() => handleError(error)).toThrow('process.exit')
    expect(JSON.parse(errors[0]).code).toBe('record-too-short')
  })

  it('adds code and size hint for an image that is too small', () => {
    const error = new LoadError('unpacking', new UnpackingError('address-too-high', 65537, 16))

    expect(() => handleError(error)).toThrow('process.exit')
    expect(JSON.parse(errors[0])).toEqual({
      error: 'Error while unpacking IHEX into array: Address (65537) greater than binary size (16)',
      code: 'address-too-high',
      hint: 'Image needs at least 65537 bytes; raise --size or set --base-offset',
    })
  })

  it('adds a base offset hint for data below the image', () => {
    expect(() => handleError(new UnpackingError('address-too-low', -16, 8))).toThrow('process.exit')
    expect(JSON.parse(errors[0]).hint).toBe('Data starts below --base-offset; lower --base-offset')
  })

  it('prefers an explicit hint', () => {
    expect(() => handleError(new UnpackingError('address-too-high', 9, 8), { hint: 'custom' })).toThrow(
      'process.exit',
    )
    expect(JSON.parse(errors[0]).hint).toBe('custom')
  })

  it('adds no hint for I/O failures', () => {
    const error = new LoadError('failed-open', new Error('ENOENT: no such file'))

    expect(() => handleError(error, {})).toThrow('process.exit')
    expect(JSON.parse(errors[0])).toEqual({
      error: 'IO error when opening file: ENOENT: no such file',
      code: 'failed-open',
    })
  })
})
