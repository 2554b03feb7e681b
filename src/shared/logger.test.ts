import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, createTraceHandler, isDebugEnv } from './logger'

let lines: string[]

beforeEach(() => {
  lines = []
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk))
    return true
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('isDebugEnv', () => {
  it('is enabled by a truthy IHEX_DEBUG', () => {
    expect(isDebugEnv({ IHEX_DEBUG: '1' })).toBe(true)
    expect(isDebugEnv({ IHEX_DEBUG: 'yes' })).toBe(true)
  })

  it('is disabled when unset, empty, 0 or false', () => {
    expect(isDebugEnv({})).toBe(false)
    expect(isDebugEnv({ IHEX_DEBUG: '' })).toBe(false)
    expect(isDebugEnv({ IHEX_DEBUG: '0' })).toBe(false)
    expect(isDebugEnv({ IHEX_DEBUG: 'FALSE' })).toBe(false)
  })
})

describe('createLogger', () => {
  it('writes one JSON line per debug call when enabled', () => {
    createLogger(true).debug({ message: 'unpacking' })

    expect(lines).toEqual(['{"level":"debug","message":"unpacking"}\n'])
  })

  it('writes nothing when disabled', () => {
    createLogger(false).debug({ message: 'unpacking' })

    expect(lines).toEqual([])
  })
})

describe('createTraceHandler', () => {
  it('returns nothing for a disabled logger', () => {
    expect(createTraceHandler(createLogger(false))).toBeUndefined()
  })

  it('logs the base address and record', () => {
    const trace = createTraceHandler(createLogger(true))

    trace?.({ base: 0x10, record: { type: 'data', offset: 2, value: Buffer.from([1]) } })

    expect(lines).toEqual(['{"level":"debug","base":"0x00000010","record":{"type":"data","offset":2,"value":"01"}}\n'])
  })
})
