import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { checksum } from '@/formats/ihex/record-reader'
import { RECORD_TYPE, type RecordTypeCode } from '@/formats/ihex/record-types'
import type { IhexRecord, RecordResult } from '@/types'

export function hexLine(type: RecordTypeCode | number, offset: number, data: number[] = []): string {
  const bytes = Buffer.from([data.length, (offset >> 8) & 0xff, offset & 0xff, type, ...data])
  const body = Buffer.concat([bytes, Buffer.from([checksum(bytes)])])
  return `:${body.toString('hex').toUpperCase()}`
}

export const EOF_LINE = hexLine(RECORD_TYPE.END_OF_FILE, 0)

export function dataLine(offset: number, data: number[]): string {
  return hexLine(RECORD_TYPE.DATA, offset, data)
}

export function linearLine(base: number): string {
  return hexLine(RECORD_TYPE.EXTENDED_LINEAR_ADDRESS, 0, [(base >> 8) & 0xff, base & 0xff])
}

export function segmentLine(base: number): string {
  return hexLine(RECORD_TYPE.EXTENDED_SEGMENT_ADDRESS, 0, [(base >> 8) & 0xff, base & 0xff])
}

export function ok(record: IhexRecord): RecordResult {
  return { success: true, record }
}

export function data(offset: number, bytes: number[]): RecordResult {
  return ok({ type: 'data', offset, value: Buffer.from(bytes) })
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'ihex-image-'))
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

export async function writeHexFile(dir: string, name: string, lines: string[]): Promise<string> {
  const path = join(dir, name)
  await writeFile(path, lines.join('\n') + '\n')
  return path
}
