import { type FileHandle, open } from 'node:fs/promises'
import { LoadError, ParsingError, UnpackingError } from '@/shared/errors'
import type { UnpackedImage, UnpackOptions } from '@/types'
import { iterateRecords } from './record-reader'
import { unpackToNewBuffer } from './unpacker'

export async function readIhexText(filePath: string): Promise<string> {
  let handle: FileHandle
  try {
    handle = await open(filePath, 'r')
  } catch (e) {
    throw new LoadError('failed-open', e)
  }

  let contents: Buffer
  try {
    contents = await handle.readFile()
  } catch (e) {
    // The read failure is what gets reported; a failing close after it is not.
    await handle.close().catch(() => undefined)
    throw new LoadError('failed-read', e)
  }

  try {
    await handle.close()
  } catch (e) {
    throw new LoadError('failed-read', e)
  }

  // Invalid UTF-8 sequences become U+FFFD and then fail record parsing.
  return contents.toString('utf8')
}

export async function loadIhex(
  filePath: string,
  binarySize: number,
  baseOffset: number,
  options?: UnpackOptions,
): Promise<UnpackedImage> {
  const text = await readIhexText(filePath)

  try {
    return unpackToNewBuffer(iterateRecords(text), binarySize, baseOffset, options)
  } catch (e) {
    if (e instanceof ParsingError) {
      throw new LoadError('parsing', e.cause)
    }
    if (e instanceof UnpackingError) {
      throw new LoadError('unpacking', e)
    }
    throw e
  }
}
