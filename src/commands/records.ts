import { readIhexText } from '@/formats/ihex/loader'
import { iterateRecords } from '@/formats/ihex/record-reader'
import { handleError } from '@/shared/error-handler'
import { ReaderError } from '@/shared/errors'
import { formatOutput } from '@/shared/output'
import type { IhexRecord } from '@/types'

type RecordsOptions = {
  pretty?: boolean
}

export async function recordsCommand(file: string, options: RecordsOptions): Promise<void> {
  try {
    const text = await readIhexText(file)
    const records: Array<{ line?: number; record: IhexRecord }> = []

    for (const result of iterateRecords(text)) {
      if (!result.success) {
        throw result.error
      }
      records.push({ line: result.line, record: result.record })
    }

    console.log(formatOutput({ file, records }, options.pretty))
  } catch (e) {
    const line = e instanceof ReaderError ? e.line : undefined
    handleError(e, { context: line === undefined ? { file } : { file, line } })
  }
}
