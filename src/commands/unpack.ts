import { writeFile } from 'node:fs/promises'
import { loadIhex } from '@/formats/ihex/loader'
import { handleError } from '@/shared/error-handler'
import { createLogger, createTraceHandler } from '@/shared/logger'
import { parseSize } from '@/shared/numbers'
import { formatOutput } from '@/shared/output'

type UnpackCommandOptions = {
  size: string
  baseOffset?: string
  output?: string
  pretty?: boolean
  verbose?: boolean
}

export async function unpackCommand(file: string, options: UnpackCommandOptions): Promise<void> {
  try {
    const size = parseSize(options.size, 'size')
    const baseOffset = options.baseOffset === undefined ? 0 : parseSize(options.baseOffset, 'base offset')
    const logger = createLogger(options.verbose || undefined)

    logger.debug({ message: 'unpacking', file, size, baseOffset })
    const { image, usedBytes } = await loadIhex(file, size, baseOffset, { trace: createTraceHandler(logger) })

    if (options.output) {
      await writeFile(options.output, image)
    }

    console.log(
      formatOutput(
        {
          file,
          size,
          baseOffset,
          usedBytes,
          ...(options.output !== undefined && { output: options.output }),
        },
        options.pretty,
      ),
    )
  } catch (e) {
    handleError(e, { context: { file } })
  }
}
