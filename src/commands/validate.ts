import { type ValidateResult, validateIhex } from '@/formats/ihex/validator'
import { handleError } from '@/shared/error-handler'
import { formatOutput } from '@/shared/output'

type ValidateOptions = {
  pretty?: boolean
}

export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  let result: ValidateResult
  try {
    result = await validateIhex(file)
  } catch (e) {
    handleError(e, { context: { file } })
    return
  }

  process.stdout.write(formatOutput(result, options.pretty) + '\n')
  if (!result.valid) {
    process.exit(1)
  }
}
