import { LoadError, ParsingError, ReaderError, UnpackingError } from './errors'

type ErrorOptions = {
  context?: Record<string, unknown>
  hint?: string
}

export function handleError(error: unknown, options?: ErrorOptions): void {
  const message = error instanceof Error ? error.message : String(error)
  const output: Record<string, unknown> = { error: message }
  const code = getErrorCode(error)
  if (code) output.code = code
  if (options?.context) output.context = options.context
  const hint = options?.hint ?? getErrorHint(error)
  if (hint) output.hint = hint
  console.error(JSON.stringify(output))
  process.exit(1)
}

export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof LoadError || error instanceof ReaderError || error instanceof UnpackingError) {
    return error.code
  }
  if (error instanceof ParsingError) {
    return error.cause.code
  }
  return undefined
}

function getErrorHint(error: unknown): string | undefined {
  const cause = error instanceof LoadError ? error.cause : error
  if (!(cause instanceof UnpackingError)) {
    return undefined
  }
  if (cause.kind === 'address-too-high') {
    return `Image needs at least ${cause.address} bytes; raise --size or set --base-offset`
  }
  return 'Data starts below --base-offset; lower --base-offset'
}
