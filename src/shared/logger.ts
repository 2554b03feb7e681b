import type { TraceEvent } from '@/types'
import { formatAddress, formatOutput } from './output'

export type Logger = {
  enabled: boolean
  debug(fields: Record<string, unknown>): void
}

export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.IHEX_DEBUG
  return value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false'
}

export function createLogger(enabled: boolean = isDebugEnv()): Logger {
  return {
    enabled,
    debug(fields) {
      if (!enabled) return
      process.stderr.write(formatOutput({ level: 'debug', ...fields }) + '\n')
    },
  }
}

export function createTraceHandler(logger: Logger): ((event: TraceEvent) => void) | undefined {
  if (!logger.enabled) {
    return undefined
  }
  return (event) => logger.debug({ base: formatAddress(event.base), record: event.record })
}
