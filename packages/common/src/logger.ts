import type { Logger } from 'pino'
import { pino } from 'pino'

export type { Logger } from 'pino'

/**
 * JSON logger on stdout. Silent under Vitest or `NODE_ENV=test`.
 * Reads `PINO_LOG_LEVEL` and `SERVICE_NAME` directly so it is safe to call at module scope.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true'
  const nodeEnv = process.env.NODE_ENV ?? 'development'
  const level = process.env.PINO_LOG_LEVEL ?? 'info'
  const serviceName = process.env.SERVICE_NAME ?? 'pipeline-invokers'

  return pino({
    level,
    enabled: !isVitest && nodeEnv !== 'test',
    // bindings first so reserved keys win
    base: { ...bindings, service: serviceName },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: ['password', '*.password', 'api_key', '*.api_key'], censor: '[REDACTED]' },
  })
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false })
}
