/**
 * Structured logging via pino for bridge services.
 */
import pino from 'pino'
import { getBridgeEnv } from './conventions'

export type Logger = pino.Logger

export interface LoggerOptions {
  service: string
  level?: string
  pretty?: boolean
  /**
   * File descriptor to write to. The stdio transport owns stdout for
   * JSON-RPC, so it logs to 2.
   */
  destination?: 1 | 2
}

const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'req.headers["x-client-secret"]',
  'clientSecret',
  '*.clientSecret',
]

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info'
  const pretty = options.pretty ?? (process.env.NODE_ENV !== 'production')
  const fd = options.destination ?? 1

  const base: pino.LoggerOptions = {
    name: options.service,
    level,
    base: {
      service: options.service,
      env: getBridgeEnv(),
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
  }

  if (pretty) {
    return pino({
      ...base,
      transport: { target: 'pino-pretty', options: { colorize: fd === 1, destination: fd } },
    })
  }
  return pino(base, pino.destination({ dest: fd, sync: fd === 2 }))
}

/** Silent logger for tests and library callers that pass none. */
export function createNullLogger(): Logger {
  return pino({ level: 'silent' })
}
