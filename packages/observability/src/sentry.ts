/**
 * Sentry integration for bridge services.
 * Optional at runtime: without SENTRY_DSN every call is a logged no-op.
 */
import * as Sentry from '@sentry/node'
import { getBridgeEnv, SAMPLING_DEFAULTS } from './conventions'
import type { Logger } from './logger'
import { classifyError, sanitizeErrorForTelemetry } from './sanitize'

let _initialized = false
let _fallback: Pick<Logger, 'info' | 'warn' | 'error'> | null = null

export interface SentryInitOptions {
  dsn?: string
  serviceName: string
  release?: string
  environment?: string
  tracesSampleRate?: number
  logger?: Logger
}

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key', 'x-client-secret']

export function initSentry(options: SentryInitOptions): void {
  if (_initialized) return
  _fallback = options.logger ?? null

  const dsn = options.dsn || process.env.SENTRY_DSN
  if (!dsn) {
    _fallback?.info(`[sentry] No SENTRY_DSN - error tracking disabled for ${options.serviceName}`)
    return
  }

  const environment = options.environment || getBridgeEnv()
  const tracesSampleRate = options.tracesSampleRate ?? SAMPLING_DEFAULTS[environment] ?? 0.1

  Sentry.init({
    dsn,
    environment,
    release: options.release || process.env.npm_package_version || 'dev',
    serverName: options.serviceName,
    tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        for (const header of SENSITIVE_HEADERS) delete event.request.headers[header]
      }
      if (event.breadcrumbs) {
        for (const bc of event.breadcrumbs) {
          if (!bc.data) continue
          for (const key of Object.keys(bc.data)) {
            const k = key.toLowerCase()
            if (k.includes('key') || k.includes('token') || k.includes('secret')) {
              bc.data[key] = '[REDACTED]'
            }
          }
        }
      }
      return event
    },
  })

  _initialized = true
  _fallback?.info(`[sentry] Initialized for ${options.serviceName} (env=${environment}, sampling=${tracesSampleRate})`)
}

export function captureError(
  error: unknown,
  context?: { agentId?: string; service?: string; operation?: string; [key: string]: unknown },
): void {
  if (!_initialized) {
    _fallback?.error({ err: error, ...context }, '[sentry-fallback] captured error')
    return
  }

  Sentry.withScope((scope) => {
    scope.setTag('error_class', classifyError(error))
    if (context) {
      if (context.service) scope.setTag('service', context.service)
      if (context.operation) scope.setTag('operation', context.operation)
      scope.setContext('custom', context)
    }
    Sentry.captureException(sanitizeErrorForTelemetry(error))
  })
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!_initialized) return
  await Sentry.flush(timeoutMs)
}
