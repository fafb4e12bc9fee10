export { createLogger, createNullLogger } from './logger'
export type { Logger, LoggerOptions } from './logger'
export { initSentry, captureError, flushSentry } from './sentry'
export type { SentryInitOptions } from './sentry'
export { initTracing, withSpan, shutdownTracing } from './tracing'
export { hashForTelemetry, configureHashSalt } from './hash'
export { sanitizeErrorForTelemetry, classifyError } from './sanitize'
export type { ErrorClass } from './sanitize'
export { SERVICE_NAMES, SPAN_NAMES, ATTR_KEYS, getBridgeEnv } from './conventions'
export type { BridgeEnvironment } from './conventions'
