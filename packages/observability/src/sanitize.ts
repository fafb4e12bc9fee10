/**
 * Error sanitization for telemetry - strips payloads and classifies upstream failures.
 */

const DANGEROUS_PROPS = ['response', 'data', 'body', 'cause', 'config'] as const

export function sanitizeErrorForTelemetry(err: unknown): Error {
  if (!(err instanceof Error)) return new Error(String(err))
  if (!DANGEROUS_PROPS.some((prop) => prop in err)) return err

  // Never mutate the caller's error.
  const safe = new Error(err.message)
  safe.name = err.name
  safe.stack = err.stack
  return safe
}

export type ErrorClass =
  | 'timeout'
  | 'cancelled'
  | 'network_error'
  | 'auth_error'
  | 'not_found'
  | 'upstream_error'
  | 'unknown_error'

export function classifyError(err: unknown): ErrorClass {
  if (!(err instanceof Error)) return 'unknown_error'
  const msg = err.message.toLowerCase()
  if (err.name === 'AbortError' || msg.includes('aborted') || msg.includes('cancel')) return 'cancelled'
  if (msg.includes('timeout') || msg.includes('timed out')) return 'timeout'
  if (msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('fetch failed')) return 'network_error'
  if (msg.includes('unauthorized') || msg.includes('401')) return 'auth_error'
  if (msg.includes('not found')) return 'not_found'
  return 'upstream_error'
}
