import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js'
import {
  isBridgeError,
  RequestCancelledError,
  UpstreamExecutionError,
  UpstreamTimeoutError,
  type BridgeError,
} from '@agentbridge/gateway-core'

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000

export interface DeadlineOptions {
  timeoutMs: number
  /** The caller's signal; aborting it cancels the work. */
  signal?: AbortSignal
}

/**
 * Runs `work` under one deadline. The signal handed to `work` aborts when the
 * timeout fires or the caller's signal aborts, and the rejection is always a
 * BridgeError.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController()
  const timer = setTimeout(
    () => controller.abort(new UpstreamTimeoutError(`Upstream did not answer within ${options.timeoutMs} ms`)),
    options.timeoutMs,
  )
  const onCallerAbort = () => controller.abort(new RequestCancelledError('Request cancelled by caller'))
  if (options.signal?.aborted) onCallerAbort()
  else options.signal?.addEventListener('abort', onCallerAbort, { once: true })

  try {
    return await Promise.race([work(controller.signal), rejectOnAbort(controller.signal)])
  } catch (err) {
    throw toUpstreamError(err, controller.signal)
  } finally {
    clearTimeout(timer)
    options.signal?.removeEventListener('abort', onCallerAbort)
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) reject(signal.reason)
    else signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

export function toUpstreamError(err: unknown, signal?: AbortSignal): BridgeError {
  if (signal?.aborted && isBridgeError(signal.reason)) return signal.reason
  if (isBridgeError(err)) return err
  if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
    return new UpstreamTimeoutError(err.message, { cause: err })
  }
  const message = err instanceof Error ? err.message : String(err)
  return new UpstreamExecutionError(message, { cause: err })
}

export type UpstreamErrorType = 'timeout' | 'cancelled' | 'not_found' | 'execution_error'

export function upstreamErrorType(err: BridgeError): UpstreamErrorType {
  switch (err.code) {
    case 'upstream_timeout':
      return 'timeout'
    case 'request_cancelled':
      return 'cancelled'
    case 'not_found':
      return 'not_found'
    default:
      return 'execution_error'
  }
}
