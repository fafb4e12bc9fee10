import { describe, it, expect } from 'vitest'
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js'
import {
  NotFoundError,
  PermissionDeniedError,
  RequestCancelledError,
  UpstreamExecutionError,
  UpstreamTimeoutError,
} from '@agentbridge/gateway-core'
import { withDeadline, toUpstreamError, upstreamErrorType } from '../router/deadline'

const never = (signal: AbortSignal) =>
  new Promise<string>((_, reject) => signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true }))

describe('withDeadline', () => {
  it('resolves with the work result', async () => {
    await expect(withDeadline(async () => 'done', { timeoutMs: 100 })).resolves.toBe('done')
  })

  it('rejects with UpstreamTimeoutError and aborts the work', async () => {
    let seen: AbortSignal | undefined
    const work = (signal: AbortSignal) => {
      seen = signal
      return never(signal)
    }
    await expect(withDeadline(work, { timeoutMs: 20 })).rejects.toBeInstanceOf(UpstreamTimeoutError)
    expect(seen?.aborted).toBe(true)
  })

  it('rejects with RequestCancelledError when the caller aborts', async () => {
    const controller = new AbortController()
    const pending = withDeadline(never, { timeoutMs: 1_000, signal: controller.signal })
    controller.abort()
    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError)
  })

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(withDeadline(never, { timeoutMs: 1_000, signal: controller.signal })).rejects.toBeInstanceOf(
      RequestCancelledError,
    )
  })

  it('wraps a plain failure as an execution error', async () => {
    const cause = new Error('connection reset')
    const failure = await withDeadline(
      async () => {
        throw cause
      },
      { timeoutMs: 100 },
    ).catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(UpstreamExecutionError)
    expect(failure).toMatchObject({ message: 'connection reset', cause })
  })
})

describe('toUpstreamError', () => {
  it('keeps typed errors', () => {
    const err = new PermissionDeniedError('no')
    expect(toUpstreamError(err)).toBe(err)
  })

  it('maps an MCP request timeout to UpstreamTimeoutError', () => {
    expect(toUpstreamError(new McpError(ErrorCode.RequestTimeout, 'Request timed out'))).toBeInstanceOf(
      UpstreamTimeoutError,
    )
  })

  it('prefers the abort reason over the thrown error', () => {
    const controller = new AbortController()
    controller.abort(new UpstreamTimeoutError('late'))
    expect(toUpstreamError(new Error('aborted'), controller.signal)).toBeInstanceOf(UpstreamTimeoutError)
  })
})

describe('upstreamErrorType', () => {
  it('classifies by error code', () => {
    expect(upstreamErrorType(new UpstreamTimeoutError('t'))).toBe('timeout')
    expect(upstreamErrorType(new RequestCancelledError('c'))).toBe('cancelled')
    expect(upstreamErrorType(new NotFoundError('n'))).toBe('not_found')
    expect(upstreamErrorType(new UpstreamExecutionError('e'))).toBe('execution_error')
  })
})
