import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { hashForTelemetry, configureHashSalt } from '../hash'
import { sanitizeErrorForTelemetry, classifyError } from '../sanitize'
import { getBridgeEnv } from '../conventions'
import { withSpan } from '../tracing'

describe('hashForTelemetry', () => {
  it('is deterministic for a salt and truncated to 32 hex chars', () => {
    configureHashSalt('test-salt')
    const h = hashForTelemetry('agent-1')
    expect(h).toBe(hashForTelemetry('agent-1'))
    expect(h).toMatch(/^[0-9a-f]{32}$/)
  })

  it('changes with the salt', () => {
    configureHashSalt('salt-a')
    const a = hashForTelemetry('agent-1')
    configureHashSalt('salt-b')
    expect(hashForTelemetry('agent-1')).not.toBe(a)
  })
})

describe('sanitizeErrorForTelemetry', () => {
  it('wraps non-errors', () => {
    const err = sanitizeErrorForTelemetry('boom')
    expect(err).toBeInstanceOf(Error)
    expect(err.message).toBe('boom')
  })

  it('returns a copy without payload props', () => {
    const original = Object.assign(new Error('upstream failed'), { body: 'secret payload' })
    const safe = sanitizeErrorForTelemetry(original)
    expect(safe).not.toBe(original)
    expect(safe.message).toBe('upstream failed')
    expect('body' in safe).toBe(false)
    expect(original.body).toBe('secret payload')
  })

  it('returns clean errors unchanged', () => {
    const err = new Error('plain')
    expect(sanitizeErrorForTelemetry(err)).toBe(err)
  })
})

describe('classifyError', () => {
  it('classifies common upstream failures', () => {
    expect(classifyError(new Error('MCP error -32001: Request timed out'))).toBe('timeout')
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:9'))).toBe('network_error')
    expect(classifyError(new Error('This operation was aborted'))).toBe('cancelled')
    expect(classifyError(new Error('Tool not found'))).toBe('not_found')
    expect(classifyError(new Error('kaboom'))).toBe('upstream_error')
    expect(classifyError('nope')).toBe('unknown_error')
  })
})

describe('getBridgeEnv', () => {
  const saved = { ...process.env }
  beforeEach(() => {
    delete process.env.BRIDGE_ENV
  })
  afterEach(() => {
    process.env = { ...saved }
  })

  it('normalizes aliases', () => {
    process.env.BRIDGE_ENV = 'prod'
    expect(getBridgeEnv()).toBe('production')
    process.env.BRIDGE_ENV = 'preview'
    expect(getBridgeEnv()).toBe('staging')
  })

  it('falls back to development for unknown values', () => {
    process.env.BRIDGE_ENV = 'qa-cluster-7'
    expect(getBridgeEnv()).toBe('development')
  })
})

describe('withSpan', () => {
  it('returns the wrapped result without a registered SDK', async () => {
    await expect(withSpan('test.span', { a: 1 }, async () => 42)).resolves.toBe(42)
  })

  it('rethrows failures', async () => {
    await expect(withSpan('test.span', {}, async () => {
      throw new Error('inner')
    })).rejects.toThrow('inner')
  })
})
