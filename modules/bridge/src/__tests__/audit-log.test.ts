import { describe, it, expect } from 'vitest'
import type { QueryFn, QueryRow } from '@agentbridge/gateway-core'
import { InMemoryAuditLog, clampLimit, hashArgs, type AuditEvent } from '../audit/audit-log'
import { PgAuditLog } from '../audit/pg-audit-log'

const event = (overrides: Partial<AuditEvent> = {}): AuditEvent => ({
  timestamp: '2026-02-01T12:00:00.000Z',
  eventType: 'call_attempt',
  correlationId: 'corr-1',
  sessionId: null,
  agentId: 'agent_a',
  source: 'bridge',
  severity: 'info',
  payload: {},
  ...overrides,
})

describe('hashArgs', () => {
  it('is null for missing or empty arguments', () => {
    expect(hashArgs(undefined)).toBeNull()
    expect(hashArgs({})).toBeNull()
  })

  it('ignores key order', () => {
    expect(hashArgs({ a: 1, b: 'two' })).toBe(hashArgs({ b: 'two', a: 1 }))
    expect(hashArgs({ a: 1 })).not.toBe(hashArgs({ a: 2 }))
    expect(hashArgs({ a: 1 })).toMatch(/^[0-9a-f]{64}$/)
  })

  it('covers nested values and ignores nested key order', () => {
    expect(hashArgs({ q: { a: 1 } })).not.toBe(hashArgs({ q: { b: 2 } }))
    expect(hashArgs({ q: { a: 1, b: [{ y: 2, x: 1 }] } })).toBe(hashArgs({ q: { b: [{ x: 1, y: 2 }], a: 1 } }))
    expect(hashArgs({ q: [1, 2] })).not.toBe(hashArgs({ q: [2, 1] }))
  })
})

describe('clampLimit', () => {
  it('defaults to 100 and stays within 1..1000', () => {
    expect(clampLimit(undefined)).toBe(100)
    expect(clampLimit(0)).toBe(1)
    expect(clampLimit(5000)).toBe(1000)
    expect(clampLimit(25)).toBe(25)
  })
})

describe('InMemoryAuditLog', () => {
  it('returns newest first and filters', async () => {
    const log = new InMemoryAuditLog()
    await log.append(event({ correlationId: 'c1' }))
    await log.append(event({ correlationId: 'c1', eventType: 'tool_result' }))
    await log.append(event({ correlationId: 'c2', eventType: 'access_denied', severity: 'warning' }))

    expect((await log.query()).map((e) => e.eventType)).toEqual(['access_denied', 'tool_result', 'call_attempt'])
    expect((await log.query({ correlationId: 'c1' })).map((e) => e.eventType)).toEqual(['tool_result', 'call_attempt'])
    expect((await log.query({ severity: 'warning' })).map((e) => e.correlationId)).toEqual(['c2'])
    expect(await log.query({ limit: 1 })).toHaveLength(1)
  })

  it('keeps its own copy of the payload', async () => {
    const log = new InMemoryAuditLog()
    const payload: Record<string, unknown> = { count: 1 }
    await log.append(event({ payload }))
    payload.count = 2
    expect(log.all()[0].payload).toEqual({ count: 1 })
  })
})

describe('PgAuditLog', () => {
  function recordingQuery(rows: QueryRow[] = []) {
    const calls: Array<{ sql: string; params: unknown[] }> = []
    const query: QueryFn = async (sql, params = []) => {
      calls.push({ sql: sql.replace(/\s+/g, ' ').trim(), params })
      return { rows }
    }
    return { query, calls }
  }

  it('inserts the payload as JSON', async () => {
    const { query, calls } = recordingQuery()
    await new PgAuditLog(query).append(event({ payload: { toolName: 'search' } }))
    expect(calls[0].sql).toContain('INSERT INTO bridge_audit_log')
    expect(calls[0].params).toEqual([
      '2026-02-01T12:00:00.000Z',
      'call_attempt',
      'corr-1',
      null,
      'agent_a',
      'bridge',
      'info',
      '{"toolName":"search"}',
    ])
  })

  it('builds the filter clause with numbered parameters', async () => {
    const { query, calls } = recordingQuery()
    await new PgAuditLog(query).query({ eventType: 'tool_error', agentId: 'agent_a', limit: 20 })
    expect(calls[0].sql).toContain('WHERE event_type = $1 AND agent_id = $2 ORDER BY created_at DESC, id DESC LIMIT $3')
    expect(calls[0].params).toEqual(['tool_error', 'agent_a', 20])
  })

  it('maps rows and drops ones with an unknown event type', async () => {
    const { query } = recordingQuery([
      {
        created_at: new Date('2026-02-01T12:00:00.000Z'),
        event_type: 'tool_result',
        correlation_id: 'corr-9',
        session_id: 'sess-1',
        agent_id: 'agent_a',
        source: 'bridge',
        severity: 'info',
        payload: '{"contentCount":2}',
      },
      {
        created_at: new Date('2026-02-01T11:00:00.000Z'),
        event_type: 'legacy_event',
        correlation_id: 'corr-8',
        session_id: null,
        agent_id: null,
        source: 'bridge',
        severity: 'info',
        payload: {},
      },
    ])
    const events = await new PgAuditLog(query).query()
    expect(events).toEqual([
      {
        timestamp: '2026-02-01T12:00:00.000Z',
        eventType: 'tool_result',
        correlationId: 'corr-9',
        sessionId: 'sess-1',
        agentId: 'agent_a',
        source: 'bridge',
        severity: 'info',
        payload: { contentCount: 2 },
      },
    ])
  })
})
