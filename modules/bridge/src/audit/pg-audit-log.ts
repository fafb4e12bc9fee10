import type { QueryFn, QueryRow } from '@agentbridge/gateway-core'
import { AUDIT_EVENT_TYPES, clampLimit, type AuditEvent, type AuditLog, type AuditQuery, type AuditSeverity } from './audit-log'

const SEVERITIES: readonly AuditSeverity[] = ['debug', 'info', 'warning', 'error', 'critical']

export class PgAuditLog implements AuditLog {
  constructor(private readonly run: QueryFn) {}

  async append(event: AuditEvent): Promise<void> {
    await this.run(
      `INSERT INTO bridge_audit_log
        (created_at, event_type, correlation_id, session_id, agent_id, source, severity, payload)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        event.timestamp,
        event.eventType,
        event.correlationId,
        event.sessionId,
        event.agentId,
        event.source,
        event.severity,
        JSON.stringify(event.payload),
      ],
    )
  }

  async query(filters: AuditQuery = {}): Promise<AuditEvent[]> {
    const conditions: string[] = []
    const values: unknown[] = []
    let idx = 1

    if (filters.correlationId) { conditions.push(`correlation_id = $${idx++}`); values.push(filters.correlationId) }
    if (filters.eventType) { conditions.push(`event_type = $${idx++}`); values.push(filters.eventType) }
    if (filters.agentId) { conditions.push(`agent_id = $${idx++}`); values.push(filters.agentId) }
    if (filters.severity) { conditions.push(`severity = $${idx++}`); values.push(filters.severity) }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
    const result = await this.run(
      `SELECT created_at, event_type, correlation_id, session_id, agent_id, source, severity, payload
       FROM bridge_audit_log ${where} ORDER BY created_at DESC, id DESC LIMIT $${idx}`,
      [...values, clampLimit(filters.limit)],
    )
    return result.rows.flatMap((row) => {
      const event = toEvent(row)
      return event ? [event] : []
    })
  }
}

function toEvent(row: QueryRow): AuditEvent | null {
  const eventType = AUDIT_EVENT_TYPES.find((t) => t === row.event_type)
  const severity = SEVERITIES.find((s) => s === row.severity)
  if (!eventType || !severity) return null
  const createdAt = row.created_at
  const payload = typeof row.payload === 'string' ? JSON.parse(row.payload) : row.payload
  return {
    timestamp: createdAt instanceof Date ? createdAt.toISOString() : String(createdAt),
    eventType,
    correlationId: String(row.correlation_id),
    sessionId: typeof row.session_id === 'string' ? row.session_id : null,
    agentId: typeof row.agent_id === 'string' ? row.agent_id : null,
    source: String(row.source),
    severity,
    payload: isRecord(payload) ? payload : {},
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
