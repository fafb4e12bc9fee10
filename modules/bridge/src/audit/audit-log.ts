import { createHash } from 'node:crypto'

export type AuditSeverity = 'debug' | 'info' | 'warning' | 'error' | 'critical'

export const AUDIT_EVENT_TYPES = [
  'call_attempt',
  'tool_result',
  'tool_error',
  'read_attempt',
  'resource_result',
  'resource_error',
  'prompt_attempt',
  'prompt_result',
  'prompt_error',
  'access_denied',
  'access_revoked',
  'list_tools',
  'list_resources',
  'list_prompts',
  'list_error',
  'session_opened',
  'session_closed',
] as const

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number]

export interface AuditEvent {
  timestamp: string
  eventType: AuditEventType
  correlationId: string
  sessionId: string | null
  agentId: string | null
  source: string
  severity: AuditSeverity
  payload: Record<string, unknown>
}

export interface AuditQuery {
  correlationId?: string
  eventType?: AuditEventType
  agentId?: string
  severity?: AuditSeverity
  /** Newest first; defaults to 100, capped at 1000. */
  limit?: number
}

/** Append-only audit sink. */
export interface AuditLog {
  append(event: AuditEvent): Promise<void>
  query(filters?: AuditQuery): Promise<AuditEvent[]>
}

export function clampLimit(limit: number | undefined): number {
  return Math.min(1000, Math.max(1, limit ?? 100))
}

/** Arguments are audited by key set and digest, never by value. */
export function hashArgs(args: Record<string, unknown> | undefined): string | null {
  if (!args || Object.keys(args).length === 0) return null
  return createHash('sha256').update(JSON.stringify(canonicalize(args))).digest('hex')
}

/** Sorts object keys at every depth so equal arguments serialize identically. */
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize)
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, canonicalize(Reflect.get(value, key))]),
    )
  }
  return value
}

export class InMemoryAuditLog implements AuditLog {
  private readonly events: AuditEvent[] = []

  async append(event: AuditEvent): Promise<void> {
    this.events.push({ ...event, payload: { ...event.payload } })
  }

  async query(filters: AuditQuery = {}): Promise<AuditEvent[]> {
    return this.events
      .filter(
        (e) =>
          (!filters.correlationId || e.correlationId === filters.correlationId) &&
          (!filters.eventType || e.eventType === filters.eventType) &&
          (!filters.agentId || e.agentId === filters.agentId) &&
          (!filters.severity || e.severity === filters.severity),
      )
      .reverse()
      .slice(0, clampLimit(filters.limit))
  }

  /** Every event in append order. */
  all(): AuditEvent[] {
    return [...this.events]
  }
}
