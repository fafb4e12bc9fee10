/**
 * Open MCP sessions across every transport. Opening a session binds the
 * authenticated identity for its lifetime, marks the agent connected to the
 * live upstream servers and audits the event; closing reverses it once the
 * agent's last session is gone.
 */

import { v4 as uuidv4 } from 'uuid'
import type { UsageRecorder } from '@agentbridge/gateway-core'
import { createNullLogger, type Logger } from '@agentbridge/observability'
import type { AuditEventType, AuditLog } from '../audit/audit-log'
import { AUDIT_SOURCE, type BridgeIdentity } from '../router/bridge-gateway'
import type { UpstreamConnectionManager } from '../mcp-client/upstream-connection-manager'

// ── Types ──────────────────────────────────────────────────────────────

export type SessionTransport = 'sse' | 'streamable-http' | 'stdio'

export interface BridgeSession {
  sessionId: string
  identity: BridgeIdentity
  transport: SessionTransport
  openedAt: string
}

export interface SessionTrackerDeps {
  usage: UsageRecorder
  audit: AuditLog
  upstream: Pick<UpstreamConnectionManager, 'liveServerIds'>
  logger?: Logger
  now?: () => Date
}

// ── SessionTracker ─────────────────────────────────────────────────────

export class SessionTracker {
  private readonly sessions = new Map<string, BridgeSession>()
  private readonly openPerAgent = new Map<string, number>()
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(private readonly deps: SessionTrackerDeps) {
    this.logger = deps.logger ?? createNullLogger()
    this.now = deps.now ?? (() => new Date())
  }

  async open(sessionId: string, identity: BridgeIdentity, transport: SessionTransport): Promise<BridgeSession> {
    const existing = this.sessions.get(sessionId)
    if (existing) return existing

    const session: BridgeSession = { sessionId, identity, transport, openedAt: this.now().toISOString() }
    this.sessions.set(sessionId, session)
    this.openPerAgent.set(identity.id, (this.openPerAgent.get(identity.id) ?? 0) + 1)

    const serverIds = this.deps.upstream.liveServerIds()
    try {
      await this.deps.usage.connect(identity.id, serverIds)
    } catch (err) {
      this.logger.warn({ err, agentId: identity.id }, '[session] failed to record agent connection')
    }
    await this.record(session, 'session_opened', { transport, serverIds })
    this.logger.info({ sessionId, agentId: identity.id, transport }, '[session] opened')
    return session
  }

  /** Idempotent; transports may report a close more than once. */
  async close(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId)
    if (!session) return
    this.sessions.delete(sessionId)

    const agentId = session.identity.id
    const remaining = (this.openPerAgent.get(agentId) ?? 1) - 1
    if (remaining > 0) {
      this.openPerAgent.set(agentId, remaining)
    } else {
      this.openPerAgent.delete(agentId)
      try {
        await this.deps.usage.disconnect(agentId)
      } catch (err) {
        this.logger.warn({ err, agentId }, '[session] failed to record agent disconnection')
      }
    }

    const durationMs = this.now().getTime() - Date.parse(session.openedAt)
    await this.record(session, 'session_closed', { transport: session.transport, durationMs })
    this.logger.info({ sessionId, agentId, durationMs }, '[session] closed')
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.close(id)))
  }

  get(sessionId: string): BridgeSession | undefined {
    return this.sessions.get(sessionId)
  }

  get size(): number {
    return this.sessions.size
  }

  private async record(session: BridgeSession, eventType: AuditEventType, payload: Record<string, unknown>) {
    try {
      await this.deps.audit.append({
        timestamp: this.now().toISOString(),
        eventType,
        correlationId: uuidv4(),
        sessionId: session.sessionId,
        agentId: session.identity.id,
        source: AUDIT_SOURCE,
        severity: 'info',
        payload,
      })
    } catch (err) {
      this.logger.error({ err, eventType, sessionId: session.sessionId }, '[audit] failed to append event')
    }
  }
}
