import { NotFoundError, PermissionDeniedError, type AgentIdentity } from '@agentbridge/gateway-core'

/** Live protocol transports of one HTTP transport kind, keyed by MCP session id. */
export class TransportSessions<T> {
  private readonly entries = new Map<string, { transport: T; agentId: string }>()

  set(sessionId: string, transport: T, agent: AgentIdentity): void {
    this.entries.set(sessionId, { transport, agentId: agent.id })
  }

  delete(sessionId: string): void {
    this.entries.delete(sessionId)
  }

  /** A session answers only the agent that opened it. */
  require(sessionId: string, agent: AgentIdentity): T {
    const entry = this.entries.get(sessionId)
    if (!entry) throw new NotFoundError(`Unknown session ${sessionId}`)
    if (entry.agentId !== agent.id) throw new PermissionDeniedError('Session belongs to another agent')
    return entry.transport
  }

  get size(): number {
    return this.entries.size
  }
}
