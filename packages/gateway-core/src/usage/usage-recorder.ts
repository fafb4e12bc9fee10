import type { QueryFn } from '../db/client'
import type { CapabilityKind, CapabilityUsage, ServerUsage } from '../types'

export type CapabilityUse = {
  agentId: string
  capabilityId: string
  kind: CapabilityKind
  serverId: string
}

/**
 * Durable per-agent counters. Every write is an upsert whose increment
 * happens in the store, so concurrent calls never lose a count.
 */
export interface UsageRecorder {
  /** Bumps the (agent, capability) counter and the matching (agent, server) counter. */
  recordUse(use: CapabilityUse): Promise<void>
  /** Marks the agent connected to each server. */
  connect(agentId: string, serverIds: readonly string[]): Promise<void>
  /** Marks the agent disconnected from every server it was connected to. */
  disconnect(agentId: string): Promise<void>
}

const SERVER_COUNTER: Record<CapabilityKind, 'tool_calls' | 'resource_reads' | 'prompt_gets'> = {
  tool: 'tool_calls',
  resource: 'resource_reads',
  prompt: 'prompt_gets',
}

export class PgUsageRecorder implements UsageRecorder {
  constructor(private readonly query: QueryFn, private readonly now: () => Date = () => new Date()) {}

  async recordUse(use: CapabilityUse): Promise<void> {
    const at = this.now().toISOString()
    await this.query(
      `INSERT INTO bridge_capability_usage (agent_id, capability_id, kind, use_count, first_used_at, last_used_at)
       VALUES ($1, $2, $3, 1, $4, $4)
       ON CONFLICT (agent_id, capability_id)
       DO UPDATE SET use_count = bridge_capability_usage.use_count + 1, last_used_at = $4`,
      [use.agentId, use.capabilityId, use.kind, at],
    )
    const counter = SERVER_COUNTER[use.kind]
    await this.query(
      `INSERT INTO bridge_server_usage (agent_id, server_id, ${counter}, last_activity_at)
       VALUES ($1, $2, 1, $3)
       ON CONFLICT (agent_id, server_id)
       DO UPDATE SET ${counter} = bridge_server_usage.${counter} + 1, last_activity_at = $3`,
      [use.agentId, use.serverId, at],
    )
  }

  async connect(agentId: string, serverIds: readonly string[]): Promise<void> {
    if (serverIds.length === 0) return
    const at = this.now().toISOString()
    await this.query(
      `INSERT INTO bridge_server_usage (agent_id, server_id, connected, connected_at, last_activity_at)
       SELECT $1, sid, true, $3, $3 FROM UNNEST($2::text[]) AS sid
       ON CONFLICT (agent_id, server_id)
       DO UPDATE SET connected = true, connected_at = $3, last_activity_at = $3`,
      [agentId, [...serverIds], at],
    )
  }

  async disconnect(agentId: string): Promise<void> {
    await this.query(
      `UPDATE bridge_server_usage SET connected = false, disconnected_at = $2
       WHERE agent_id = $1 AND connected = true`,
      [agentId, this.now().toISOString()],
    )
  }
}

/** Process-local recorder, used without a database and in tests. */
export class InMemoryUsageRecorder implements UsageRecorder {
  private capabilities = new Map<string, CapabilityUsage>()
  private servers = new Map<string, ServerUsage>()

  constructor(private readonly now: () => Date = () => new Date()) {}

  async recordUse(use: CapabilityUse): Promise<void> {
    const at = this.now().toISOString()
    const key = `${use.agentId}:${use.capabilityId}`
    const existing = this.capabilities.get(key)
    if (existing) {
      existing.count += 1
      existing.lastUsedAt = at
    } else {
      this.capabilities.set(key, {
        agentId: use.agentId,
        capabilityId: use.capabilityId,
        kind: use.kind,
        count: 1,
        firstUsedAt: at,
        lastUsedAt: at,
      })
    }

    const server = this.serverRecord(use.agentId, use.serverId)
    if (use.kind === 'tool') server.toolCalls += 1
    else if (use.kind === 'resource') server.resourceReads += 1
    else server.promptGets += 1
    server.lastActivityAt = at
  }

  async connect(agentId: string, serverIds: readonly string[]): Promise<void> {
    const at = this.now().toISOString()
    for (const serverId of serverIds) {
      const record = this.serverRecord(agentId, serverId)
      record.connected = true
      record.connectedAt = at
      record.lastActivityAt = at
    }
  }

  async disconnect(agentId: string): Promise<void> {
    const at = this.now().toISOString()
    for (const record of this.servers.values()) {
      if (record.agentId === agentId && record.connected) {
        record.connected = false
        record.disconnectedAt = at
      }
    }
  }

  capabilityUsage(agentId: string, capabilityId: string): CapabilityUsage | null {
    const found = this.capabilities.get(`${agentId}:${capabilityId}`)
    return found ? { ...found } : null
  }

  serverUsage(agentId: string, serverId: string): ServerUsage | null {
    const found = this.servers.get(`${agentId}:${serverId}`)
    return found ? { ...found } : null
  }

  private serverRecord(agentId: string, serverId: string): ServerUsage {
    const key = `${agentId}:${serverId}`
    let record = this.servers.get(key)
    if (!record) {
      record = {
        agentId,
        serverId,
        toolCalls: 0,
        resourceReads: 0,
        promptGets: 0,
        connected: false,
        lastActivityAt: null,
        connectedAt: null,
        disconnectedAt: null,
      }
      this.servers.set(key, record)
    }
    return record
  }
}
