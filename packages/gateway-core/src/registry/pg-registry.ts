import type { QueryFn, QueryRow } from '../db/client'
import { text, nullableText, int, timestamp, nullableTimestamp, textArray, json } from '../db/rows'
import type {
  AgentIdentity,
  CapabilityServer,
  ToolCapability,
  ResourceCapability,
  PromptCapability,
  ServerStatus,
} from '../types'
import type { Registry, AgentPatch } from './stores'
import { readServerTransport, promptArgumentsSchema } from './schemas'

const AGENT_COLUMNS =
  'id, client_id, client_secret_hash, name, description, tool_ids, resource_ids, prompt_ids, created_at, updated_at'

const SERVER_COLUMNS =
  'id, name, description, transport, status, connected_instances, total_connections, last_connected_at, last_disconnected_at'

/** Postgres-backed registry. Schema: packages/gateway-core/sql/schema.sql. */
export class PgRegistry implements Registry {
  constructor(private readonly query: QueryFn) {}

  // ── AgentStore ───────────────────────────────────────────────────

  async getAgent(id: string): Promise<AgentIdentity | null> {
    const result = await this.query(`SELECT ${AGENT_COLUMNS} FROM bridge_agents WHERE id = $1`, [id])
    return result.rows[0] ? toAgent(result.rows[0]) : null
  }

  async findAgentByClientId(clientId: string): Promise<AgentIdentity | null> {
    const result = await this.query(`SELECT ${AGENT_COLUMNS} FROM bridge_agents WHERE client_id = $1`, [clientId])
    return result.rows[0] ? toAgent(result.rows[0]) : null
  }

  async insertAgent(agent: AgentIdentity): Promise<void> {
    await this.query(
      `INSERT INTO bridge_agents (${AGENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        agent.id,
        agent.clientId,
        agent.clientSecretHash,
        agent.name,
        agent.description,
        agent.toolIds,
        agent.resourceIds,
        agent.promptIds,
        agent.createdAt,
        agent.updatedAt,
      ],
    )
  }

  async updateAgent(id: string, patch: AgentPatch, updatedAt: string): Promise<AgentIdentity | null> {
    const sets: string[] = []
    const values: unknown[] = [id]
    const column = (name: string, value: unknown) => {
      values.push(value)
      sets.push(`${name} = $${values.length}`)
    }
    if (patch.name !== undefined) column('name', patch.name)
    if (patch.description !== undefined) column('description', patch.description)
    if (patch.toolIds !== undefined) column('tool_ids', patch.toolIds)
    if (patch.resourceIds !== undefined) column('resource_ids', patch.resourceIds)
    if (patch.promptIds !== undefined) column('prompt_ids', patch.promptIds)
    column('updated_at', updatedAt)

    const result = await this.query(
      `UPDATE bridge_agents SET ${sets.join(', ')} WHERE id = $1 RETURNING ${AGENT_COLUMNS}`,
      values,
    )
    return result.rows[0] ? toAgent(result.rows[0]) : null
  }

  // ── CapabilityStore ──────────────────────────────────────────────

  async getTools(ids: readonly string[]): Promise<ToolCapability[]> {
    if (ids.length === 0) return []
    const result = await this.query(
      'SELECT id, server_id, name, description, input_schema FROM bridge_tools WHERE id = ANY($1::text[])',
      [[...ids]],
    )
    return result.rows.map((row): ToolCapability => ({
      kind: 'tool',
      id: text(row, 'id'),
      serverId: text(row, 'server_id'),
      name: text(row, 'name'),
      description: nullableText(row, 'description'),
      inputSchema: toSchemaObject(json(row, 'input_schema')),
    }))
  }

  async getResources(ids: readonly string[]): Promise<ResourceCapability[]> {
    if (ids.length === 0) return []
    const result = await this.query(
      'SELECT id, server_id, name, uri, description, mime_type FROM bridge_resources WHERE id = ANY($1::text[])',
      [[...ids]],
    )
    return result.rows.map((row): ResourceCapability => ({
      kind: 'resource',
      id: text(row, 'id'),
      serverId: text(row, 'server_id'),
      name: text(row, 'name'),
      uri: text(row, 'uri'),
      description: nullableText(row, 'description'),
      mimeType: nullableText(row, 'mime_type'),
    }))
  }

  async getPrompts(ids: readonly string[]): Promise<PromptCapability[]> {
    if (ids.length === 0) return []
    const result = await this.query(
      'SELECT id, server_id, name, description, arguments FROM bridge_prompts WHERE id = ANY($1::text[])',
      [[...ids]],
    )
    return result.rows.map((row): PromptCapability => ({
      kind: 'prompt',
      id: text(row, 'id'),
      serverId: text(row, 'server_id'),
      name: text(row, 'name'),
      description: nullableText(row, 'description'),
      arguments: promptArgumentsSchema.catch([]).parse(json(row, 'arguments') ?? []),
    }))
  }

  // ── ServerStore ──────────────────────────────────────────────────

  async listServers(statuses?: readonly ServerStatus[]): Promise<CapabilityServer[]> {
    const result = statuses
      ? await this.query(
          `SELECT ${SERVER_COLUMNS} FROM bridge_servers WHERE status = ANY($1::text[]) ORDER BY created_at, id`,
          [[...statuses]],
        )
      : await this.query(`SELECT ${SERVER_COLUMNS} FROM bridge_servers ORDER BY created_at, id`)
    return result.rows.map(toServer)
  }

  async getServer(id: string): Promise<CapabilityServer | null> {
    const result = await this.query(`SELECT ${SERVER_COLUMNS} FROM bridge_servers WHERE id = $1`, [id])
    return result.rows[0] ? toServer(result.rows[0]) : null
  }

  async markConnected(id: string, at: string): Promise<CapabilityServer | null> {
    const result = await this.query(
      `UPDATE bridge_servers
       SET connected_instances = connected_instances + 1,
           total_connections = total_connections + 1,
           status = 'active',
           last_connected_at = $2
       WHERE id = $1
       RETURNING ${SERVER_COLUMNS}`,
      [id, at],
    )
    return result.rows[0] ? toServer(result.rows[0]) : null
  }

  async markDisconnected(id: string, at: string): Promise<CapabilityServer | null> {
    const result = await this.query(
      `UPDATE bridge_servers
       SET connected_instances = GREATEST(connected_instances - 1, 0),
           status = CASE WHEN GREATEST(connected_instances - 1, 0) > 0 THEN 'active' ELSE 'registered' END,
           last_disconnected_at = $2
       WHERE id = $1
       RETURNING ${SERVER_COLUMNS}`,
      [id, at],
    )
    return result.rows[0] ? toServer(result.rows[0]) : null
  }
}

function toAgent(row: QueryRow): AgentIdentity {
  return {
    id: text(row, 'id'),
    clientId: text(row, 'client_id'),
    clientSecretHash: text(row, 'client_secret_hash'),
    name: text(row, 'name'),
    description: nullableText(row, 'description'),
    toolIds: textArray(row, 'tool_ids'),
    resourceIds: textArray(row, 'resource_ids'),
    promptIds: textArray(row, 'prompt_ids'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  }
}

function toServer(row: QueryRow): CapabilityServer {
  const status = text(row, 'status')
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    description: nullableText(row, 'description'),
    transport: readServerTransport(json(row, 'transport')),
    status: status === 'active' ? 'active' : 'registered',
    connectedInstances: int(row, 'connected_instances'),
    totalConnections: int(row, 'total_connections'),
    lastConnectedAt: nullableTimestamp(row, 'last_connected_at'),
    lastDisconnectedAt: nullableTimestamp(row, 'last_disconnected_at'),
  }
}

function toSchemaObject(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value))
  }
  return { type: 'object' }
}
