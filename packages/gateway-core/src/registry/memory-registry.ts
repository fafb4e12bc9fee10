import type {
  AgentIdentity,
  CapabilityServer,
  ToolCapability,
  ResourceCapability,
  PromptCapability,
  ServerStatus,
} from '../types'
import type { Registry, AgentPatch } from './stores'
import { seedSchema, type RegistrySeedInput } from './schemas'
import { hashSecret } from '../auth/secret-hash'

/**
 * Process-local registry, used when DATABASE_URL is unset and in tests.
 * Returned records are copies so callers cannot mutate stored state.
 */
export class InMemoryRegistry implements Registry {
  private agents = new Map<string, AgentIdentity>()
  private servers = new Map<string, CapabilityServer>()
  private tools = new Map<string, ToolCapability>()
  private resources = new Map<string, ResourceCapability>()
  private prompts = new Map<string, PromptCapability>()

  static fromSeed(seed: RegistrySeedInput, now = new Date().toISOString()): InMemoryRegistry {
    const registry = new InMemoryRegistry()
    registry.load(seed, now)
    return registry
  }

  load(input: RegistrySeedInput, now = new Date().toISOString()): void {
    const seed = seedSchema.parse(input)
    for (const s of seed.servers) {
      this.addServer({ ...s })
    }
    for (const t of seed.tools) this.tools.set(t.id, { kind: 'tool', ...t })
    for (const r of seed.resources) this.resources.set(r.id, { kind: 'resource', ...r })
    for (const p of seed.prompts) this.prompts.set(p.id, { kind: 'prompt', ...p })
    for (const a of seed.agents) {
      const { clientSecret, ...rest } = a
      this.agents.set(a.id, {
        ...rest,
        clientSecretHash: hashSecret(clientSecret),
        createdAt: now,
        updatedAt: now,
      })
    }
  }

  // ── Seeding helpers ──────────────────────────────────────────────

  addServer(
    server: Pick<CapabilityServer, 'id' | 'name' | 'transport'> & Partial<CapabilityServer>,
  ): CapabilityServer {
    const record: CapabilityServer = {
      description: null,
      status: 'registered',
      connectedInstances: 0,
      totalConnections: 0,
      lastConnectedAt: null,
      lastDisconnectedAt: null,
      ...server,
    }
    this.servers.set(record.id, record)
    return { ...record }
  }

  addCapability(capability: ToolCapability | ResourceCapability | PromptCapability): void {
    switch (capability.kind) {
      case 'tool':
        this.tools.set(capability.id, capability)
        break
      case 'resource':
        this.resources.set(capability.id, capability)
        break
      case 'prompt':
        this.prompts.set(capability.id, capability)
        break
    }
  }

  removeCapability(id: string): void {
    this.tools.delete(id)
    this.resources.delete(id)
    this.prompts.delete(id)
  }

  // ── AgentStore ───────────────────────────────────────────────────

  async getAgent(id: string): Promise<AgentIdentity | null> {
    const agent = this.agents.get(id)
    return agent ? cloneAgent(agent) : null
  }

  async findAgentByClientId(clientId: string): Promise<AgentIdentity | null> {
    for (const agent of this.agents.values()) {
      if (agent.clientId === clientId) return cloneAgent(agent)
    }
    return null
  }

  async insertAgent(agent: AgentIdentity): Promise<void> {
    this.agents.set(agent.id, cloneAgent(agent))
  }

  async updateAgent(id: string, patch: AgentPatch, updatedAt: string): Promise<AgentIdentity | null> {
    const existing = this.agents.get(id)
    if (!existing) return null
    const next: AgentIdentity = { ...existing, updatedAt }
    if (patch.name !== undefined) next.name = patch.name
    if (patch.description !== undefined) next.description = patch.description
    if (patch.toolIds !== undefined) next.toolIds = [...patch.toolIds]
    if (patch.resourceIds !== undefined) next.resourceIds = [...patch.resourceIds]
    if (patch.promptIds !== undefined) next.promptIds = [...patch.promptIds]
    this.agents.set(id, next)
    return cloneAgent(next)
  }

  // ── CapabilityStore ──────────────────────────────────────────────

  async getTools(ids: readonly string[]): Promise<ToolCapability[]> {
    return pick(this.tools, ids)
  }

  async getResources(ids: readonly string[]): Promise<ResourceCapability[]> {
    return pick(this.resources, ids)
  }

  async getPrompts(ids: readonly string[]): Promise<PromptCapability[]> {
    return pick(this.prompts, ids)
  }

  // ── ServerStore ──────────────────────────────────────────────────

  async listServers(statuses?: readonly ServerStatus[]): Promise<CapabilityServer[]> {
    return [...this.servers.values()]
      .filter((s) => !statuses || statuses.includes(s.status))
      .map((s) => ({ ...s }))
  }

  async getServer(id: string): Promise<CapabilityServer | null> {
    const server = this.servers.get(id)
    return server ? { ...server } : null
  }

  async markConnected(id: string, at: string): Promise<CapabilityServer | null> {
    const server = this.servers.get(id)
    if (!server) return null
    server.connectedInstances += 1
    server.totalConnections += 1
    server.status = 'active'
    server.lastConnectedAt = at
    return { ...server }
  }

  async markDisconnected(id: string, at: string): Promise<CapabilityServer | null> {
    const server = this.servers.get(id)
    if (!server) return null
    server.connectedInstances = Math.max(server.connectedInstances - 1, 0)
    server.status = server.connectedInstances > 0 ? 'active' : 'registered'
    server.lastDisconnectedAt = at
    return { ...server }
  }
}

function cloneAgent(agent: AgentIdentity): AgentIdentity {
  return {
    ...agent,
    toolIds: [...agent.toolIds],
    resourceIds: [...agent.resourceIds],
    promptIds: [...agent.promptIds],
  }
}

function pick<T>(map: Map<string, T>, ids: readonly string[]): T[] {
  const out: T[] = []
  for (const id of new Set(ids)) {
    const found = map.get(id)
    if (found) out.push(found)
  }
  return out
}
