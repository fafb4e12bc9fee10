import { v4 as uuidv4 } from 'uuid'
import type { AgentGrants, AgentIdentity } from '../types'
import type { AgentStore, CapabilityStore, AgentPatch } from '../registry/stores'
import { AuthenticationError, NotFoundError, ValidationError, type UnknownGrantIds } from '../errors'
import { hashSecret, generateSecret, hashesEqual } from './secret-hash'

export interface RegisterAgentInput extends Partial<AgentGrants> {
  name: string
  description?: string | null
}

export interface RegisteredAgent {
  agent: AgentIdentity
  /** Shown once. Only its hash is stored. */
  clientSecret: string
}

export interface AgentCredentialServiceOptions {
  hashSecret?: (raw: string) => string
  compareHashes?: (a: string, b: string) => boolean
  generateSecret?: () => string
  generateId?: () => string
  now?: () => Date
}

/**
 * Agent identity records and secret verification.
 *
 * Authentication of an unknown client id still hashes the presented secret and
 * compares it against a fixed dummy digest, so unknown and known ids cost the
 * same.
 */
export class AgentCredentialService {
  private readonly hash: (raw: string) => string
  private readonly compare: (a: string, b: string) => boolean
  private readonly newSecret: () => string
  private readonly newId: () => string
  private readonly now: () => Date
  private readonly dummyHash: string

  constructor(
    private readonly agents: AgentStore,
    private readonly capabilities: CapabilityStore,
    options: AgentCredentialServiceOptions = {},
  ) {
    this.hash = options.hashSecret ?? hashSecret
    this.compare = options.compareHashes ?? hashesEqual
    this.newSecret = options.generateSecret ?? generateSecret
    this.newId = options.generateId ?? (() => uuidv4())
    this.now = options.now ?? (() => new Date())
    this.dummyHash = hashSecret('agent-bridge:unknown-client')
  }

  async register(input: RegisterAgentInput): Promise<RegisteredAgent> {
    const grants: AgentGrants = {
      toolIds: dedupe(input.toolIds ?? []),
      resourceIds: dedupe(input.resourceIds ?? []),
      promptIds: dedupe(input.promptIds ?? []),
    }
    await this.assertGrantsExist(grants)

    const clientSecret = this.newSecret()
    const timestamp = this.now().toISOString()
    const agent: AgentIdentity = {
      id: this.newId(),
      clientId: this.newId(),
      clientSecretHash: this.hash(clientSecret),
      name: input.name,
      description: input.description ?? null,
      ...grants,
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    await this.agents.insertAgent(agent)
    return { agent, clientSecret }
  }

  async authenticate(clientId: string, secret: string): Promise<AgentIdentity> {
    const agent = clientId ? await this.agents.findAgentByClientId(clientId) : null
    const presented = this.hash(secret)
    const matches = this.compare(presented, agent ? agent.clientSecretHash : this.dummyHash)
    if (!agent || !matches) {
      throw new AuthenticationError('Invalid client credentials')
    }
    return agent
  }

  /** Supplied grant lists replace the stored ones; they are never merged. */
  async update(agentId: string, patch: AgentPatch): Promise<AgentIdentity> {
    const next: AgentPatch = { ...patch }
    if (patch.toolIds) next.toolIds = dedupe(patch.toolIds)
    if (patch.resourceIds) next.resourceIds = dedupe(patch.resourceIds)
    if (patch.promptIds) next.promptIds = dedupe(patch.promptIds)
    await this.assertGrantsExist({
      toolIds: next.toolIds ?? [],
      resourceIds: next.resourceIds ?? [],
      promptIds: next.promptIds ?? [],
    })

    const updated = await this.agents.updateAgent(agentId, next, this.now().toISOString())
    if (!updated) throw new NotFoundError(`Agent ${agentId} not found`)
    return updated
  }

  get(agentId: string): Promise<AgentIdentity | null> {
    return this.agents.getAgent(agentId)
  }

  private async assertGrantsExist(grants: AgentGrants): Promise<void> {
    const [tools, resources, prompts] = await Promise.all([
      this.capabilities.getTools(grants.toolIds),
      this.capabilities.getResources(grants.resourceIds),
      this.capabilities.getPrompts(grants.promptIds),
    ])
    const unknown: UnknownGrantIds = {
      toolIds: missing(grants.toolIds, tools),
      resourceIds: missing(grants.resourceIds, resources),
      promptIds: missing(grants.promptIds, prompts),
    }
    const total = unknown.toolIds.length + unknown.resourceIds.length + unknown.promptIds.length
    if (total > 0) {
      const parts = (['toolIds', 'resourceIds', 'promptIds'] as const)
        .filter((k) => unknown[k].length > 0)
        .map((k) => `${k}: ${unknown[k].join(', ')}`)
      throw new ValidationError(`Unknown capability ids (${parts.join('; ')})`, unknown)
    }
  }
}

function dedupe(ids: readonly string[]): string[] {
  return [...new Set(ids)]
}

function missing(requested: readonly string[], found: ReadonlyArray<{ id: string }>): string[] {
  const ids = new Set(found.map((c) => c.id))
  return requested.filter((id) => !ids.has(id))
}
