import type { Tool, Resource, Prompt } from '@modelcontextprotocol/sdk/types.js'
import type {
  AgentStore,
  CapabilityStore,
  ToolCapability,
  ResourceCapability,
  PromptCapability,
} from '@agentbridge/gateway-core'
import type { CatalogSource } from '../mcp-client/upstream-connection-manager'

export type Visible<D, C> = {
  capabilityId: string
  serverId: string
  capability: C
  descriptor: D
}

export type VisibleTool = Visible<Tool, ToolCapability>
export type VisibleResource = Visible<Resource, ResourceCapability>
export type VisiblePrompt = Visible<Prompt, PromptCapability>

const key = (serverId: string, name: string) => `${serverId}\u0000${name}`

/**
 * The subset of the live catalog an agent may see: its grants resolved to
 * capability records, intersected with the catalog by (server id, name) or
 * (server id, URI). Grants are re-read on every call; ids that no longer
 * resolve are dropped.
 */
export class CapabilityFilter {
  constructor(
    private readonly agents: AgentStore,
    private readonly capabilities: CapabilityStore,
    private readonly upstream: CatalogSource,
  ) {}

  async visibleTools(agentId: string): Promise<VisibleTool[]> {
    const agent = await this.agents.getAgent(agentId)
    if (!agent || agent.toolIds.length === 0) return []
    const granted = await this.capabilities.getTools(agent.toolIds)
    const live = new Map(this.upstream.catalog().tools.map((t) => [key(t.serverId, t.name), t]))
    return intersect(granted, live, (c) => key(c.serverId, c.name), stripTool)
  }

  async visibleResources(agentId: string): Promise<VisibleResource[]> {
    const agent = await this.agents.getAgent(agentId)
    if (!agent || agent.resourceIds.length === 0) return []
    const granted = await this.capabilities.getResources(agent.resourceIds)
    const live = new Map(this.upstream.catalog().resources.map((r) => [key(r.serverId, r.uri), r]))
    return intersect(granted, live, (c) => key(c.serverId, c.uri), stripResource)
  }

  async visiblePrompts(agentId: string): Promise<VisiblePrompt[]> {
    const agent = await this.agents.getAgent(agentId)
    if (!agent || agent.promptIds.length === 0) return []
    const granted = await this.capabilities.getPrompts(agent.promptIds)
    const live = new Map(this.upstream.catalog().prompts.map((p) => [key(p.serverId, p.name), p]))
    return intersect(granted, live, (c) => key(c.serverId, c.name), stripPrompt)
  }

  async findTool(agentId: string, name: string): Promise<VisibleTool | null> {
    return (await this.visibleTools(agentId)).find((t) => t.descriptor.name === name) ?? null
  }

  async findResource(agentId: string, uri: string): Promise<VisibleResource | null> {
    return (await this.visibleResources(agentId)).find((r) => r.descriptor.uri === uri) ?? null
  }

  async findPrompt(agentId: string, name: string): Promise<VisiblePrompt | null> {
    return (await this.visiblePrompts(agentId)).find((p) => p.descriptor.name === name) ?? null
  }
}

function intersect<C extends { id: string; serverId: string }, E extends { serverId: string }, D>(
  granted: C[],
  live: Map<string, E>,
  keyOf: (c: C) => string,
  strip: (entry: E) => D,
): Array<Visible<D, C>> {
  const out: Array<Visible<D, C>> = []
  const seen = new Set<string>()
  for (const capability of granted) {
    const k = keyOf(capability)
    const entry = live.get(k)
    if (!entry || seen.has(k)) continue
    seen.add(k)
    out.push({ capabilityId: capability.id, serverId: capability.serverId, capability, descriptor: strip(entry) })
  }
  return out
}

function stripTool({ serverId: _serverId, ...tool }: Tool & { serverId: string }): Tool {
  return tool
}

function stripResource({ serverId: _serverId, ...resource }: Resource & { serverId: string }): Resource {
  return resource
}

function stripPrompt({ serverId: _serverId, ...prompt }: Prompt & { serverId: string }): Prompt {
  return prompt
}
