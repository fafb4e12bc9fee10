import type {
  AgentIdentity,
  CapabilityServer,
  ToolCapability,
  ResourceCapability,
  PromptCapability,
  ServerStatus,
} from '../types'

/**
 * Registry collaborators. The bridge reads agents, servers and capabilities
 * through these on every permission-sensitive operation and never caches them.
 */

export type AgentPatch = Partial<
  Pick<AgentIdentity, 'name' | 'description' | 'toolIds' | 'resourceIds' | 'promptIds'>
>

export interface AgentStore {
  getAgent(id: string): Promise<AgentIdentity | null>
  findAgentByClientId(clientId: string): Promise<AgentIdentity | null>
  insertAgent(agent: AgentIdentity): Promise<void>
  /** Replaces every supplied field. Returns null if the agent does not exist. */
  updateAgent(id: string, patch: AgentPatch, updatedAt: string): Promise<AgentIdentity | null>
}

export interface CapabilityStore {
  /** Unknown ids are left out of the result. */
  getTools(ids: readonly string[]): Promise<ToolCapability[]>
  getResources(ids: readonly string[]): Promise<ResourceCapability[]>
  getPrompts(ids: readonly string[]): Promise<PromptCapability[]>
}

export interface ServerStore {
  listServers(statuses?: readonly ServerStatus[]): Promise<CapabilityServer[]>
  getServer(id: string): Promise<CapabilityServer | null>
  /** Atomically bumps connected and total counters and sets status active. */
  markConnected(id: string, at: string): Promise<CapabilityServer | null>
  /** Atomically decrements connected (floor 0); status reverts to registered at 0. */
  markDisconnected(id: string, at: string): Promise<CapabilityServer | null>
}

export type Registry = AgentStore & CapabilityStore & ServerStore
