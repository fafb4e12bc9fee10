export type CapabilityKind = 'tool' | 'resource' | 'prompt'

export type ServerStatus = 'registered' | 'active'

/** How the bridge reaches an upstream capability server. */
export type ServerTransport =
  | { type: 'stdio'; command: string; args?: string[]; env?: Record<string, string> }
  | { type: 'sse'; url: string; headers?: Record<string, string> }
  | { type: 'streamable-http'; url: string; headers?: Record<string, string> }

export type TransportType = ServerTransport['type']

/** A stored descriptor that failed validation. Connecting to it raises ConfigurationError. */
export type InvalidTransport = { type: 'invalid'; error: string }

export type CapabilityServer = {
  id: string
  name: string
  description: string | null
  transport: ServerTransport | InvalidTransport
  status: ServerStatus
  /** Live bridge sessions to this server. Never below 0; status is active iff > 0. */
  connectedInstances: number
  totalConnections: number
  lastConnectedAt: string | null
  lastDisconnectedAt: string | null
}

export type AgentGrants = {
  toolIds: string[]
  resourceIds: string[]
  promptIds: string[]
}

export type AgentIdentity = AgentGrants & {
  id: string
  clientId: string
  /** SHA-256 hex of the client secret. The plaintext is never stored. */
  clientSecretHash: string
  name: string
  description: string | null
  createdAt: string
  updatedAt: string
}

export type PromptArgument = {
  name: string
  description?: string
  required?: boolean
}

export type ToolCapability = {
  kind: 'tool'
  id: string
  serverId: string
  name: string
  description: string | null
  inputSchema: Record<string, unknown>
}

export type ResourceCapability = {
  kind: 'resource'
  id: string
  serverId: string
  name: string
  uri: string
  description: string | null
  mimeType: string | null
}

export type PromptCapability = {
  kind: 'prompt'
  id: string
  serverId: string
  name: string
  description: string | null
  arguments: PromptArgument[]
}

export type Capability = ToolCapability | ResourceCapability | PromptCapability

export type CapabilityUsage = {
  agentId: string
  capabilityId: string
  kind: CapabilityKind
  count: number
  firstUsedAt: string
  lastUsedAt: string
}

export type ServerUsage = {
  agentId: string
  serverId: string
  toolCalls: number
  resourceReads: number
  promptGets: number
  connected: boolean
  lastActivityAt: string | null
  connectedAt: string | null
  disconnectedAt: string | null
}
