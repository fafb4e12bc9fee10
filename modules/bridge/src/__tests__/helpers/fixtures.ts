import { InMemoryRegistry, InMemoryUsageRecorder } from '@agentbridge/gateway-core'
import { UpstreamConnectionManager } from '../../mcp-client/upstream-connection-manager'
import { CapabilityFilter } from '../../router/capability-filter'
import { BridgeGateway } from '../../router/bridge-gateway'
import { InMemoryAuditLog } from '../../audit/audit-log'
import { inMemoryConnector, alphaServer, betaServer } from './upstream'

export function seededRegistry(): InMemoryRegistry {
  return InMemoryRegistry.fromSeed({
    servers: [
      { id: 'srv_alpha', name: 'alpha', transport: { type: 'stdio', command: 'alpha' } },
      { id: 'srv_beta', name: 'beta', transport: { type: 'stdio', command: 'beta' } },
      { id: 'srv_down', name: 'down', transport: { type: 'stdio', command: 'down' } },
    ],
    tools: [
      { id: 'tool_search', serverId: 'srv_alpha', name: 'search' },
      { id: 'tool_fetch', serverId: 'srv_alpha', name: 'fetch' },
      { id: 'tool_slow', serverId: 'srv_alpha', name: 'slow' },
      { id: 'tool_snapshot', serverId: 'srv_alpha', name: 'snapshot' },
      { id: 'tool_search_beta', serverId: 'srv_beta', name: 'search' },
      { id: 'tool_translate', serverId: 'srv_beta', name: 'translate' },
      { id: 'tool_offline', serverId: 'srv_down', name: 'offline' },
    ],
    resources: [{ id: 'res_readme', serverId: 'srv_alpha', name: 'readme', uri: 'file:///docs/readme.md' }],
    prompts: [{ id: 'prm_summarize', serverId: 'srv_alpha', name: 'summarize' }],
    agents: [
      {
        id: 'agent_a',
        clientId: 'client-a',
        clientSecret: 'test-secret',
        name: 'agent a',
        toolIds: ['tool_search', 'tool_slow', 'tool_snapshot', 'tool_translate', 'tool_offline', 'tool_ghost'],
        resourceIds: ['res_readme'],
        promptIds: ['prm_summarize'],
      },
    ],
  })
}

export async function buildBridge(options: { timeoutMs?: number } = {}) {
  const registry = seededRegistry()
  const connector = inMemoryConnector({ srv_alpha: alphaServer, srv_beta: betaServer })
  const upstream = new UpstreamConnectionManager(registry, { connector: connector.connector, timeoutMs: options.timeoutMs ?? 2_000 })
  const connectResult = await upstream.connectAll()
  const usage = new InMemoryUsageRecorder()
  const audit = new InMemoryAuditLog()
  const filter = new CapabilityFilter(registry, registry, upstream)
  const gateway = new BridgeGateway({ filter, upstream, usage, audit, timeoutMs: options.timeoutMs ?? 2_000 })
  return { registry, connector, upstream, connectResult, usage, audit, filter, gateway }
}

export const agentA = { id: 'agent_a', name: 'agent a' }
