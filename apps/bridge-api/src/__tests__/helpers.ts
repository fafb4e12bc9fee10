import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { z } from 'zod'
import { InMemoryRegistry, loadBridgeConfig } from '@agentbridge/gateway-core'
import type { UpstreamConnector } from '@agentbridge/bridge'
import { createNullLogger } from '@agentbridge/observability'
import { createBridgeRuntime } from '../runtime'

export const DOCS_CLIENT = { clientId: 'client-docs', secret: 'test-secret' }
export const OTHER_CLIENT = { clientId: 'client-other', secret: 'other-secret' }

export const credentialHeaders = (creds = DOCS_CLIENT) => ({ 'x-client-id': creds.clientId, 'x-api-key': creds.secret })

function docsServer(): McpServer {
  const server = new McpServer({ name: 'docs', version: '1.0.0' })
  server.tool('lookup', 'Look up a page', { page: z.string() }, async ({ page }) => ({
    content: [{ type: 'text', text: `page ${page}` }],
  }))
  server.tool('purge', 'Delete every page', async () => ({ content: [{ type: 'text', text: 'purged' }] }))
  server.resource('index', 'docs://index', async (uri) => ({ contents: [{ uri: uri.href, text: 'index body' }] }))
  server.prompt('brief', 'Brief a reader', { subject: z.string() }, ({ subject }) => ({
    messages: [{ role: 'user', content: { type: 'text', text: `Brief me on ${subject}` } }],
  }))
  return server
}

const connector: UpstreamConnector = async () => {
  const upstream = docsServer()
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  await upstream.connect(serverTransport)
  const client = new Client({ name: 'bridge-test', version: '0.0.0' }, { capabilities: {} })
  await client.connect(clientTransport)
  return client
}

function registry(): InMemoryRegistry {
  return InMemoryRegistry.fromSeed({
    servers: [{ id: 'srv_docs', name: 'docs', transport: { type: 'stdio', command: 'docs-server' } }],
    tools: [
      { id: 'tool_lookup', serverId: 'srv_docs', name: 'lookup' },
      { id: 'tool_purge', serverId: 'srv_docs', name: 'purge' },
    ],
    resources: [{ id: 'res_index', serverId: 'srv_docs', name: 'index', uri: 'docs://index' }],
    prompts: [{ id: 'prm_brief', serverId: 'srv_docs', name: 'brief' }],
    agents: [
      {
        id: 'agent_docs',
        clientId: DOCS_CLIENT.clientId,
        clientSecret: DOCS_CLIENT.secret,
        name: 'docs reader',
        toolIds: ['tool_lookup'],
        resourceIds: ['res_index'],
        promptIds: ['prm_brief'],
      },
      {
        id: 'agent_other',
        clientId: OTHER_CLIENT.clientId,
        clientSecret: OTHER_CLIENT.secret,
        name: 'other',
        toolIds: ['tool_purge'],
      },
    ],
  })
}

/** A connected runtime over one in-process upstream, configured from `env`. */
export async function testRuntime(env: NodeJS.ProcessEnv = {}) {
  const runtime = await createBridgeRuntime(loadBridgeConfig(env), createNullLogger(), {
    registry: registry(),
    connector,
  })
  await runtime.upstream.connectAll()
  return runtime
}
