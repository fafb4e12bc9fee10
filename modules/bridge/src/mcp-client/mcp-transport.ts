import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { ConfigurationError, requireTransport } from '@agentbridge/gateway-core'
import type { CapabilityServer, ServerTransport } from '@agentbridge/gateway-core'

export const BRIDGE_CLIENT_INFO = { name: 'agent-bridge', version: '0.1.0' } as const

/**
 * Opens a client session to one upstream server. Swapped out in tests.
 * `signal` aborts when the connect deadline passes.
 */
export type UpstreamConnector = (server: CapabilityServer, signal?: AbortSignal) => Promise<Client>

export function createTransport(descriptor: ServerTransport): Transport {
  switch (descriptor.type) {
    case 'stdio':
      return new StdioClientTransport({
        command: descriptor.command,
        args: descriptor.args ?? [],
        env: { ...getDefaultEnvironment(), ...descriptor.env },
      })
    case 'streamable-http':
      return new StreamableHTTPClientTransport(new URL(descriptor.url), {
        requestInit: { headers: descriptor.headers ?? {} },
      })
    case 'sse':
      return new SSEClientTransport(new URL(descriptor.url), {
        requestInit: { headers: descriptor.headers ?? {} },
      })
  }
}

export const createMcpClient: UpstreamConnector = async (server, signal) => {
  const descriptor = requireTransport(server)
  let transport: Transport
  try {
    transport = createTransport(descriptor)
  } catch (err) {
    throw new ConfigurationError(`Cannot build transport for server ${server.id}`, { cause: err })
  }
  const client = new Client(BRIDGE_CLIENT_INFO, { capabilities: {} })
  try {
    await client.connect(transport, { signal })
  } catch (err) {
    // Stops a stdio child that was already spawned.
    await client.close()
    throw err
  }
  return client
}
