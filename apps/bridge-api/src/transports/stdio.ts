import type { Readable, Writable } from 'node:stream'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { v4 as uuidv4 } from 'uuid'
import { ConfigurationError } from '@agentbridge/gateway-core'
import { createProtocolServer } from '@agentbridge/bridge'
import type { BridgeRuntime } from '../runtime'

export interface StdioStreams {
  stdin: Readable
  stdout: Writable
}

/**
 * One MCP session over stdin/stdout for the agent named by MCP_CLIENT_ID.
 * Resolves once stdin ends or the client closes the session.
 */
export async function runStdioBridge(
  runtime: BridgeRuntime,
  streams: StdioStreams = { stdin: process.stdin, stdout: process.stdout },
): Promise<void> {
  const creds = runtime.config.stdioCredentials
  if (!creds) {
    throw new ConfigurationError('The stdio transport needs MCP_CLIENT_ID and API_KEY (or MCP_CLIENT_SECRET)')
  }
  const agent = await runtime.credentials.authenticate(creds.clientId, creds.secret)
  const sessionId = uuidv4()
  const log = runtime.logger.child({ transport: 'stdio', sessionId })

  const server = createProtocolServer({ gateway: runtime.gateway, identity: agent, sessionId })
  const closed = new Promise<void>((resolve) => {
    server.onclose = () => resolve()
  })
  streams.stdin.once('end', () => {
    server.close().catch((err: unknown) => log.error({ err }, '[stdio] close failed'))
  })

  await runtime.sessions.open(sessionId, agent, 'stdio')
  await server.connect(new StdioServerTransport(streams.stdin, streams.stdout))
  log.info({ agentId: agent.id }, '[stdio] session started')

  await closed
  await runtime.sessions.close(sessionId)
}
