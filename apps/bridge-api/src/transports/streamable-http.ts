import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js'
import { v4 as uuidv4 } from 'uuid'
import { createProtocolServer } from '@agentbridge/bridge'
import type { BridgeRuntime } from '../runtime'
import type { AuthHook } from '../routes/capabilities'
import { requireAgent } from '../routes/request-context'
import { TransportSessions } from './session-registry'

function sessionHeader(request: FastifyRequest): string | undefined {
  const value = request.headers['mcp-session-id']
  return typeof value === 'string' && value !== '' ? value : undefined
}

/**
 * Streamable HTTP at `/mcp`. An initialize POST without a session id opens a
 * session bound to the authenticated agent; every later request names it in
 * the `mcp-session-id` header.
 */
export function registerStreamableHttpTransport(app: FastifyInstance, runtime: BridgeRuntime, authHook: AuthHook) {
  const sessions = new TransportSessions<StreamableHTTPServerTransport>()
  const log = runtime.logger.child({ transport: 'streamable-http' })

  app.post('/mcp', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const sessionId = sessionHeader(request)

    if (sessionId) {
      const transport = sessions.require(sessionId, agent)
      reply.hijack()
      await transport.handleRequest(request.raw, reply.raw, request.body)
      return
    }

    if (!isInitializeRequest(request.body)) {
      return reply.code(400).send({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: no session id; send initialize first' },
        id: null,
      })
    }

    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => uuidv4(),
      enableJsonResponse: true,
      onsessioninitialized: (id) => {
        sessions.set(id, transport, agent)
        runtime.sessions.open(id, agent, 'streamable-http').catch((err: unknown) =>
          log.error({ err, sessionId: id }, '[mcp] failed to record session'),
        )
      },
    })
    const server = createProtocolServer({ gateway: runtime.gateway, identity: agent })
    server.onclose = () => {
      const id = transport.sessionId
      if (!id) return
      sessions.delete(id)
      runtime.sessions.close(id).catch((err: unknown) => log.error({ err, sessionId: id }, '[mcp] session cleanup failed'))
    }

    await server.connect(transport)
    reply.hijack()
    await transport.handleRequest(request.raw, reply.raw, request.body)
  })

  const existingSession = async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const sessionId = sessionHeader(request)
    if (!sessionId) {
      return reply.code(400).send({ error: 'Missing mcp-session-id header', code: 'validation_failed' })
    }
    const transport = sessions.require(sessionId, agent)
    reply.hijack()
    await transport.handleRequest(request.raw, reply.raw)
  }

  app.get('/mcp', { preHandler: authHook }, existingSession)
  app.delete('/mcp', { preHandler: authHook }, existingSession)

  return sessions
}
