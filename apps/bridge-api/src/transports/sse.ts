import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js'
import { z } from 'zod'
import { createProtocolServer } from '@agentbridge/bridge'
import type { BridgeRuntime } from '../runtime'
import type { AuthHook } from '../routes/capabilities'
import { parseInput, requireAgent } from '../routes/request-context'
import { TransportSessions } from './session-registry'

const messageQuerySchema = z.object({ sessionId: z.string().min(1) })

/**
 * Legacy MCP over SSE: `GET /sse` opens the event stream and announces the
 * message endpoint; `POST /messages?sessionId=` carries client requests.
 */
export function registerSseTransport(app: FastifyInstance, runtime: BridgeRuntime, authHook: AuthHook) {
  const sessions = new TransportSessions<SSEServerTransport>()
  const log = runtime.logger.child({ transport: 'sse' })

  app.get('/sse', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    reply.hijack()

    const transport = new SSEServerTransport('/messages', reply.raw)
    const sessionId = transport.sessionId
    const server = createProtocolServer({ gateway: runtime.gateway, identity: agent, sessionId })
    sessions.set(sessionId, transport, agent)
    server.onclose = () => {
      sessions.delete(sessionId)
      runtime.sessions.close(sessionId).catch((err: unknown) => log.error({ err, sessionId }, '[sse] session cleanup failed'))
    }

    await runtime.sessions.open(sessionId, agent, 'sse')
    try {
      await server.connect(transport)
    } catch (err) {
      sessions.delete(sessionId)
      await runtime.sessions.close(sessionId)
      log.error({ err, sessionId }, '[sse] failed to start stream')
      if (!reply.raw.headersSent) reply.raw.writeHead(500).end()
    }
  })

  app.post('/messages', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const { sessionId } = parseInput(messageQuerySchema, request.query)
    const transport = sessions.require(sessionId, agent)
    reply.hijack()
    await transport.handlePostMessage(request.raw, reply.raw, request.body)
  })

  return sessions
}
