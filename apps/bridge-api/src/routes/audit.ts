import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { auditQuerySchema, type AuditLog } from '@agentbridge/bridge'
import { parseInput, requireAgent } from './request-context'
import type { AuthHook } from './capabilities'

/** An agent reads its own audit trail, newest first. */
export async function registerAuditRoutes(app: FastifyInstance, audit: AuditLog, authHook: AuthHook) {
  app.get('/v1/audit', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const query = parseInput(auditQuerySchema, request.query)
    const events = await audit.query({
      agentId: agent.id,
      correlationId: query.correlation_id,
      eventType: query.event_type,
      severity: query.severity,
      limit: query.limit,
    })
    return reply.send({ events })
  })
}
