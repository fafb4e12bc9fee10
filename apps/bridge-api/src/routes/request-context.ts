import type { FastifyReply, FastifyRequest } from 'fastify'
import { AuthenticationError, ValidationError, type AgentIdentity } from '@agentbridge/gateway-core'
import type { CallContext } from '@agentbridge/bridge'
import type { ZodType, ZodTypeDef } from 'zod'

export function requireAgent(request: FastifyRequest): AgentIdentity {
  if (!request.agent) throw new AuthenticationError('Missing client credentials')
  return request.agent
}

/** The call is cancelled if the client disconnects before the reply is written. */
export function callContext(request: FastifyRequest, reply: FastifyReply): CallContext {
  const controller = new AbortController()
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort()
  })
  const sessionId = request.headers['x-session-id']
  return { signal: controller.signal, sessionId: typeof sessionId === 'string' ? sessionId : undefined }
}

export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '))
  }
  return parsed.data
}
