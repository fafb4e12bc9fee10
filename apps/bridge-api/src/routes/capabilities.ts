import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { createAuthHook } from '@agentbridge/gateway-core'
import {
  toolCallRequestSchema,
  resourceReadRequestSchema,
  promptGetRequestSchema,
  toToolView,
  toResourceView,
  toPromptView,
  type BridgeGateway,
} from '@agentbridge/bridge'
import { callContext, parseInput, requireAgent } from './request-context'

export type AuthHook = ReturnType<typeof createAuthHook>

/** REST view of the six protocol operations for the authenticated agent. */
export async function registerCapabilityRoutes(app: FastifyInstance, gateway: BridgeGateway, authHook: AuthHook) {
  app.get('/v1/tools', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const tools = await gateway.listTools(requireAgent(request), callContext(request, reply))
    return reply.send({ tools: tools.map(toToolView) })
  })

  app.post('/v1/tools/call', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const body = parseInput(toolCallRequestSchema, request.body)
    const result = await gateway.callTool(agent, body.name, body.arguments, callContext(request, reply))
    return reply.send(result)
  })

  app.get('/v1/resources', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const resources = await gateway.listResources(requireAgent(request), callContext(request, reply))
    return reply.send({ resources: resources.map(toResourceView) })
  })

  app.post('/v1/resources/read', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const body = parseInput(resourceReadRequestSchema, request.body)
    return reply.send(await gateway.readResource(agent, body.uri, callContext(request, reply)))
  })

  app.get('/v1/prompts', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const prompts = await gateway.listPrompts(requireAgent(request), callContext(request, reply))
    return reply.send({ prompts: prompts.map(toPromptView) })
  })

  app.post('/v1/prompts/get', { preHandler: authHook }, async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = requireAgent(request)
    const body = parseInput(promptGetRequestSchema, request.body)
    return reply.send(await gateway.getPrompt(agent, body.name, body.arguments, callContext(request, reply)))
  })
}
