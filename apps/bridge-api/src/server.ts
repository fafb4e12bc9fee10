import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify'
import { createAuthHook, decorateAgent, isBridgeError, registerHealthRoute } from '@agentbridge/gateway-core'
import { captureError, SERVICE_NAMES } from '@agentbridge/observability'
import type { BridgeRuntime } from './runtime'
import { registerCapabilityRoutes } from './routes/capabilities'
import { registerAuditRoutes } from './routes/audit'
import { registerSseTransport } from './transports/sse'
import { registerStreamableHttpTransport } from './transports/streamable-http'

/**
 * The HTTP surface for one runtime. REST routes are always mounted; the MCP
 * transport follows `config.transport` (`http` mounts REST only).
 */
export async function buildServer(runtime: BridgeRuntime): Promise<FastifyInstance> {
  const logger: FastifyBaseLogger = runtime.logger
  const app = Fastify({ logger })
  decorateAgent(app)

  app.setErrorHandler((error: Error & { statusCode?: number; validation?: unknown }, request, reply) => {
    if (isBridgeError(error)) {
      if (error.statusCode >= 500) {
        captureError(error, { service: SERVICE_NAMES.BRIDGE_API, operation: `${request.method} ${request.url}` })
      }
      return reply.status(error.statusCode).send(error.toJSON())
    }
    if (error.validation) {
      return reply.status(400).send({ error: error.message, code: 'validation_failed' })
    }
    const statusCode = error.statusCode ?? 500
    if (statusCode >= 500) {
      captureError(error, { service: SERVICE_NAMES.BRIDGE_API, operation: `${request.method} ${request.url}` })
      request.log.error({ err: error }, 'request failed')
    }
    return reply.status(statusCode).send({ error: statusCode >= 500 ? 'Internal Server Error' : error.message })
  })

  registerHealthRoute(app, SERVICE_NAMES.BRIDGE_API, () => ({
    transport: runtime.config.transport,
    upstreams: runtime.upstream.liveServerIds(),
    sessions: runtime.sessions.size,
  }))

  const authHook = createAuthHook(runtime.credentials, {
    clientIdHeader: runtime.config.clientIdHeader,
    secretHeader: runtime.config.secretHeader,
  })
  await registerCapabilityRoutes(app, runtime.gateway, authHook)
  await registerAuditRoutes(app, runtime.audit, authHook)

  if (runtime.config.transport === 'sse') registerSseTransport(app, runtime, authHook)
  if (runtime.config.transport === 'streamable-http') registerStreamableHttpTransport(app, runtime, authHook)

  return app
}
