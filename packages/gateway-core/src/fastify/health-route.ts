import type { FastifyInstance } from 'fastify'

/** Unauthenticated liveness probe; `details` adds service-specific fields. */
export function registerHealthRoute(
  app: FastifyInstance,
  serviceName: string,
  details?: () => Record<string, unknown>,
) {
  app.get('/health', async () => ({ ok: true, service: serviceName, ...details?.() }))
}
