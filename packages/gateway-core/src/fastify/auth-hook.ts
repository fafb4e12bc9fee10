import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { IncomingHttpHeaders } from 'node:http'
import type { AgentIdentity } from '../types'
import type { AgentCredentialService } from '../auth/agent-credential-service'
import { isBridgeError } from '../errors'

declare module 'fastify' {
  interface FastifyRequest {
    /** Bound by the auth hook; null on routes that skip it. */
    agent: AgentIdentity | null
  }
}

export type CredentialHeaders = {
  clientIdHeader: string
  secretHeader: string
}

export const DEFAULT_CREDENTIAL_HEADERS: CredentialHeaders = {
  clientIdHeader: 'x-client-id',
  secretHeader: 'x-api-key',
}

export type PresentedCredentials = { clientId: string; secret: string }

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()]
  const first = Array.isArray(value) ? value[0] : value
  const trimmed = first?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Reads the configured header pair, falling back to
 * `Authorization: Basic base64(clientId:secret)`. Returns null when neither
 * form is complete.
 */
export function extractCredentials(
  headers: IncomingHttpHeaders,
  names: CredentialHeaders = DEFAULT_CREDENTIAL_HEADERS,
): PresentedCredentials | null {
  const clientId = header(headers, names.clientIdHeader)
  const secret = header(headers, names.secretHeader)
  if (clientId && secret) return { clientId, secret }

  const auth = header(headers, 'authorization')
  if (!auth?.toLowerCase().startsWith('basic ')) return null
  const decoded = Buffer.from(auth.slice(6).trim(), 'base64').toString('utf8')
  const sep = decoded.indexOf(':')
  if (sep <= 0 || sep === decoded.length - 1) return null
  return { clientId: decoded.slice(0, sep), secret: decoded.slice(sep + 1) }
}

/**
 * Authenticates from request headers. Throws AuthenticationError from the
 * credential service; returns null when credentials are missing or malformed.
 */
export async function resolveAgent(
  request: FastifyRequest,
  auth: AgentCredentialService,
  names?: CredentialHeaders,
): Promise<AgentIdentity | null> {
  const creds = extractCredentials(request.headers, names)
  if (!creds) return null
  return auth.authenticate(creds.clientId, creds.secret)
}

/** preHandler that binds `request.agent` or answers 401 before any route logic. */
export function createAuthHook(auth: AgentCredentialService, names?: CredentialHeaders) {
  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    try {
      const agent = await resolveAgent(request, auth, names)
      if (!agent) {
        return reply.code(401).send({ error: 'Missing client credentials', code: 'authentication_failed' })
      }
      request.agent = agent
    } catch (err) {
      if (isBridgeError(err) && err.statusCode === 401) {
        return reply.code(401).send(err.toJSON())
      }
      throw err
    }
  }
}

export function decorateAgent(app: FastifyInstance): void {
  if (!app.hasRequestDecorator('agent')) app.decorateRequest('agent', null)
}
