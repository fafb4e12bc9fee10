import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import Fastify, { type FastifyInstance } from 'fastify'
import { extractCredentials, createAuthHook, decorateAgent } from '../fastify/auth-hook'
import { AgentCredentialService } from '../auth/agent-credential-service'
import { InMemoryRegistry } from '../registry/memory-registry'

const basic = (value: string) => `Basic ${Buffer.from(value).toString('base64')}`

describe('extractCredentials', () => {
  it('reads the default header pair', () => {
    expect(extractCredentials({ 'x-client-id': 'c1', 'x-api-key': 'test-secret' })).toEqual({
      clientId: 'c1',
      secret: 'test-secret',
    })
  })

  it('reads configured header names', () => {
    const names = { clientIdHeader: 'MCP_CLIENT_ID', secretHeader: 'API_KEY' }
    expect(extractCredentials({ mcp_client_id: 'c1', api_key: 'test-secret' }, names)).toEqual({
      clientId: 'c1',
      secret: 'test-secret',
    })
  })

  it('falls back to basic auth', () => {
    expect(extractCredentials({ authorization: basic('c1:test:secret') })).toEqual({
      clientId: 'c1',
      secret: 'test:secret',
    })
  })

  it('prefers the header pair over basic auth', () => {
    const creds = extractCredentials({
      'x-client-id': 'c1',
      'x-api-key': 'test-secret',
      authorization: basic('c2:other'),
    })
    expect(creds?.clientId).toBe('c1')
  })

  it('returns null for missing or malformed credentials', () => {
    expect(extractCredentials({})).toBeNull()
    expect(extractCredentials({ 'x-client-id': 'c1' })).toBeNull()
    expect(extractCredentials({ authorization: 'Bearer abc' })).toBeNull()
    expect(extractCredentials({ authorization: basic('no-colon') })).toBeNull()
    expect(extractCredentials({ authorization: basic(':test-secret') })).toBeNull()
    expect(extractCredentials({ authorization: basic('c1:') })).toBeNull()
  })
})

describe('createAuthHook', () => {
  let app: FastifyInstance
  let clientId: string
  let clientSecret: string

  beforeAll(async () => {
    const registry = new InMemoryRegistry()
    const auth = new AgentCredentialService(registry, registry)
    const registered = await auth.register({ name: 'hooked' })
    clientId = registered.agent.clientId
    clientSecret = registered.clientSecret

    app = Fastify()
    decorateAgent(app)
    app.get('/whoami', { preHandler: createAuthHook(auth) }, async (request) => ({
      name: request.agent?.name ?? null,
    }))
    await app.ready()
  })

  afterAll(() => app.close())

  it('binds the agent to the request', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-client-id': clientId, 'x-api-key': clientSecret },
    })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ name: 'hooked' })
  })

  it('answers 401 without credentials', async () => {
    const res = await app.inject({ method: 'GET', url: '/whoami' })
    expect(res.statusCode).toBe(401)
    expect(res.json()).toEqual({ error: 'Missing client credentials', code: 'authentication_failed' })
  })

  it('answers 401 for a wrong secret', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: basic(`${clientId}:test-secret`) },
    })
    expect(res.statusCode).toBe(401)
    expect(res.json()).toEqual({ error: 'Invalid client credentials', code: 'authentication_failed' })
  })
})
