import { describe, it, expect, vi, afterEach } from 'vitest'
import { z } from 'zod'
import { NotFoundError, InMemoryRegistry, PgRegistry, type QueryFn, type QueryRow } from '@agentbridge/gateway-core'
import { UpstreamConnectionManager } from '../mcp-client/upstream-connection-manager'
import type { UpstreamConnector } from '../mcp-client/mcp-transport'
import { seededRegistry } from './helpers/fixtures'
import { inMemoryConnector, alphaServer, betaServer } from './helpers/upstream'

describe('UpstreamConnectionManager', () => {
  let manager: UpstreamConnectionManager | undefined

  afterEach(async () => {
    await manager?.disconnectAll()
    manager = undefined
  })

  async function setup() {
    const registry = seededRegistry()
    const connector = inMemoryConnector({ srv_alpha: alphaServer, srv_beta: betaServer })
    manager = new UpstreamConnectionManager(registry, { connector: connector.connector, timeoutMs: 2_000 })
    const result = await manager.connectAll()
    return { registry, connector, manager, result }
  }

  it('connects every reachable server and skips the one that fails', async () => {
    const { result, manager } = await setup()
    expect(result.connected).toEqual(['srv_alpha', 'srv_beta'])
    expect(result.failed).toEqual([{ serverId: 'srv_down', error: 'connect ECONNREFUSED (srv_down)' }])
    expect(manager.liveServerIds().sort()).toEqual(['srv_alpha', 'srv_beta'])
    expect(manager.isConnected('srv_down')).toBe(false)
  })

  it('counts one connected instance per live session', async () => {
    const { registry } = await setup()
    const alpha = await registry.getServer('srv_alpha')
    expect(alpha?.connectedInstances).toBe(1)
    expect(alpha?.totalConnections).toBe(1)
    expect(alpha?.status).toBe('active')
    const down = await registry.getServer('srv_down')
    expect(down?.connectedInstances).toBe(0)
    expect(down?.status).toBe('registered')
  })

  it('merges the catalog and keeps the first server on a name collision', async () => {
    const { manager } = await setup()
    const tools = manager.catalog().tools
    expect(tools.map((t) => `${t.serverId}/${t.name}`)).toEqual([
      'srv_alpha/search',
      'srv_alpha/fetch',
      'srv_alpha/slow',
      'srv_alpha/snapshot',
      'srv_beta/translate',
    ])
    expect(manager.catalog().resources.map((r) => r.uri)).toEqual(['file:///docs/readme.md'])
    expect(manager.catalog().prompts.map((p) => p.name)).toEqual(['summarize'])
  })

  it('routes a forwarded call to the owning session', async () => {
    const { manager } = await setup()
    const result = await manager.forwardCallTool('translate', { text: 'abc' })
    expect(result.content).toEqual([{ type: 'text', text: 'cba' }])
  })

  it('rejects a name no live session offers', async () => {
    const { manager } = await setup()
    await expect(manager.forwardCallTool('offline', {})).rejects.toBeInstanceOf(NotFoundError)
    await expect(manager.forwardReadResource('file:///missing')).rejects.toBeInstanceOf(NotFoundError)
    await expect(manager.forwardGetPrompt('missing', {})).rejects.toBeInstanceOf(NotFoundError)
  })

  it('connect is a no-op for a server that is already live', async () => {
    const { registry, connector, manager } = await setup()
    const alpha = await registry.getServer('srv_alpha')
    if (!alpha) throw new Error('seed missing srv_alpha')
    await manager.connect(alpha)
    expect(connector.attempts.filter((id) => id === 'srv_alpha')).toHaveLength(1)
    expect((await registry.getServer('srv_alpha'))?.connectedInstances).toBe(1)
  })

  it('reconnect keeps catalog precedence and the counter balanced', async () => {
    const { registry, manager } = await setup()
    await manager.reconnect('srv_alpha')
    const search = manager.catalog().tools.find((t) => t.name === 'search')
    expect(search?.serverId).toBe('srv_alpha')
    const alpha = await registry.getServer('srv_alpha')
    expect(alpha?.connectedInstances).toBe(1)
    expect(alpha?.totalConnections).toBe(2)
  })

  it('reconnect of an unknown server fails with NotFoundError', async () => {
    const { manager } = await setup()
    await expect(manager.reconnect('srv_nowhere')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('disconnectAll releases every counter', async () => {
    const { registry, manager } = await setup()
    await manager.disconnectAll()
    expect(manager.liveServerIds()).toEqual([])
    expect(manager.catalog().tools).toEqual([])
    for (const id of ['srv_alpha', 'srv_beta']) {
      const server = await registry.getServer(id)
      expect(server?.connectedInstances).toBe(0)
      expect(server?.status).toBe('registered')
      expect(server?.lastDisconnectedAt).not.toBeNull()
    }
  })

  it('releases counters even when closing a session fails', async () => {
    const registry = seededRegistry()
    const inner = inMemoryConnector({ srv_alpha: alphaServer, srv_beta: betaServer })
    const connector: UpstreamConnector = async (server) => {
      const client = await inner.connector(server)
      vi.spyOn(client, 'close').mockRejectedValue(new Error('broken pipe'))
      return client
    }
    manager = new UpstreamConnectionManager(registry, { connector, timeoutMs: 2_000 })
    await manager.connectAll()

    await expect(manager.disconnectAll()).resolves.toBeUndefined()
    expect(manager.liveServerIds()).toEqual([])
    for (const id of ['srv_alpha', 'srv_beta']) {
      const server = await registry.getServer(id)
      expect(server?.connectedInstances).toBe(0)
      expect(server?.status).toBe('registered')
    }
  })

  it('closes a client that finishes connecting after the deadline', async () => {
    const registry = new InMemoryRegistry()
    registry.addServer({ id: 'srv_alpha', name: 'alpha', transport: { type: 'stdio', command: 'alpha' } })
    const inner = inMemoryConnector({ srv_alpha: alphaServer })
    const closed: string[] = []
    let connectSignal: AbortSignal | undefined
    const connector: UpstreamConnector = async (server, signal) => {
      connectSignal = signal
      await new Promise((resolve) => setTimeout(resolve, 150))
      const client = await inner.connector(server)
      const close = client.close.bind(client)
      client.close = async () => {
        closed.push(server.id)
        await close()
      }
      return client
    }
    manager = new UpstreamConnectionManager(registry, { connector, timeoutMs: 50 })

    const result = await manager.connectAll()
    expect(result.failed).toEqual([{ serverId: 'srv_alpha', error: 'Upstream did not answer within 50 ms' }])
    expect(connectSignal?.aborted).toBe(true)
    await vi.waitFor(() => expect(closed).toEqual(['srv_alpha']))
    expect(manager.isConnected('srv_alpha')).toBe(false)
    expect((await registry.getServer('srv_alpha'))?.connectedInstances).toBe(0)
  })

  it('skips a stored server with an invalid transport and connects the rest', async () => {
    const row = (id: string, transport: unknown, overrides: QueryRow = {}): QueryRow => ({
      id,
      name: id,
      description: null,
      transport,
      status: 'registered',
      connected_instances: 0,
      total_connections: 0,
      last_connected_at: null,
      last_disconnected_at: null,
      ...overrides,
    })
    const alphaRow = row('srv_alpha', { type: 'stdio', command: 'alpha-server' })
    const query: QueryFn = async (sql) => {
      if (sql.startsWith('SELECT')) return { rows: [alphaRow, row('srv_bad', { type: 'stdio' })] }
      if (sql.includes('connected_instances + 1')) {
        return { rows: [{ ...alphaRow, status: 'active', connected_instances: 1, total_connections: 1 }] }
      }
      return { rows: [] }
    }
    const connector = inMemoryConnector({ srv_alpha: alphaServer, srv_bad: betaServer })
    manager = new UpstreamConnectionManager(new PgRegistry(query), { connector: connector.connector })

    const result = await manager.connectAll()
    expect(result.connected).toEqual(['srv_alpha'])
    expect(result.failed).toEqual([
      { serverId: 'srv_bad', error: 'Server srv_bad has an invalid transport descriptor: command: Required' },
    ])
    expect(connector.attempts).toEqual(['srv_alpha'])
    expect(manager.liveServerIds()).toEqual(['srv_alpha'])
  })

  it('drops a session the upstream closes', async () => {
    const { registry, connector, manager } = await setup()
    await connector.upstream('srv_alpha').close()
    await vi.waitFor(() => expect(manager.isConnected('srv_alpha')).toBe(false))
    await vi.waitFor(async () => expect((await registry.getServer('srv_alpha'))?.connectedInstances).toBe(0))
    expect(manager.catalog().tools.find((t) => t.name === 'search')?.serverId).toBe('srv_beta')
  })

  it('refreshes the catalog when the upstream announces a list change', async () => {
    const { connector, manager } = await setup()
    connector.upstream('srv_alpha').tool('echo', 'Echo input', { text: z.string() }, async ({ text }) => ({
      content: [{ type: 'text', text }],
    }))
    await vi.waitFor(() => expect(manager.catalog().tools.map((t) => t.name)).toContain('echo'))
  })

  it('survives a server store that fails to record the connection', async () => {
    const registry = new InMemoryRegistry()
    registry.addServer({ id: 'srv_alpha', name: 'alpha', transport: { type: 'stdio', command: 'alpha' } })
    vi.spyOn(registry, 'markConnected').mockRejectedValue(new Error('db down'))
    manager = new UpstreamConnectionManager(registry, { connector: inMemoryConnector({ srv_alpha: alphaServer }).connector })
    const result = await manager.connectAll()
    expect(result.connected).toEqual(['srv_alpha'])
    expect(manager.catalog().tools).toHaveLength(4)
  })
})
