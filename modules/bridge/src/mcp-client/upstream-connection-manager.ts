import type { Client } from '@modelcontextprotocol/sdk/client/index.js'
import {
  CallToolResultSchema,
  ToolListChangedNotificationSchema,
  ResourceListChangedNotificationSchema,
  PromptListChangedNotificationSchema,
  type CallToolResult,
  type GetPromptResult,
  type ReadResourceResult,
  type Tool,
  type Resource,
  type Prompt,
} from '@modelcontextprotocol/sdk/types.js'
import { NotFoundError, requireTransport, type CapabilityKind, type CapabilityServer, type ServerStore } from '@agentbridge/gateway-core'
import { createNullLogger, withSpan, SPAN_NAMES, ATTR_KEYS, type Logger } from '@agentbridge/observability'
import { createMcpClient, type UpstreamConnector } from './mcp-transport'
import { withDeadline, DEFAULT_UPSTREAM_TIMEOUT_MS } from '../router/deadline'

export type CatalogTool = Tool & { serverId: string }
export type CatalogResource = Resource & { serverId: string }
export type CatalogPrompt = Prompt & { serverId: string }

export interface Catalog {
  tools: CatalogTool[]
  resources: CatalogResource[]
  prompts: CatalogPrompt[]
}

/** Read side of the connection manager, all the capability filter needs. */
export interface CatalogSource {
  catalog(): Catalog
}

export interface ForwardOptions {
  signal?: AbortSignal
  timeoutMs?: number
}

export interface ConnectAllResult {
  connected: string[]
  failed: Array<{ serverId: string; error: string }>
}

export interface UpstreamConnectionManagerOptions {
  connector?: UpstreamConnector
  logger?: Logger
  timeoutMs?: number
  now?: () => Date
}

interface UpstreamSession {
  server: CapabilityServer
  client: Client
  /** Connection order; earlier sessions win name collisions. */
  rank: number
  tools: Tool[]
  resources: Resource[]
  prompts: Prompt[]
}

const CONNECTABLE_STATUSES = ['registered', 'active'] as const

/**
 * One live MCP client session per registered capability server, and the merged
 * catalog over them. Connect, reconnect and disconnect on the same server run
 * one at a time.
 */
export class UpstreamConnectionManager implements CatalogSource {
  private readonly sessions = new Map<string, UpstreamSession>()
  private readonly locks = new Map<string, Promise<unknown>>()
  private readonly connector: UpstreamConnector
  private readonly logger: Logger
  private readonly timeoutMs: number
  private readonly now: () => Date
  private nextRank = 0
  private merged: Catalog = { tools: [], resources: [], prompts: [] }
  private toolOwners = new Map<string, string>()
  private resourceOwners = new Map<string, string>()
  private promptOwners = new Map<string, string>()

  constructor(private readonly servers: ServerStore, options: UpstreamConnectionManagerOptions = {}) {
    this.connector = options.connector ?? createMcpClient
    this.logger = options.logger ?? createNullLogger()
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS
    this.now = options.now ?? (() => new Date())
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /**
   * Connects every registered or active server independently. A server that
   * fails is logged and skipped.
   */
  async connectAll(servers?: CapabilityServer[]): Promise<ConnectAllResult> {
    const targets = servers ?? (await this.servers.listServers(CONNECTABLE_STATUSES))
    const ranked = targets.map((server) => ({ server, rank: this.nextRank++ }))
    const settled = await Promise.allSettled(ranked.map(({ server, rank }) => this.connectRanked(server, rank)))

    const result: ConnectAllResult = { connected: [], failed: [] }
    settled.forEach((outcome, i) => {
      const serverId = ranked[i].server.id
      if (outcome.status === 'fulfilled') {
        result.connected.push(serverId)
      } else {
        const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)
        this.logger.error({ serverId, err: outcome.reason }, '[upstream] connection failed, skipping server')
        result.failed.push({ serverId, error })
      }
    })
    this.logger.info(
      { connected: result.connected.length, failed: result.failed.length },
      '[upstream] initial connections complete',
    )
    return result
  }

  /** Connects one server, e.g. right after it is registered. No-op if already live. */
  connect(server: CapabilityServer): Promise<void> {
    return this.connectRanked(server, this.nextRank++)
  }

  /** Tears down and re-establishes one session, keeping its catalog precedence. */
  reconnect(serverId: string): Promise<void> {
    return this.serialized(serverId, async () => {
      const existing = this.sessions.get(serverId)
      const server = (await this.servers.getServer(serverId)) ?? existing?.server
      if (!server) throw new NotFoundError(`Server ${serverId} not found`)
      const rank = existing?.rank ?? this.nextRank++
      if (existing) await this.closeSession(existing)
      await this.openSession(server, rank)
    })
  }

  disconnect(serverId: string): Promise<void> {
    return this.serialized(serverId, async () => {
      const session = this.sessions.get(serverId)
      if (session) await this.closeSession(session)
    })
  }

  /** Closes every session and releases its connection counter. */
  async disconnectAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.disconnect(id)))
  }

  // ── Catalog ──────────────────────────────────────────────────────

  catalog(): Catalog {
    return this.merged
  }

  liveServerIds(): string[] {
    return [...this.sessions.keys()]
  }

  isConnected(serverId: string): boolean {
    return this.sessions.has(serverId)
  }

  /** Re-lists one session's capabilities. Called on list_changed notifications. */
  async refresh(serverId: string, kinds: readonly CapabilityKind[] = ['tool', 'resource', 'prompt']): Promise<void> {
    const session = this.sessions.get(serverId)
    if (!session) return
    await this.loadCatalog(session, kinds)
    this.rebuild()
  }

  // ── Forwarding ───────────────────────────────────────────────────

  async forwardCallTool(name: string, args: Record<string, unknown>, options: ForwardOptions = {}): Promise<CallToolResult> {
    const session = this.owner(this.toolOwners, name, 'Tool')
    return this.forward(session, 'tool', name, options, (signal, timeout) =>
      session.client.request(
        { method: 'tools/call', params: { name, arguments: args } },
        CallToolResultSchema,
        { signal, timeout },
      ),
    )
  }

  async forwardReadResource(uri: string, options: ForwardOptions = {}): Promise<ReadResourceResult> {
    const session = this.owner(this.resourceOwners, uri, 'Resource')
    return this.forward(session, 'resource', uri, options, (signal, timeout) =>
      session.client.readResource({ uri }, { signal, timeout }),
    )
  }

  async forwardGetPrompt(name: string, args: Record<string, string>, options: ForwardOptions = {}): Promise<GetPromptResult> {
    const session = this.owner(this.promptOwners, name, 'Prompt')
    return this.forward(session, 'prompt', name, options, (signal, timeout) =>
      session.client.getPrompt({ name, arguments: args }, { signal, timeout }),
    )
  }

  // ── Internals ────────────────────────────────────────────────────

  private owner(owners: Map<string, string>, key: string, label: string): UpstreamSession {
    const serverId = owners.get(key)
    const session = serverId ? this.sessions.get(serverId) : undefined
    if (!session) throw new NotFoundError(`${label} ${key} is not offered by any connected server`)
    return session
  }

  private forward<T>(
    session: UpstreamSession,
    kind: CapabilityKind,
    name: string,
    options: ForwardOptions,
    send: (signal: AbortSignal, timeout: number) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const attrs = {
      [ATTR_KEYS.SERVER_ID]: session.server.id,
      [ATTR_KEYS.CAPABILITY_KIND]: kind,
      [ATTR_KEYS.CAPABILITY_NAME]: name,
    }
    return withSpan(SPAN_NAMES.UPSTREAM_FORWARD, attrs, () =>
      withDeadline((signal) => send(signal, timeoutMs), { timeoutMs, signal: options.signal }),
    )
  }

  private serialized<T>(serverId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(serverId) ?? Promise.resolve()
    const run = previous.then(task, task)
    const tail = run.then(
      () => undefined,
      () => undefined,
    )
    this.locks.set(serverId, tail)
    void tail.then(() => {
      if (this.locks.get(serverId) === tail) this.locks.delete(serverId)
    })
    return run
  }

  private connectRanked(server: CapabilityServer, rank: number): Promise<void> {
    return this.serialized(server.id, async () => {
      if (this.sessions.has(server.id)) return
      await this.openSession(server, rank)
    })
  }

  private async openSession(server: CapabilityServer, rank: number): Promise<void> {
    requireTransport(server)
    const client = await withSpan(SPAN_NAMES.UPSTREAM_CONNECT, { [ATTR_KEYS.SERVER_ID]: server.id }, () =>
      this.dial(server),
    )
    const session: UpstreamSession = { server, client, rank, tools: [], resources: [], prompts: [] }
    this.watchListChanges(session)
    client.onclose = () => this.handleUnexpectedClose(session)

    await this.loadCatalog(session, ['tool', 'resource', 'prompt'])
    this.sessions.set(server.id, session)
    this.rebuild()

    try {
      const updated = await this.servers.markConnected(server.id, this.now().toISOString())
      if (updated) session.server = updated
    } catch (err) {
      this.logger.error({ serverId: server.id, err }, '[upstream] failed to record connection')
    }
    this.logger.info(
      {
        serverId: server.id,
        tools: session.tools.length,
        resources: session.resources.length,
        prompts: session.prompts.length,
      },
      `[upstream] connected to ${server.name}`,
    )
  }

  /** A client that finishes connecting after the deadline is closed, not leaked. */
  private async dial(server: CapabilityServer): Promise<Client> {
    let attempt: Promise<Client> | undefined
    try {
      return await withDeadline(
        (signal) => {
          attempt = this.connector(server, signal)
          return attempt
        },
        { timeoutMs: this.timeoutMs },
      )
    } catch (err) {
      attempt
        ?.then(
          (late) => late.close(),
          () => undefined,
        )
        .catch((closeErr: unknown) =>
          this.logger.warn({ serverId: server.id, err: closeErr }, '[upstream] failed to close late connection'),
        )
      throw err
    }
  }

  private async closeSession(session: UpstreamSession): Promise<void> {
    const serverId = session.server.id
    this.sessions.delete(serverId)
    this.rebuild()
    session.client.onclose = undefined
    try {
      await session.client.close()
    } catch (err) {
      this.logger.warn({ serverId, err }, '[upstream] error while closing session')
    }
    try {
      await this.servers.markDisconnected(serverId, this.now().toISOString())
    } catch (err) {
      this.logger.error({ serverId, err }, '[upstream] failed to record disconnection')
    }
    this.logger.info({ serverId }, '[upstream] disconnected')
  }

  private handleUnexpectedClose(session: UpstreamSession): void {
    if (this.sessions.get(session.server.id) !== session) return
    this.logger.warn({ serverId: session.server.id }, '[upstream] session closed by server')
    this.serialized(session.server.id, async () => {
      if (this.sessions.get(session.server.id) === session) await this.closeSession(session)
    }).catch((err: unknown) => this.logger.error({ err }, '[upstream] cleanup after close failed'))
  }

  private watchListChanges(session: UpstreamSession): void {
    const refresh = (kind: CapabilityKind) => async () => {
      try {
        await this.refresh(session.server.id, [kind])
      } catch (err) {
        this.logger.warn({ serverId: session.server.id, kind, err }, '[upstream] catalog refresh failed')
      }
    }
    session.client.setNotificationHandler(ToolListChangedNotificationSchema, refresh('tool'))
    session.client.setNotificationHandler(ResourceListChangedNotificationSchema, refresh('resource'))
    session.client.setNotificationHandler(PromptListChangedNotificationSchema, refresh('prompt'))
  }

  /** A kind the server does not support, or fails to list, stays empty. */
  private async loadCatalog(session: UpstreamSession, kinds: readonly CapabilityKind[]): Promise<void> {
    const caps = session.client.getServerCapabilities() ?? {}
    const list = async <T>(kind: CapabilityKind, supported: boolean, load: () => Promise<T[]>): Promise<T[]> => {
      if (!supported) return []
      try {
        return await withDeadline(load, { timeoutMs: this.timeoutMs })
      } catch (err) {
        this.logger.warn({ serverId: session.server.id, kind, err }, '[upstream] catalog listing failed')
        return []
      }
    }

    const tasks: Promise<void>[] = []
    if (kinds.includes('tool')) {
      tasks.push(list('tool', Boolean(caps.tools), () => this.listAllTools(session.client)).then((t) => {
        session.tools = t
      }))
    }
    if (kinds.includes('resource')) {
      tasks.push(list('resource', Boolean(caps.resources), () => this.listAllResources(session.client)).then((r) => {
        session.resources = r
      }))
    }
    if (kinds.includes('prompt')) {
      tasks.push(list('prompt', Boolean(caps.prompts), () => this.listAllPrompts(session.client)).then((p) => {
        session.prompts = p
      }))
    }
    await Promise.all(tasks)
  }

  private async listAllTools(client: Client): Promise<Tool[]> {
    const out: Tool[] = []
    let cursor: string | undefined
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined, { timeout: this.timeoutMs })
      out.push(...page.tools)
      cursor = page.nextCursor
    } while (cursor)
    return out
  }

  private async listAllResources(client: Client): Promise<Resource[]> {
    const out: Resource[] = []
    let cursor: string | undefined
    do {
      const page = await client.listResources(cursor ? { cursor } : undefined, { timeout: this.timeoutMs })
      out.push(...page.resources)
      cursor = page.nextCursor
    } while (cursor)
    return out
  }

  private async listAllPrompts(client: Client): Promise<Prompt[]> {
    const out: Prompt[] = []
    let cursor: string | undefined
    do {
      const page = await client.listPrompts(cursor ? { cursor } : undefined, { timeout: this.timeoutMs })
      out.push(...page.prompts)
      cursor = page.nextCursor
    } while (cursor)
    return out
  }

  /** Merges live sessions in rank order; the first owner of a name or URI keeps it. */
  private rebuild(): void {
    const ordered = [...this.sessions.values()].sort((a, b) => a.rank - b.rank)
    const tools = new Map<string, CatalogTool>()
    const resources = new Map<string, CatalogResource>()
    const prompts = new Map<string, CatalogPrompt>()

    for (const session of ordered) {
      const serverId = session.server.id
      for (const tool of session.tools) {
        if (this.claim(tools, tool.name, serverId, 'tool')) tools.set(tool.name, { ...tool, serverId })
      }
      for (const resource of session.resources) {
        if (this.claim(resources, resource.uri, serverId, 'resource')) resources.set(resource.uri, { ...resource, serverId })
      }
      for (const prompt of session.prompts) {
        if (this.claim(prompts, prompt.name, serverId, 'prompt')) prompts.set(prompt.name, { ...prompt, serverId })
      }
    }

    this.merged = { tools: [...tools.values()], resources: [...resources.values()], prompts: [...prompts.values()] }
    this.toolOwners = new Map([...tools].map(([k, v]) => [k, v.serverId]))
    this.resourceOwners = new Map([...resources].map(([k, v]) => [k, v.serverId]))
    this.promptOwners = new Map([...prompts].map(([k, v]) => [k, v.serverId]))
  }

  private claim(seen: Map<string, { serverId: string }>, key: string, serverId: string, kind: CapabilityKind): boolean {
    const holder = seen.get(key)
    if (!holder) return true
    this.logger.warn(
      { kind, key, keptServerId: holder.serverId, skippedServerId: serverId },
      '[upstream] duplicate capability name, keeping the first server',
    )
    return false
  }
}
