import {
  AgentCredentialService,
  InMemoryRegistry,
  InMemoryUsageRecorder,
  PgRegistry,
  PgUsageRecorder,
  createDbClient,
  loadSeedFile,
  type BridgeConfig,
  type DbClient,
  type Registry,
  type UsageRecorder,
} from '@agentbridge/gateway-core'
import {
  BridgeGateway,
  CapabilityFilter,
  InMemoryAuditLog,
  PgAuditLog,
  SessionTracker,
  UpstreamConnectionManager,
  type AuditLog,
  type UpstreamConnector,
} from '@agentbridge/bridge'
import type { Logger } from '@agentbridge/observability'

/** Every long-lived collaborator of one bridge process. */
export interface BridgeRuntime {
  config: BridgeConfig
  logger: Logger
  registry: Registry
  credentials: AgentCredentialService
  upstream: UpstreamConnectionManager
  gateway: BridgeGateway
  usage: UsageRecorder
  audit: AuditLog
  sessions: SessionTracker
  close(): Promise<void>
}

export interface RuntimeOverrides {
  registry?: Registry
  usage?: UsageRecorder
  audit?: AuditLog
  connector?: UpstreamConnector
}

interface Stores {
  registry: Registry
  usage: UsageRecorder
  audit: AuditLog
}

async function createStores(config: BridgeConfig, logger: Logger, db: DbClient | undefined): Promise<Stores> {
  if (db) {
    logger.info('[db] using Postgres stores')
    return { registry: new PgRegistry(db.query), usage: new PgUsageRecorder(db.query), audit: new PgAuditLog(db.query) }
  }
  const registry = config.seedFile ? await loadSeedFile(config.seedFile) : new InMemoryRegistry()
  if (config.seedFile) logger.info({ seedFile: config.seedFile }, '[registry] loaded seed file')
  return { registry, usage: new InMemoryUsageRecorder(), audit: new InMemoryAuditLog() }
}

/**
 * Wires stores, credentials, upstream sessions and the gateway. Upstream
 * servers are not connected yet; call `upstream.connectAll()`.
 */
export async function createBridgeRuntime(
  config: BridgeConfig,
  logger: Logger,
  overrides: RuntimeOverrides = {},
): Promise<BridgeRuntime> {
  const db = createDbClient(config.databaseUrl, logger)
  const stores = await createStores(config, logger, db)
  const registry = overrides.registry ?? stores.registry
  const usage = overrides.usage ?? stores.usage
  const audit = overrides.audit ?? stores.audit

  const credentials = new AgentCredentialService(registry, registry)
  const upstream = new UpstreamConnectionManager(registry, {
    connector: overrides.connector,
    logger: logger.child({ component: 'upstream' }),
    timeoutMs: config.upstreamTimeoutMs,
  })
  const gateway = new BridgeGateway({
    filter: new CapabilityFilter(registry, registry, upstream),
    upstream,
    usage,
    audit,
    logger: logger.child({ component: 'gateway' }),
    timeoutMs: config.upstreamTimeoutMs,
  })
  const sessions = new SessionTracker({ usage, audit, upstream, logger: logger.child({ component: 'session' }) })

  return {
    config,
    logger,
    registry,
    credentials,
    upstream,
    gateway,
    usage,
    audit,
    sessions,
    async close() {
      await sessions.closeAll()
      await upstream.disconnectAll()
      await db?.close()
    },
  }
}
