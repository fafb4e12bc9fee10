/**
 * Observability conventions shared by every bridge package.
 * Span and attribute names live here so call sites never hardcode strings.
 */

export const SERVICE_NAMESPACE = 'agent-bridge'

export const SERVICE_NAMES = {
  BRIDGE_API: 'agent-bridge-api',
  BRIDGE_CLI: 'agent-bridge-cli',
} as const

export const SPAN_NAMES = {
  TOOL_CALL: 'bridge.tool_call',
  RESOURCE_READ: 'bridge.resource_read',
  PROMPT_GET: 'bridge.prompt_get',
  CATALOG_LIST: 'bridge.catalog_list',
  UPSTREAM_CONNECT: 'bridge.upstream_connect',
  UPSTREAM_FORWARD: 'bridge.upstream_forward',
  AUTH_VERIFY: 'auth.verify',
  DB_QUERY: 'db.query',
} as const

export const ATTR_KEYS = {
  // Identity (HASHED via hashForTelemetry)
  AGENT_KEY_HASH: 'bridge.agent_key_hash',
  // Identifiers (safe raw)
  CORRELATION_ID: 'bridge.correlation_id',
  SERVER_ID: 'bridge.server_id',
  SESSION_ID: 'bridge.session_id',
  // Capability
  CAPABILITY_KIND: 'bridge.capability.kind',
  CAPABILITY_NAME: 'bridge.capability.name',
  CAPABILITY_COUNT: 'bridge.capability.count',
  ERROR_TYPE: 'bridge.error_type',
  // Service
  TRANSPORT: 'bridge.transport',
  ENVIRONMENT: 'bridge.environment',
} as const

export const SAMPLING_DEFAULTS: Record<string, number> = {
  production: 0.1,
  staging: 1.0,
  development: 1.0,
  test: 0.0,
}

export type BridgeEnvironment = 'production' | 'staging' | 'development' | 'test'

const KNOWN_ENVIRONMENTS: readonly BridgeEnvironment[] = ['production', 'staging', 'development', 'test']

function isBridgeEnvironment(value: string): value is BridgeEnvironment {
  return (KNOWN_ENVIRONMENTS as readonly string[]).includes(value)
}

export function getBridgeEnv(): BridgeEnvironment {
  const env = process.env.BRIDGE_ENV || process.env.NODE_ENV || 'development'
  if (env === 'prod') return 'production'
  if (env === 'dev') return 'development'
  if (env === 'stage' || env === 'preview') return 'staging'
  return isBridgeEnvironment(env) ? env : 'development'
}
