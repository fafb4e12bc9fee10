import { z } from 'zod'
import { ConfigurationError } from '../errors'

export const BRIDGE_TRANSPORTS = ['sse', 'streamable-http', 'stdio', 'http'] as const
export type BridgeTransport = (typeof BRIDGE_TRANSPORTS)[number]

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1')

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v : undefined))

const envSchema = z.object({
  DATABASE_URL: optionalString,
  PORT: z.coerce.number().int().min(0).max(65535).default(8100),
  HOST: z.string().min(1).default('127.0.0.1'),
  BRIDGE_TRANSPORT: z.enum(BRIDGE_TRANSPORTS).default('sse'),
  BRIDGE_UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BRIDGE_CLIENT_ID_HEADER: z.string().min(1).default('x-client-id'),
  BRIDGE_SECRET_HEADER: z.string().min(1).default('x-api-key'),
  BRIDGE_SEED_FILE: optionalString,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),
  SENTRY_DSN: optionalString,
  OTEL_ENABLED: booleanFlag,
  MCP_CLIENT_ID: optionalString,
  MCP_CLIENT_SECRET: optionalString,
  API_KEY: optionalString,
})

export type BridgeConfig = {
  databaseUrl?: string
  port: number
  host: string
  transport: BridgeTransport
  upstreamTimeoutMs: number
  clientIdHeader: string
  secretHeader: string
  seedFile?: string
  logLevel: string
  nodeEnv: string
  sentryDsn?: string
  otelEnabled: boolean
  /** Credentials for the stdio transport, which has no headers. */
  stdioCredentials?: { clientId: string; secret: string }
}

export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid environment: ${issues}`)
  }
  const e = parsed.data
  const secret = e.API_KEY ?? e.MCP_CLIENT_SECRET

  return {
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    host: e.HOST,
    transport: e.BRIDGE_TRANSPORT,
    upstreamTimeoutMs: e.BRIDGE_UPSTREAM_TIMEOUT_MS,
    clientIdHeader: e.BRIDGE_CLIENT_ID_HEADER.toLowerCase(),
    secretHeader: e.BRIDGE_SECRET_HEADER.toLowerCase(),
    seedFile: e.BRIDGE_SEED_FILE,
    logLevel: e.LOG_LEVEL,
    nodeEnv: e.NODE_ENV,
    sentryDsn: e.SENTRY_DSN,
    otelEnabled: e.OTEL_ENABLED,
    stdioCredentials: e.MCP_CLIENT_ID && secret ? { clientId: e.MCP_CLIENT_ID, secret } : undefined,
  }
}
