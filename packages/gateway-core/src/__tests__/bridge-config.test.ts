import { describe, it, expect } from 'vitest'
import { loadBridgeConfig } from '../config/bridge-config'
import { ConfigurationError } from '../errors'

describe('loadBridgeConfig', () => {
  it('applies defaults', () => {
    const config = loadBridgeConfig({})
    expect(config).toEqual({
      databaseUrl: undefined,
      port: 8100,
      host: '127.0.0.1',
      transport: 'sse',
      upstreamTimeoutMs: 30_000,
      clientIdHeader: 'x-client-id',
      secretHeader: 'x-api-key',
      seedFile: undefined,
      logLevel: 'info',
      nodeEnv: 'development',
      sentryDsn: undefined,
      otelEnabled: false,
      stdioCredentials: undefined,
    })
  })

  it('reads overrides', () => {
    const config = loadBridgeConfig({
      PORT: '9001',
      BRIDGE_TRANSPORT: 'streamable-http',
      BRIDGE_UPSTREAM_TIMEOUT_MS: '1500',
      BRIDGE_CLIENT_ID_HEADER: 'MCP_CLIENT_ID',
      OTEL_ENABLED: 'true',
      DATABASE_URL: '   ',
    })
    expect(config.port).toBe(9001)
    expect(config.transport).toBe('streamable-http')
    expect(config.upstreamTimeoutMs).toBe(1500)
    expect(config.clientIdHeader).toBe('mcp_client_id')
    expect(config.otelEnabled).toBe(true)
    expect(config.databaseUrl).toBeUndefined()
  })

  it('prefers API_KEY over MCP_CLIENT_SECRET for stdio credentials', () => {
    expect(loadBridgeConfig({ MCP_CLIENT_ID: 'c1', MCP_CLIENT_SECRET: 'fallback', API_KEY: 'test-secret' }).stdioCredentials)
      .toEqual({ clientId: 'c1', secret: 'test-secret' })
    expect(loadBridgeConfig({ MCP_CLIENT_ID: 'c1', MCP_CLIENT_SECRET: 'test-secret' }).stdioCredentials)
      .toEqual({ clientId: 'c1', secret: 'test-secret' })
    expect(loadBridgeConfig({ MCP_CLIENT_ID: 'c1' }).stdioCredentials).toBeUndefined()
  })

  it('rejects invalid values', () => {
    expect(() => loadBridgeConfig({ BRIDGE_TRANSPORT: 'carrier-pigeon' })).toThrow(ConfigurationError)
    expect(() => loadBridgeConfig({ BRIDGE_UPSTREAM_TIMEOUT_MS: '0' })).toThrow(ConfigurationError)
  })
})
