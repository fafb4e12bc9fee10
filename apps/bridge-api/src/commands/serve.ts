import { Command, Option } from 'commander'
import {
  BRIDGE_TRANSPORTS,
  loadBridgeConfig,
  type BridgeConfig,
  type BridgeTransport,
} from '@agentbridge/gateway-core'
import {
  createLogger,
  initSentry,
  initTracing,
  flushSentry,
  shutdownTracing,
  captureError,
  SERVICE_NAMES,
  type Logger,
} from '@agentbridge/observability'
import { createBridgeRuntime, type BridgeRuntime } from '../runtime'
import { buildServer } from '../server'
import { runStdioBridge } from '../transports/stdio'

export interface ServeOptions {
  transport?: BridgeTransport
  host?: string
  port?: number
  logLevel?: string
}

export function applyServeOptions(config: BridgeConfig, options: ServeOptions): BridgeConfig {
  return {
    ...config,
    transport: options.transport ?? config.transport,
    host: options.host ?? config.host,
    port: options.port ?? config.port,
    logLevel: options.logLevel ?? config.logLevel,
  }
}

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid port: ${value}`)
  return port
}

async function shutdown(runtime: BridgeRuntime, logger: Logger, close?: () => Promise<void>) {
  logger.info('[bridge] shutting down')
  await close?.()
  await runtime.close()
  await shutdownTracing()
  await flushSentry()
}

export async function serve(options: ServeOptions): Promise<void> {
  const config = applyServeOptions(loadBridgeConfig(), options)
  const stdio = config.transport === 'stdio'
  const logger = createLogger({
    service: SERVICE_NAMES.BRIDGE_API,
    level: config.logLevel,
    pretty: config.nodeEnv !== 'production',
    destination: stdio ? 2 : 1,
  })

  initSentry({ dsn: config.sentryDsn, serviceName: SERVICE_NAMES.BRIDGE_API, logger })
  await initTracing({ serviceName: SERVICE_NAMES.BRIDGE_API, enabled: config.otelEnabled, logger })

  const runtime = await createBridgeRuntime(config, logger)
  const { connected, failed } = await runtime.upstream.connectAll()
  logger.info({ connected, failed: failed.map((f) => f.serverId) }, '[bridge] upstream servers ready')

  if (stdio) {
    await runStdioBridge(runtime)
    await shutdown(runtime, logger)
    return
  }

  const app = await buildServer(runtime)
  const stop = () => {
    shutdown(runtime, logger, () => app.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, '[bridge] shutdown failed')
        process.exit(1)
      })
  }
  process.once('SIGTERM', stop)
  process.once('SIGINT', stop)

  try {
    await app.listen({ port: config.port, host: config.host })
  } catch (err) {
    captureError(err, { service: SERVICE_NAMES.BRIDGE_API, operation: 'startup' })
    await shutdown(runtime, logger)
    throw err
  }
}

export const serveCommand = new Command('serve')
  .description('Run the bridge with the configured transport')
  .addOption(new Option('-t, --transport <transport>', 'MCP transport').choices(BRIDGE_TRANSPORTS))
  .option('-H, --host <host>', 'Interface to bind for HTTP transports')
  .option('-p, --port <port>', 'Port for HTTP transports', parsePort)
  .option('-l, --log-level <level>', 'Log level')
  .action(async (options: ServeOptions) => {
    await serve(options)
  })
