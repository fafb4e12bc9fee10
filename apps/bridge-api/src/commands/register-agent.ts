import { Command } from 'commander'
import { loadBridgeConfig } from '@agentbridge/gateway-core'
import { createLogger, SERVICE_NAMES } from '@agentbridge/observability'
import { createBridgeRuntime } from '../runtime'

export interface RegisterAgentOptions {
  name: string
  description?: string
  tool: string[]
  resource: string[]
  prompt: string[]
}

const collect = (value: string, previous: string[]) => [...previous, value]

export const registerAgentCommand = new Command('register-agent')
  .description('Create an agent identity and print its client secret once')
  .requiredOption('-n, --name <name>', 'Agent name')
  .option('-d, --description <text>', 'Agent description')
  .option('--tool <id>', 'Grant a tool id (repeatable)', collect, [])
  .option('--resource <id>', 'Grant a resource id (repeatable)', collect, [])
  .option('--prompt <id>', 'Grant a prompt id (repeatable)', collect, [])
  .action(async (options: RegisterAgentOptions) => {
    const config = loadBridgeConfig()
    const logger = createLogger({ service: SERVICE_NAMES.BRIDGE_CLI, level: config.logLevel, destination: 2 })
    if (!config.databaseUrl) logger.warn('[cli] DATABASE_URL not set - the agent only lives in this process')

    const runtime = await createBridgeRuntime(config, logger)
    try {
      const { agent, clientSecret } = await runtime.credentials.register({
        name: options.name,
        description: options.description ?? null,
        toolIds: options.tool,
        resourceIds: options.resource,
        promptIds: options.prompt,
      })
      process.stdout.write(
        `${JSON.stringify({ agentId: agent.id, clientId: agent.clientId, clientSecret }, null, 2)}\n`,
      )
    } finally {
      await runtime.close()
    }
  })
