#!/usr/bin/env -S node --import tsx
/**
 * agent-bridge CLI
 *
 * Usage:
 *   agent-bridge serve [--transport sse|streamable-http|stdio|http]
 *   agent-bridge register-agent --name <name> [--tool <id> ...]
 */

import { Command } from 'commander'
import { serveCommand } from './commands/serve'
import { registerAgentCommand } from './commands/register-agent'

const program = new Command()

program.name('agent-bridge').description('Agent-aware MCP bridge').version('0.1.0')

program.addCommand(serveCommand)
program.addCommand(registerAgentCommand)

program.parseAsync().catch((error: unknown) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
