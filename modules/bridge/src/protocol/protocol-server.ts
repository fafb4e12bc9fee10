import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js'
import { isBridgeError, type BridgeError } from '@agentbridge/gateway-core'
import type { BridgeGateway, BridgeIdentity, CallContext } from '../router/bridge-gateway'

export const BRIDGE_SERVER_INFO = { name: 'agent-bridge', version: '0.1.0' } as const

export interface ProtocolServerOptions {
  gateway: BridgeGateway
  /** Bound once per MCP session by the transport that authenticated it. */
  identity: BridgeIdentity
  sessionId?: string
}

function mcpErrorFor(err: BridgeError): McpError {
  const code =
    err.statusCode === 403 || err.statusCode === 404
      ? ErrorCode.InvalidParams
      : err.statusCode === 504
        ? ErrorCode.RequestTimeout
        : ErrorCode.InternalError
  return new McpError(code, err.message, { code: err.code })
}

/**
 * An MCP server whose six handlers delegate to the gateway for one identity.
 * Tool failures come back as `isError` results; read and get failures as
 * JSON-RPC errors.
 */
export function createProtocolServer(options: ProtocolServerOptions): Server {
  const { gateway, identity } = options
  const server = new Server(BRIDGE_SERVER_INFO, {
    capabilities: { tools: {}, resources: {}, prompts: {} },
  })

  const context = (extra: { signal: AbortSignal; sessionId?: string }): CallContext => ({
    sessionId: options.sessionId ?? extra.sessionId,
    signal: extra.signal,
  })

  server.setRequestHandler(ListToolsRequestSchema, async (_request, extra) => ({
    tools: (await gateway.listTools(identity, context(extra))).map((t) => t.descriptor),
  }))

  server.setRequestHandler(ListResourcesRequestSchema, async (_request, extra) => ({
    resources: (await gateway.listResources(identity, context(extra))).map((r) => r.descriptor),
  }))

  server.setRequestHandler(ListPromptsRequestSchema, async (_request, extra) => ({
    prompts: (await gateway.listPrompts(identity, context(extra))).map((p) => p.descriptor),
  }))

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    try {
      return await gateway.callTool(identity, request.params.name, request.params.arguments ?? {}, context(extra))
    } catch (err) {
      if (!isBridgeError(err)) throw err
      const failure: CallToolResult = { content: [{ type: 'text', text: err.message }], isError: true }
      return failure
    }
  })

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    try {
      return await gateway.readResource(identity, request.params.uri, context(extra))
    } catch (err) {
      throw isBridgeError(err) ? mcpErrorFor(err) : err
    }
  })

  server.setRequestHandler(GetPromptRequestSchema, async (request, extra) => {
    try {
      return await gateway.getPrompt(identity, request.params.name, request.params.arguments ?? {}, context(extra))
    } catch (err) {
      throw isBridgeError(err) ? mcpErrorFor(err) : err
    }
  })

  return server
}
