// Upstream connections
export { createMcpClient, createTransport, BRIDGE_CLIENT_INFO } from './mcp-client/mcp-transport'
export type { UpstreamConnector } from './mcp-client/mcp-transport'
export { UpstreamConnectionManager } from './mcp-client/upstream-connection-manager'
export type {
  Catalog,
  CatalogSource,
  CatalogTool,
  CatalogResource,
  CatalogPrompt,
  ConnectAllResult,
  ForwardOptions,
  UpstreamConnectionManagerOptions,
} from './mcp-client/upstream-connection-manager'

// Filtering and dispatch
export { CapabilityFilter } from './router/capability-filter'
export type { Visible, VisibleTool, VisibleResource, VisiblePrompt } from './router/capability-filter'
export { BridgeGateway, AUDIT_SOURCE } from './router/bridge-gateway'
export type { BridgeIdentity, CallContext, ListResult, Forwarder, BridgeGatewayDeps } from './router/bridge-gateway'
export { withDeadline, toUpstreamError, upstreamErrorType, DEFAULT_UPSTREAM_TIMEOUT_MS } from './router/deadline'
export type { DeadlineOptions, UpstreamErrorType } from './router/deadline'
export { previewToolResult, truncate, PREVIEW_LIMIT } from './router/result-preview'

// Protocol surface
export { createProtocolServer, BRIDGE_SERVER_INFO } from './protocol/protocol-server'
export type { ProtocolServerOptions } from './protocol/protocol-server'

// Sessions
export { SessionTracker } from './session/session-tracker'
export type { BridgeSession, SessionTransport, SessionTrackerDeps } from './session/session-tracker'

// Audit
export { InMemoryAuditLog, AUDIT_EVENT_TYPES, hashArgs } from './audit/audit-log'
export type { AuditLog, AuditEvent, AuditEventType, AuditSeverity, AuditQuery } from './audit/audit-log'
export { PgAuditLog } from './audit/pg-audit-log'

// Schemas
export {
  toolCallRequestSchema,
  resourceReadRequestSchema,
  promptGetRequestSchema,
  auditQuerySchema,
} from './schemas/mcp-request'
export type { ToolCallRequest, ResourceReadRequest, PromptGetRequest, AuditQueryRequest } from './schemas/mcp-request'
export { toToolView, toResourceView, toPromptView } from './schemas/mcp-response'
export type { ToolView, ResourceView, PromptView } from './schemas/mcp-response'
