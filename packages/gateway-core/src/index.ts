// Types
export type {
  CapabilityKind,
  ServerStatus,
  ServerTransport,
  InvalidTransport,
  TransportType,
  CapabilityServer,
  AgentGrants,
  AgentIdentity,
  PromptArgument,
  ToolCapability,
  ResourceCapability,
  PromptCapability,
  Capability,
  CapabilityUsage,
  ServerUsage,
} from './types'

// Errors
export {
  BridgeError,
  AuthenticationError,
  PermissionDeniedError,
  PermissionRevokedError,
  NotFoundError,
  UpstreamTimeoutError,
  UpstreamExecutionError,
  ConfigurationError,
  ValidationError,
  RequestCancelledError,
  isBridgeError,
} from './errors'
export type { UnknownGrantIds } from './errors'

// Config
export { loadBridgeConfig, BRIDGE_TRANSPORTS } from './config/bridge-config'
export type { BridgeConfig, BridgeTransport } from './config/bridge-config'

// DB
export { createDbClient } from './db/client'
export type { DbClient, QueryFn, QueryRow } from './db/client'

// Registry
export type { AgentStore, CapabilityStore, ServerStore, Registry, AgentPatch } from './registry/stores'
export { PgRegistry } from './registry/pg-registry'
export { InMemoryRegistry } from './registry/memory-registry'
export { loadSeedFile } from './registry/seed'
export { seedSchema, serverTransportSchema, readServerTransport, requireTransport } from './registry/schemas'
export type { RegistrySeed, RegistrySeedInput } from './registry/schemas'

// Auth
export { AgentCredentialService } from './auth/agent-credential-service'
export type {
  RegisterAgentInput,
  RegisteredAgent,
  AgentCredentialServiceOptions,
} from './auth/agent-credential-service'
export { hashSecret, generateSecret, hashesEqual } from './auth/secret-hash'

// Usage
export { PgUsageRecorder, InMemoryUsageRecorder } from './usage/usage-recorder'
export type { UsageRecorder, CapabilityUse } from './usage/usage-recorder'

// Fastify helpers
export {
  extractCredentials,
  resolveAgent,
  createAuthHook,
  decorateAgent,
  DEFAULT_CREDENTIAL_HEADERS,
} from './fastify/auth-hook'
export type { CredentialHeaders, PresentedCredentials } from './fastify/auth-hook'
export { registerHealthRoute } from './fastify/health-route'
