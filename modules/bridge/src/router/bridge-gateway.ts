import { v4 as uuidv4 } from 'uuid'
import type { CallToolResult, GetPromptResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js'
import {
  PermissionDeniedError,
  PermissionRevokedError,
  type AgentIdentity,
  type BridgeError,
  type CapabilityKind,
  type UsageRecorder,
} from '@agentbridge/gateway-core'
import { createNullLogger, hashForTelemetry, withSpan, SPAN_NAMES, ATTR_KEYS, type Logger } from '@agentbridge/observability'
import type { CapabilityFilter, VisibleTool, VisibleResource, VisiblePrompt } from './capability-filter'
import type { UpstreamConnectionManager } from '../mcp-client/upstream-connection-manager'
import { withDeadline, toUpstreamError, upstreamErrorType, DEFAULT_UPSTREAM_TIMEOUT_MS } from './deadline'
import { previewToolResult, truncate } from './result-preview'
import { hashArgs, type AuditEventType, type AuditLog, type AuditSeverity } from '../audit/audit-log'

export type BridgeIdentity = Pick<AgentIdentity, 'id' | 'name'>

export interface CallContext {
  sessionId?: string
  /** Aborted when the caller goes away. */
  signal?: AbortSignal
}

export type ListResult<T> = { ok: true; items: T[] } | { ok: false; error: BridgeError }

/** The forwarding half of the connection manager. */
export type Forwarder = Pick<UpstreamConnectionManager, 'forwardCallTool' | 'forwardReadResource' | 'forwardGetPrompt'>

export interface BridgeGatewayDeps {
  filter: CapabilityFilter
  upstream: Forwarder
  usage: UsageRecorder
  audit: AuditLog
  logger?: Logger
  timeoutMs?: number
  now?: () => Date
}

export const AUDIT_SOURCE = 'bridge'

interface DispatchPlan<V extends { capabilityId: string; serverId: string }, R> {
  kind: CapabilityKind
  label: string
  span: string
  events: { attempt: AuditEventType; result: AuditEventType; error: AuditEventType }
  request: Record<string, unknown>
  find: () => Promise<V | null>
  forward: (signal: AbortSignal) => Promise<R>
  describe: (result: R) => Record<string, unknown>
}

/**
 * The six protocol operations. Every call, read and get goes through the same
 * pipeline: audit the attempt, check the grant, check it again right before
 * dispatch, forward under the deadline, record usage, audit the outcome.
 */
export class BridgeGateway {
  private readonly filter: CapabilityFilter
  private readonly upstream: Forwarder
  private readonly usage: UsageRecorder
  private readonly audit: AuditLog
  private readonly logger: Logger
  private readonly timeoutMs: number
  private readonly now: () => Date

  constructor(deps: BridgeGatewayDeps) {
    this.filter = deps.filter
    this.upstream = deps.upstream
    this.usage = deps.usage
    this.audit = deps.audit
    this.logger = deps.logger ?? createNullLogger()
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS
    this.now = deps.now ?? (() => new Date())
  }

  // ── Listing ──────────────────────────────────────────────────────

  async listTools(identity: BridgeIdentity, context: CallContext = {}): Promise<VisibleTool[]> {
    const result = await this.listToolsResult(identity, context)
    return result.ok ? result.items : []
  }

  async listResources(identity: BridgeIdentity, context: CallContext = {}): Promise<VisibleResource[]> {
    const result = await this.listResourcesResult(identity, context)
    return result.ok ? result.items : []
  }

  async listPrompts(identity: BridgeIdentity, context: CallContext = {}): Promise<VisiblePrompt[]> {
    const result = await this.listPromptsResult(identity, context)
    return result.ok ? result.items : []
  }

  listToolsResult(identity: BridgeIdentity, context: CallContext = {}): Promise<ListResult<VisibleTool>> {
    return this.list('tool', 'list_tools', identity, context, () => this.filter.visibleTools(identity.id))
  }

  listResourcesResult(identity: BridgeIdentity, context: CallContext = {}): Promise<ListResult<VisibleResource>> {
    return this.list('resource', 'list_resources', identity, context, () => this.filter.visibleResources(identity.id))
  }

  listPromptsResult(identity: BridgeIdentity, context: CallContext = {}): Promise<ListResult<VisiblePrompt>> {
    return this.list('prompt', 'list_prompts', identity, context, () => this.filter.visiblePrompts(identity.id))
  }

  // ── Dispatch ─────────────────────────────────────────────────────

  callTool(
    identity: BridgeIdentity,
    name: string,
    args: Record<string, unknown> = {},
    context: CallContext = {},
  ): Promise<CallToolResult> {
    return this.dispatch(identity, context, {
      kind: 'tool',
      label: name,
      span: SPAN_NAMES.TOOL_CALL,
      events: { attempt: 'call_attempt', result: 'tool_result', error: 'tool_error' },
      request: { toolName: name, argumentKeys: Object.keys(args).sort(), argsHash: hashArgs(args) },
      find: () => this.filter.findTool(identity.id, name),
      forward: (signal) => this.upstream.forwardCallTool(name, args, { signal, timeoutMs: this.timeoutMs }),
      describe: previewToolResult,
    })
  }

  readResource(identity: BridgeIdentity, uri: string, context: CallContext = {}): Promise<ReadResourceResult> {
    return this.dispatch(identity, context, {
      kind: 'resource',
      label: uri,
      span: SPAN_NAMES.RESOURCE_READ,
      events: { attempt: 'read_attempt', result: 'resource_result', error: 'resource_error' },
      request: { uri },
      find: () => this.filter.findResource(identity.id, uri),
      forward: (signal) => this.upstream.forwardReadResource(uri, { signal, timeoutMs: this.timeoutMs }),
      describe: (result) => ({ contentCount: result.contents.length }),
    })
  }

  getPrompt(
    identity: BridgeIdentity,
    name: string,
    args: Record<string, string> = {},
    context: CallContext = {},
  ): Promise<GetPromptResult> {
    return this.dispatch(identity, context, {
      kind: 'prompt',
      label: name,
      span: SPAN_NAMES.PROMPT_GET,
      events: { attempt: 'prompt_attempt', result: 'prompt_result', error: 'prompt_error' },
      request: { promptName: name, argumentKeys: Object.keys(args).sort(), argsHash: hashArgs(args) },
      find: () => this.filter.findPrompt(identity.id, name),
      forward: (signal) => this.upstream.forwardGetPrompt(name, args, { signal, timeoutMs: this.timeoutMs }),
      describe: (result) => ({
        messageCount: result.messages.length,
        description: result.description ? truncate(result.description) : null,
      }),
    })
  }

  // ── Internals ────────────────────────────────────────────────────

  private async dispatch<V extends { capabilityId: string; serverId: string }, R>(
    identity: BridgeIdentity,
    context: CallContext,
    plan: DispatchPlan<V, R>,
  ): Promise<R> {
    const correlationId = uuidv4()
    const emit = (eventType: AuditEventType, severity: AuditSeverity, payload: Record<string, unknown>) =>
      this.record(identity, context, correlationId, eventType, severity, { ...plan.request, ...payload })

    await emit(plan.events.attempt, 'info', {})

    const first = await plan.find()
    if (!first) {
      await emit('access_denied', 'warning', { capabilityKind: plan.kind })
      throw new PermissionDeniedError(`Agent is not permitted to use ${plan.kind} ${plan.label}`)
    }

    const granted = await plan.find()
    if (!granted) {
      await emit('access_revoked', 'warning', { capabilityKind: plan.kind, capabilityId: first.capabilityId })
      throw new PermissionRevokedError(`Permission for ${plan.kind} ${plan.label} was revoked`)
    }

    const target = { capabilityId: granted.capabilityId, serverId: granted.serverId }
    const startedAt = Date.now()
    let result: R
    try {
      result = await withSpan(
        plan.span,
        {
          [ATTR_KEYS.CORRELATION_ID]: correlationId,
          [ATTR_KEYS.AGENT_KEY_HASH]: hashForTelemetry(identity.id),
          [ATTR_KEYS.CAPABILITY_KIND]: plan.kind,
          [ATTR_KEYS.SERVER_ID]: granted.serverId,
        },
        () => withDeadline(plan.forward, { timeoutMs: this.timeoutMs, signal: context.signal }),
      )
    } catch (err) {
      const failure = toUpstreamError(err)
      const errorType = upstreamErrorType(failure)
      await emit(plan.events.error, errorType === 'cancelled' ? 'warning' : 'error', {
        ...target,
        errorType,
        error: failure.message,
        durationMs: Date.now() - startedAt,
      })
      throw failure
    }

    try {
      await this.usage.recordUse({ agentId: identity.id, kind: plan.kind, ...target })
    } catch (err) {
      this.logger.warn({ err, agentId: identity.id, ...target }, '[usage] failed to record usage')
    }

    await emit(plan.events.result, 'info', { ...target, durationMs: Date.now() - startedAt, ...plan.describe(result) })
    return result
  }

  private async list<T>(
    kind: CapabilityKind,
    eventType: AuditEventType,
    identity: BridgeIdentity,
    context: CallContext,
    load: () => Promise<T[]>,
  ): Promise<ListResult<T>> {
    const correlationId = uuidv4()
    try {
      const items = await withDeadline(load, { timeoutMs: this.timeoutMs, signal: context.signal })
      await this.record(identity, context, correlationId, eventType, 'info', { count: items.length })
      return { ok: true, items }
    } catch (err) {
      const failure = toUpstreamError(err)
      this.logger.error({ err, agentId: identity.id, kind }, '[bridge] listing failed')
      await this.record(identity, context, correlationId, 'list_error', 'error', {
        capabilityKind: kind,
        errorType: upstreamErrorType(failure),
        error: failure.message,
      })
      return { ok: false, error: failure }
    }
  }

  /** Audit writes never fail the operation; a failed append is logged. */
  private async record(
    identity: BridgeIdentity,
    context: CallContext,
    correlationId: string,
    eventType: AuditEventType,
    severity: AuditSeverity,
    payload: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.audit.append({
        timestamp: this.now().toISOString(),
        eventType,
        correlationId,
        sessionId: context.sessionId ?? null,
        agentId: identity.id,
        source: AUDIT_SOURCE,
        severity,
        payload,
      })
    } catch (err) {
      this.logger.error({ err, eventType, correlationId }, '[audit] failed to append event')
    }
  }
}
